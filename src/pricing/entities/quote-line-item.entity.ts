import {
  Column,
  CreateDateColumn,
  Entity,
  Index,
  JoinColumn,
  ManyToOne,
  PrimaryGeneratedColumn,
  UpdateDateColumn,
} from 'typeorm';
import { decimalTransformer } from '../../database/decimal.transformer';
import type { LineItemKind } from '../pricing-calculator';
import { Quote } from './quote.entity';

/** Line 0 is the base cost; surcharges follow in the order they were applied. */
@Entity('quote_line_items')
@Index(['quoteId', 'lineOrder'])
export class QuoteLineItem {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'uuid' })
  quoteId!: string;

  @ManyToOne(() => Quote, (quote) => quote.lineItems, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'quoteId' })
  quote?: Quote;

  @Column({ type: 'varchar', length: 30 })
  kind!: LineItemKind;

  @Column({ type: 'varchar', length: 255 })
  description!: string;

  @Column({ type: 'varchar', length: 255, nullable: true })
  calculation!: string | null;

  @Column({
    type: 'decimal',
    precision: 10,
    scale: 2,
    transformer: decimalTransformer,
  })
  amount!: number;

  @Column({ type: 'int', default: 0 })
  lineOrder!: number;

  @CreateDateColumn({ type: 'timestamptz' })
  createdAt!: Date;

  @UpdateDateColumn({ type: 'timestamptz' })
  updatedAt!: Date;
}
