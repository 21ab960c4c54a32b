import {
  Column,
  CreateDateColumn,
  Entity,
  PrimaryGeneratedColumn,
  UpdateDateColumn,
} from 'typeorm';
import { decimalTransformer } from '../../database/decimal.transformer';

/**
 * Carrier - a transport provider with its fleet, equipment and the
 * countries it picks up from and delivers to.
 */
@Entity('carriers')
export class Carrier {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'varchar', length: 255 })
  companyName!: string;

  @Column({ type: 'varchar', length: 255 })
  contactEmail!: string;

  @Column({ type: 'varchar', length: 50, nullable: true })
  contactPhone!: string | null;

  /** Preferred language for correspondence: de, en, fr, it, nl. */
  @Column({ type: 'varchar', length: 5, nullable: true })
  language!: string | null;

  @Column({ type: 'varchar', length: 2, nullable: true })
  country!: string | null;

  @Column({ type: 'text', nullable: true })
  address!: string | null;

  @Column({
    type: 'decimal',
    precision: 10,
    scale: 6,
    nullable: true,
    transformer: decimalTransformer,
  })
  latitude!: number | null;

  @Column({
    type: 'decimal',
    precision: 10,
    scale: 6,
    nullable: true,
    transformer: decimalTransformer,
  })
  longitude!: number | null;

  @Column({ type: 'int', nullable: true })
  pickupRadiusKm!: number | null;

  @Column({ type: 'boolean', default: false })
  ignoreRadius!: boolean;

  @Column({ type: 'boolean', default: false })
  hasTransporter!: boolean;

  @Column({ type: 'boolean', default: false })
  hasLkw!: boolean;

  @Column({ type: 'int', nullable: true })
  lkwLengthCm!: number | null;

  @Column({ type: 'int', nullable: true })
  lkwWidthCm!: number | null;

  @Column({ type: 'int', nullable: true })
  lkwHeightCm!: number | null;

  @Column({ type: 'boolean', default: false })
  hasLiftgate!: boolean;

  @Column({ type: 'boolean', default: false })
  hasPalletJack!: boolean;

  @Column({ type: 'boolean', default: false })
  hasGpsTracking!: boolean;

  @Column({ type: 'boolean', default: false })
  hasSideLoading!: boolean;

  @Column({ type: 'boolean', default: false })
  hasTarp!: boolean;

  /** ISO 3166-1 alpha-2 codes. */
  @Column({ type: 'jsonb', default: () => "'[]'" })
  pickupCountries!: string[];

  @Column({ type: 'jsonb', default: () => "'[]'" })
  deliveryCountries!: string[];

  @Column({ type: 'boolean', default: true })
  active!: boolean;

  @Column({ type: 'boolean', default: false })
  blacklisted!: boolean;

  @Column({ type: 'text', nullable: true })
  notes!: string | null;

  @CreateDateColumn({ type: 'timestamptz' })
  createdAt!: Date;

  @UpdateDateColumn({ type: 'timestamptz' })
  updatedAt!: Date;
}
