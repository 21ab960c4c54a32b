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
import { TransportRequest } from './transport-request.entity';

@Entity('package_items')
export class PackageItem {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Index()
  @Column({ type: 'uuid' })
  transportRequestId!: string;

  @ManyToOne(() => TransportRequest, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'transportRequestId' })
  transportRequest?: TransportRequest;

  /** Preset name such as `euro_pallet`, or `custom`. */
  @Column({ type: 'varchar', length: 50 })
  packageType!: string;

  @Column({ type: 'int', default: 1 })
  quantity!: number;

  @Column({ type: 'int', nullable: true })
  lengthCm!: number | null;

  @Column({ type: 'int', nullable: true })
  widthCm!: number | null;

  @Column({ type: 'int', nullable: true })
  heightCm!: number | null;

  @Column({
    type: 'decimal',
    precision: 10,
    scale: 2,
    transformer: decimalTransformer,
  })
  weightKg!: number;

  @CreateDateColumn({ type: 'timestamptz' })
  createdAt!: Date;

  @UpdateDateColumn({ type: 'timestamptz' })
  updatedAt!: Date;
}
