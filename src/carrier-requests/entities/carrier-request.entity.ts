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
import { Carrier } from '../../carriers/entities/carrier.entity';
import { TransportRequest } from '../../transport-requests/entities/transport-request.entity';
import type { OfferStatus } from '../offer-status';

/**
 * One matched carrier for one transport request. Created by a matching run,
 * later carries the carrier's offer.
 */
@Entity('carrier_requests')
export class CarrierRequest {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Index()
  @Column({ type: 'uuid' })
  transportRequestId!: string;

  @ManyToOne(() => TransportRequest, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'transportRequestId' })
  transportRequest?: TransportRequest;

  @Index()
  @Column({ type: 'uuid' })
  carrierId!: string;

  @ManyToOne(() => Carrier, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'carrierId' })
  carrier?: Carrier;

  @Index()
  @Column({ type: 'varchar', length: 20, default: 'new' })
  status!: OfferStatus;

  @Column({
    type: 'decimal',
    precision: 10,
    scale: 2,
    nullable: true,
    transformer: decimalTransformer,
  })
  distanceToPickupKm!: number | null;

  @Column({
    type: 'decimal',
    precision: 10,
    scale: 2,
    nullable: true,
    transformer: decimalTransformer,
  })
  distanceToDeliveryKm!: number | null;

  @Column({ type: 'boolean', default: false })
  inRadius!: boolean;

  @Column({ type: 'timestamptz', nullable: true })
  emailSentAt!: Date | null;

  @Column({ type: 'timestamptz', nullable: true })
  responseDate!: Date | null;

  @Column({
    type: 'decimal',
    precision: 10,
    scale: 2,
    nullable: true,
    transformer: decimalTransformer,
  })
  offeredPrice!: number | null;

  @Column({ type: 'timestamptz', nullable: true })
  offeredDeliveryDate!: Date | null;

  @Column({ type: 'varchar', length: 50, nullable: true })
  transportType!: string | null;

  @Column({ type: 'varchar', length: 50, nullable: true })
  vehicleType!: string | null;

  @Column({ type: 'varchar', length: 5, nullable: true })
  driverLanguage!: string | null;

  @Column({ type: 'text', nullable: true })
  notes!: string | null;

  @CreateDateColumn({ type: 'timestamptz' })
  createdAt!: Date;

  @UpdateDateColumn({ type: 'timestamptz' })
  updatedAt!: Date;
}
