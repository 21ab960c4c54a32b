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
import type { TransportRequestStatus } from '../transport-request-status';
import type {
  ShippingMode,
  VehicleBookingKey,
  VehicleRequirement,
} from '../shipment-cargo';

/**
 * A customer's request to move cargo from a pickup to a delivery address.
 * Coordinates and country codes are filled in by geocoding upstream.
 */
@Entity('transport_requests')
export class TransportRequest {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Index()
  @Column({ type: 'varchar', length: 20, default: 'new' })
  status!: TransportRequestStatus;

  @Column({ type: 'text', nullable: true })
  startAddress!: string | null;

  @Column({ type: 'varchar', length: 2, nullable: true })
  startCountry!: string | null;

  @Column({
    type: 'decimal',
    precision: 10,
    scale: 6,
    nullable: true,
    transformer: decimalTransformer,
  })
  startLatitude!: number | null;

  @Column({
    type: 'decimal',
    precision: 10,
    scale: 6,
    nullable: true,
    transformer: decimalTransformer,
  })
  startLongitude!: number | null;

  @Column({ type: 'text', nullable: true })
  destinationAddress!: string | null;

  @Column({ type: 'varchar', length: 2, nullable: true })
  destinationCountry!: string | null;

  @Column({
    type: 'decimal',
    precision: 10,
    scale: 6,
    nullable: true,
    transformer: decimalTransformer,
  })
  destinationLatitude!: number | null;

  @Column({
    type: 'decimal',
    precision: 10,
    scale: 6,
    nullable: true,
    transformer: decimalTransformer,
  })
  destinationLongitude!: number | null;

  /** Billing distance, supplied upstream. */
  @Column({
    type: 'decimal',
    precision: 10,
    scale: 2,
    nullable: true,
    transformer: decimalTransformer,
  })
  distanceKm!: number | null;

  @Column({ type: 'timestamptz', nullable: true })
  pickupDateFrom!: Date | null;

  @Column({ type: 'timestamptz', nullable: true })
  pickupDateTo!: Date | null;

  @Column({ type: 'timestamptz', nullable: true })
  deliveryDateFrom!: Date | null;

  @Column({ type: 'timestamptz', nullable: true })
  deliveryDateTo!: Date | null;

  @Column({ type: 'varchar', length: 20, nullable: true })
  vehicleType!: VehicleRequirement | null;

  @Column({ type: 'varchar', length: 20, default: 'packages' })
  shippingMode!: ShippingMode;

  @Column({ type: 'int', nullable: true })
  cargoLengthCm!: number | null;

  @Column({ type: 'int', nullable: true })
  cargoWidthCm!: number | null;

  @Column({ type: 'int', nullable: true })
  cargoHeightCm!: number | null;

  @Column({ type: 'int', nullable: true })
  cargoWeightKg!: number | null;

  @Column({
    type: 'decimal',
    precision: 5,
    scale: 2,
    nullable: true,
    transformer: decimalTransformer,
  })
  loadingMeters!: number | null;

  @Column({ type: 'int', nullable: true })
  totalHeightCm!: number | null;

  @Column({
    type: 'decimal',
    precision: 10,
    scale: 2,
    nullable: true,
    transformer: decimalTransformer,
  })
  totalWeightKg!: number | null;

  @Column({ type: 'varchar', length: 20, nullable: true })
  vehicleBookingType!: VehicleBookingKey | null;

  @Column({ type: 'boolean', default: false })
  requiresLiftgate!: boolean;

  @Column({ type: 'boolean', default: false })
  requiresPalletJack!: boolean;

  @Column({ type: 'boolean', default: false })
  requiresGpsTracking!: boolean;

  @Column({ type: 'boolean', default: false })
  requiresSideLoading!: boolean;

  @Column({ type: 'boolean', default: false })
  requiresTarp!: boolean;

  @Column({ type: 'varchar', length: 5, nullable: true })
  driverLanguage!: string | null;

  @Column({ type: 'uuid', nullable: true })
  matchedCarrierId!: string | null;

  @ManyToOne(() => Carrier, { nullable: true, onDelete: 'SET NULL' })
  @JoinColumn({ name: 'matchedCarrierId' })
  matchedCarrier?: Carrier | null;

  @CreateDateColumn({ type: 'timestamptz' })
  createdAt!: Date;

  @UpdateDateColumn({ type: 'timestamptz' })
  updatedAt!: Date;
}
