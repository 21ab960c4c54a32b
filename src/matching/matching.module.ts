import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { CarriersModule } from '../carriers/carriers.module';
import { CarrierRequest } from '../carrier-requests/entities/carrier-request.entity';
import { PackageItem } from '../transport-requests/entities/package-item.entity';
import { TransportRequest } from '../transport-requests/entities/transport-request.entity';
import { MatchingService } from './matching.service';

@Module({
  imports: [
    TypeOrmModule.forFeature([TransportRequest, PackageItem, CarrierRequest]),
    CarriersModule,
  ],
  providers: [MatchingService],
  exports: [MatchingService],
})
export class MatchingModule {}
