import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Carrier } from '../carriers/entities/carrier.entity';
import { EmailModule } from '../email/email.module';
import { PackageItem } from '../transport-requests/entities/package-item.entity';
import { TransportRequest } from '../transport-requests/entities/transport-request.entity';
import { CarrierMailerService } from './carrier-mailer.service';
import {
  CarrierRequestsController,
  OffersController,
  TransportRequestOffersController,
} from './carrier-requests.controller';
import { CarrierRequestsService } from './carrier-requests.service';
import { CarrierRequest } from './entities/carrier-request.entity';
import { InvitationsService } from './invitations.service';

@Module({
  imports: [
    TypeOrmModule.forFeature([CarrierRequest, Carrier, TransportRequest, PackageItem]),
    EmailModule,
  ],
  controllers: [CarrierRequestsController, OffersController, TransportRequestOffersController],
  providers: [CarrierMailerService, InvitationsService, CarrierRequestsService],
  exports: [CarrierRequestsService, InvitationsService],
})
export class CarrierRequestsModule {}
