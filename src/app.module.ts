import { Module } from '@nestjs/common';
import { APP_GUARD } from '@nestjs/core';
import { ThrottlerModule } from '@nestjs/throttler';
import { CarrierRequestsModule } from './carrier-requests/carrier-requests.module';
import { CarriersModule } from './carriers/carriers.module';
import { envNumber } from './config/env';
import { DatabaseModule } from './database/database.module';
import { JobsModule } from './jobs/jobs.module';
import { MatchingModule } from './matching/matching.module';
import { PricingModule } from './pricing/pricing.module';
import { CustomThrottlerGuard } from './throttling/custom-throttler.guard';
import { TransportRequestsModule } from './transport-requests/transport-requests.module';

@Module({
  imports: [
    ThrottlerModule.forRoot([
      {
        name: 'global',
        ttl: 60_000,
        limit: envNumber('THROTTLE_LIMIT', 120),
      },
    ]),
    DatabaseModule,
    JobsModule,
    CarriersModule,
    TransportRequestsModule,
    PricingModule,
    MatchingModule,
    CarrierRequestsModule,
  ],
  providers: [
    {
      provide: APP_GUARD,
      useClass: CustomThrottlerGuard,
    },
  ],
})
export class AppModule {}
