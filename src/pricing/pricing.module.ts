import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { PackageItem } from '../transport-requests/entities/package-item.entity';
import { TransportRequest } from '../transport-requests/entities/transport-request.entity';
import { PricingRule } from './entities/pricing-rule.entity';
import { Quote } from './entities/quote.entity';
import { QuoteLineItem } from './entities/quote-line-item.entity';
import { PricingRulesService } from './pricing-rules.service';
import { QuotesController, TransportRequestQuotesController } from './quotes.controller';
import { QuotesService } from './quotes.service';

@Module({
  imports: [
    TypeOrmModule.forFeature([TransportRequest, PackageItem, PricingRule, Quote, QuoteLineItem]),
  ],
  controllers: [QuotesController, TransportRequestQuotesController],
  providers: [PricingRulesService, QuotesService],
  exports: [PricingRulesService, QuotesService],
})
export class PricingModule {}
