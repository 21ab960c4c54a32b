import {
  Injectable,
  Logger,
  NotFoundException,
  OnApplicationBootstrap,
  OnModuleDestroy,
} from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { DataSource, LessThan, Repository } from 'typeorm';
import { InvalidTransitionError } from '../common/state-machine';
import { envNumber, envString } from '../config/env';
import { JobQueueService } from '../jobs/job-queue.service';
import { PackageItem } from '../transport-requests/entities/package-item.entity';
import { TransportRequest } from '../transport-requests/entities/transport-request.entity';
import { toShipmentCargo } from '../transport-requests/shipment-cargo';
import { Quote } from './entities/quote.entity';
import { QuoteLineItem } from './entities/quote-line-item.entity';
import { calculatePrice, type PricedQuote } from './pricing-calculator';
import { PricingRulesService } from './pricing-rules.service';
import { quoteLifecycle, type QuoteStatus } from './quote-status';

const DAY_MS = 24 * 60 * 60 * 1000;

export type QuoteWithLineItems = {
  quote: Quote;
  lineItems: QuoteLineItem[];
};

export type QuoteCalculationResult =
  | ({ status: 'ok'; regenerated: boolean } & QuoteWithLineItems)
  | { status: 'rejected'; transportRequestId: string; errors: string[] };

@Injectable()
export class QuotesService implements OnApplicationBootstrap, OnModuleDestroy {
  private readonly logger = new Logger(QuotesService.name);
  private sweepTimer: NodeJS.Timeout | null = null;

  constructor(
    @InjectRepository(TransportRequest)
    private readonly transportRequests: Repository<TransportRequest>,
    @InjectRepository(PackageItem)
    private readonly packageItems: Repository<PackageItem>,
    @InjectRepository(Quote)
    private readonly quotes: Repository<Quote>,
    @InjectRepository(QuoteLineItem)
    private readonly lineItems: Repository<QuoteLineItem>,
    private readonly dataSource: DataSource,
    private readonly pricingRules: PricingRulesService,
    private readonly jobs: JobQueueService,
  ) {}

  onApplicationBootstrap() {
    const intervalMs = envNumber('QUOTE_EXPIRY_SWEEP_MS', 60 * 60 * 1000);
    if (intervalMs <= 0) return;
    this.sweepTimer = setInterval(() => {
      this.expireStaleQuotes().catch((err: unknown) => {
        this.logger.error(
          'Quote expiry sweep failed',
          err instanceof Error ? err.stack : String(err),
        );
      });
    }, intervalMs);
    this.sweepTimer.unref();
  }

  onModuleDestroy() {
    if (this.sweepTimer) clearInterval(this.sweepTimer);
    this.sweepTimer = null;
  }

  /**
   * Prices a request and stores the quote with its line items in one
   * transaction. A pending quote is recalculated in place; any other quote
   * is final.
   */
  async calculateQuote(
    transportRequestId: string,
    now: Date = new Date(),
  ): Promise<QuoteCalculationResult> {
    const request = await this.transportRequests.findOneBy({ id: transportRequestId });
    if (!request) throw new NotFoundException('Transport request not found');

    const existing = await this.findLatest(transportRequestId);
    if (existing && existing.status !== 'pending') {
      return this.reject(transportRequestId, [
        `Quote ${existing.id} is ${existing.status} and cannot be recalculated`,
      ]);
    }

    const items = await this.packageItems.find({
      where: { transportRequestId },
      order: { createdAt: 'ASC' },
    });
    const cargo = toShipmentCargo(request, items);
    if (cargo.status === 'invalid') return this.reject(transportRequestId, cargo.errors);

    const priced = calculatePrice(
      {
        distanceKm: request.distanceKm,
        pickupDate: request.pickupDateFrom,
        vehicleRequirement: request.vehicleType,
        cargo: cargo.cargo,
      },
      {
        rules: await this.pricingRules.findActive(),
        now,
        currency: envString('QUOTE_CURRENCY', 'EUR'),
        timeZone: envString('PRICING_TIME_ZONE', 'Europe/Berlin'),
        expressWindowHours: envNumber('EXPRESS_WINDOW_HOURS', 24),
      },
    );
    if (priced.status === 'rejected') return this.reject(transportRequestId, priced.errors);

    const validUntil = new Date(now.getTime() + envNumber('QUOTE_VALIDITY_DAYS', 14) * DAY_MS);
    const stored = await this.dataSource.transaction(async (manager) => {
      const quotes = manager.getRepository(Quote);
      const lines = manager.getRepository(QuoteLineItem);

      let quote: Quote;
      if (existing) {
        const current = await quotes.findOne({
          where: { id: existing.id },
          lock: { mode: 'pessimistic_write' },
        });
        if (!current || current.status !== 'pending') return null;

        await lines.delete({ quoteId: current.id });
        quote = await quotes.save(Object.assign(current, this.amounts(priced.quote), { validUntil }));
      } else {
        quote = await quotes.save(
          quotes.create({
            transportRequestId,
            status: 'pending',
            ...this.amounts(priced.quote),
            validUntil,
          }),
        );
      }

      const lineItems = await lines.save(
        priced.quote.lineItems.map((item) => lines.create({ ...item, quoteId: quote.id })),
      );
      return { quote, lineItems };
    });

    if (!stored) {
      return this.reject(transportRequestId, ['Quote was decided while it was being recalculated']);
    }

    this.logger.log(
      `${existing ? 'Recalculated' : 'Created'} quote ${stored.quote.id} for transport request ${transportRequestId}: ` +
        `${stored.quote.totalPrice} ${stored.quote.currency}`,
    );
    return { status: 'ok', regenerated: Boolean(existing), ...stored };
  }

  async findOne(quoteId: string): Promise<QuoteWithLineItems> {
    const quote = await this.quotes.findOneBy({ id: quoteId });
    if (!quote) throw new NotFoundException('Quote not found');
    return { quote, lineItems: await this.findLineItems(quote.id) };
  }

  async findForRequest(transportRequestId: string): Promise<QuoteWithLineItems> {
    const quote = await this.findLatest(transportRequestId);
    if (!quote) throw new NotFoundException('Quote not found');
    return { quote, lineItems: await this.findLineItems(quote.id) };
  }

  /** Accepting a quote is what starts carrier matching for its request. */
  async acceptQuote(quoteId: string, now: Date = new Date()): Promise<Quote> {
    const quote = await this.decide(quoteId, 'accepted', { acceptedAt: now }, now);
    this.jobs.enqueue('match_carriers', { transportRequestId: quote.transportRequestId });
    return quote;
  }

  declineQuote(quoteId: string, now: Date = new Date()): Promise<Quote> {
    return this.decide(quoteId, 'declined', { declinedAt: now }, now);
  }

  /** Moves every pending quote past its validity to expired. Returns the count. */
  async expireStaleQuotes(now: Date = new Date()): Promise<number> {
    const { affected } = await this.quotes.update(
      { status: 'pending', validUntil: LessThan(now) },
      { status: 'expired' },
    );
    const count = affected ?? 0;
    if (count) this.logger.log(`Expired ${count} stale quote(s)`);
    return count;
  }

  private async decide(
    quoteId: string,
    to: Extract<QuoteStatus, 'accepted' | 'declined'>,
    stamp: Partial<Pick<Quote, 'acceptedAt' | 'declinedAt'>>,
    now: Date,
  ): Promise<Quote> {
    const quote = await this.quotes.findOneBy({ id: quoteId });
    if (!quote) throw new NotFoundException('Quote not found');

    if (quote.status === 'pending' && quote.validUntil && quote.validUntil.getTime() < now.getTime()) {
      await this.quotes.update({ id: quoteId, status: 'pending' }, { status: 'expired' });
      throw new InvalidTransitionError('Quote', 'expired', to);
    }

    quoteLifecycle.assertTransition(quote.status, to);

    const { affected } = await this.quotes.update(
      { id: quoteId, status: 'pending' },
      { status: to, ...stamp },
    );
    const updated = await this.quotes.findOneBy({ id: quoteId });
    if (!affected || !updated) {
      throw new InvalidTransitionError('Quote', updated?.status ?? quote.status, to);
    }

    this.logger.log(`Quote ${quoteId} ${to}`);
    return updated;
  }

  private findLatest(transportRequestId: string): Promise<Quote | null> {
    return this.quotes.findOne({
      where: { transportRequestId },
      order: { createdAt: 'DESC' },
    });
  }

  private findLineItems(quoteId: string): Promise<QuoteLineItem[]> {
    return this.lineItems.find({ where: { quoteId }, order: { lineOrder: 'ASC' } });
  }

  private amounts(priced: PricedQuote) {
    return {
      basePrice: priced.basePrice,
      surchargeTotal: priced.surchargeTotal,
      totalPrice: priced.totalPrice,
      currency: priced.currency,
      pricingRuleId: priced.rule.id,
    };
  }

  private reject(transportRequestId: string, errors: string[]): QuoteCalculationResult {
    this.logger.warn(
      `Quote for transport request ${transportRequestId} rejected: ${errors.join('; ')}`,
    );
    return { status: 'rejected', transportRequestId, errors };
  }
}
