import { Injectable, Logger, OnApplicationBootstrap } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { envBoolean } from '../config/env';
import defaultRules from './data/default-pricing-rules.json';
import { PricingRule } from './entities/pricing-rule.entity';
import { isPricingRuleKey } from './pricing-rule-key';

@Injectable()
export class PricingRulesService implements OnApplicationBootstrap {
  private readonly logger = new Logger(PricingRulesService.name);

  constructor(
    @InjectRepository(PricingRule)
    private readonly rules: Repository<PricingRule>,
  ) {}

  async onApplicationBootstrap() {
    if (envBoolean('SEED_DEFAULT_PRICING_RULES', false)) {
      await this.ensureDefaults();
    }
  }

  /** Oldest first, so the first rule per key is the one that applies. */
  findActive(): Promise<PricingRule[]> {
    return this.rules.find({
      where: { active: true },
      order: { createdAt: 'ASC', id: 'ASC' },
    });
  }

  /** Seeds the shipped rule set into an empty table. Returns how many rules were created. */
  async ensureDefaults(): Promise<number> {
    if (await this.rules.count()) return 0;

    // One millisecond apart so findActive keeps the file order.
    const seededAt = Date.now();
    const created = await this.rules.save(
      defaultRules.map((rule, index) => {
        if (!isPricingRuleKey(rule.vehicleType)) {
          throw new Error(`Unknown pricing rule key in defaults: ${rule.vehicleType}`);
        }
        return this.rules.create({
          ...rule,
          vehicleType: rule.vehicleType,
          active: true,
          createdAt: new Date(seededAt + index),
        });
      }),
    );

    this.logger.log(`Seeded ${created.length} default pricing rules`);
    return created.length;
  }
}
