import { formatAmount, formatPercent, fromCents, toCents } from '../common/money';
import type { ShipmentCargo, VehicleRequirement } from '../transport-requests/shipment-cargo';
import { pricingRuleCandidates, type PricingRuleKey } from './pricing-rule-key';

export type LineItemKind = 'base' | 'weekend_surcharge' | 'express_surcharge';

/** The fields of an active pricing rule the calculator reads. */
export type PricingRuleSnapshot = {
  id: string;
  vehicleType: PricingRuleKey;
  ratePerKm: number;
  minimumPrice: number;
  weekendSurchargePercent: number;
  expressSurchargePercent: number;
};

export type PricingInput = {
  distanceKm: number | null;
  pickupDate: Date | null;
  vehicleRequirement: VehicleRequirement | null;
  cargo: ShipmentCargo;
};

export type PricingContext = {
  /** Active rules; the first rule per key wins. */
  rules: readonly PricingRuleSnapshot[];
  now: Date;
  currency: string;
  timeZone: string;
  expressWindowHours: number;
};

export type PricedLineItem = {
  kind: LineItemKind;
  description: string;
  calculation: string;
  amount: number;
  lineOrder: number;
};

export type PricedQuote = {
  rule: PricingRuleSnapshot;
  basePrice: number;
  surchargeTotal: number;
  totalPrice: number;
  currency: string;
  lineItems: PricedLineItem[];
};

export type PricingResult =
  | { status: 'ok'; quote: PricedQuote }
  | { status: 'rejected'; errors: string[] };

type Surcharge = {
  kind: Exclude<LineItemKind, 'base'>;
  description: string;
  percent: (rule: PricingRuleSnapshot) => number;
  applies: (input: PricingInput, context: PricingContext) => boolean;
};

const WEEKEND_DAYS = new Set(['Sat', 'Sun']);

export function isWeekend(date: Date, timeZone: string): boolean {
  const weekday = new Intl.DateTimeFormat('en-US', { weekday: 'short', timeZone }).format(date);
  return WEEKEND_DAYS.has(weekday);
}

/** Pickup is due sooner than the express window from `now`. */
export function isExpress(pickupDate: Date, now: Date, windowHours: number): boolean {
  return pickupDate.getTime() - now.getTime() < windowHours * 60 * 60 * 1000;
}

/** Applied in this order; line numbers follow it. */
export const SURCHARGES: readonly Surcharge[] = [
  {
    kind: 'weekend_surcharge',
    description: 'Weekend surcharge',
    percent: (rule) => rule.weekendSurchargePercent,
    applies: (input, context) =>
      input.pickupDate !== null && isWeekend(input.pickupDate, context.timeZone),
  },
  {
    kind: 'express_surcharge',
    description: 'Express surcharge',
    percent: (rule) => rule.expressSurchargePercent,
    applies: (input, context) =>
      input.pickupDate !== null &&
      isExpress(input.pickupDate, context.now, context.expressWindowHours),
  },
];

export function resolvePricingRule(
  rules: readonly PricingRuleSnapshot[],
  candidates: readonly PricingRuleKey[],
): PricingRuleSnapshot | null {
  for (const key of candidates) {
    const rule = rules.find((r) => r.vehicleType === key);
    if (rule) return rule;
  }
  return null;
}

function validateRule(rule: PricingRuleSnapshot): string[] {
  const errors: string[] = [];
  const fields: Array<[string, number]> = [
    ['rate per km', rule.ratePerKm],
    ['minimum price', rule.minimumPrice],
    ['weekend surcharge', rule.weekendSurchargePercent],
    ['express surcharge', rule.expressSurchargePercent],
  ];
  for (const [label, value] of fields) {
    if (!Number.isFinite(value) || value < 0) {
      errors.push(`Pricing rule ${rule.vehicleType} has an invalid ${label}: ${value}`);
    }
  }
  return errors;
}

/**
 * Prices a request against the active rules. Amounts are worked out in whole
 * cents, so the total is the exact sum of its line items.
 */
export function calculatePrice(input: PricingInput, context: PricingContext): PricingResult {
  const errors: string[] = [];
  const distance = input.distanceKm;

  if (distance === null) {
    errors.push('Distance must be calculated before pricing');
  } else if (!Number.isFinite(distance) || distance < 0) {
    errors.push(`Distance must be a non-negative number (got ${distance})`);
  }

  const candidates = pricingRuleCandidates(input.vehicleRequirement, input.cargo);
  const rule = resolvePricingRule(context.rules, candidates);
  if (!rule) {
    errors.push(`No pricing rule found for vehicle type: ${candidates[0]}`);
  } else {
    errors.push(...validateRule(rule));
  }

  if (errors.length || !rule || distance === null) {
    return { status: 'rejected', errors };
  }

  const byDistanceCents = toCents(distance * rule.ratePerKm);
  const minimumCents = toCents(rule.minimumPrice);
  const minimumApplies = minimumCents > byDistanceCents;
  const baseCents = minimumApplies ? minimumCents : byDistanceCents;

  const lineItems: PricedLineItem[] = [
    {
      kind: 'base',
      description: 'Base transport',
      calculation: minimumApplies
        ? 'Minimum price'
        : `${distance} km × ${formatAmount(rule.ratePerKm)} ${context.currency}/km`,
      amount: fromCents(baseCents),
      lineOrder: 0,
    },
  ];

  let surchargeCents = 0;
  for (const surcharge of SURCHARGES) {
    const percent = surcharge.percent(rule);
    if (percent <= 0 || !surcharge.applies(input, context)) continue;

    const cents = Math.round((baseCents * percent) / 100);
    surchargeCents += cents;
    lineItems.push({
      kind: surcharge.kind,
      description: surcharge.description,
      calculation: `${formatPercent(percent)}% surcharge`,
      amount: fromCents(cents),
      lineOrder: lineItems.length,
    });
  }

  return {
    status: 'ok',
    quote: {
      rule,
      basePrice: fromCents(baseCents),
      surchargeTotal: fromCents(surchargeCents),
      totalPrice: fromCents(baseCents + surchargeCents),
      currency: context.currency,
      lineItems,
    },
  };
}
