import {
  VEHICLE_BOOKING_CATALOG,
  type ShipmentCargo,
  type VehicleRequirement,
} from '../transport-requests/shipment-cargo';

export const PRICING_RULE_KEYS = [
  'transporter',
  'sprinter',
  'lkw_7_5t',
  'lkw_12t',
  'lkw_18t',
  'lkw_24t',
  'any',
] as const;

export type PricingRuleKey = (typeof PRICING_RULE_KEYS)[number];

export function isPricingRuleKey(value: string): value is PricingRuleKey {
  return PRICING_RULE_KEYS.some((key) => key === value);
}

/**
 * Rule keys to try, most specific first. The catalogue-wide `any` rule is
 * always the last resort.
 */
export function pricingRuleCandidates(
  vehicleRequirement: VehicleRequirement | null,
  cargo: ShipmentCargo,
): PricingRuleKey[] {
  if (cargo.mode === 'vehicle_booking') {
    return [VEHICLE_BOOKING_CATALOG[cargo.vehicleKey].pricingKey, 'any'];
  }

  switch (vehicleRequirement) {
    case 'lkw':
      return ['lkw_7_5t', 'any'];
    case 'transporter':
    case 'either':
    default:
      return ['transporter', 'any'];
  }
}
