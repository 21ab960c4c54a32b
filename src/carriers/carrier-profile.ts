import { UnprocessableEntityException } from '@nestjs/common';
import type { Carrier } from './entities/carrier.entity';

export class MalformedCoverageError extends UnprocessableEntityException {
  constructor(
    readonly carrierId: string,
    readonly field: 'pickupCountries' | 'deliveryCountries',
    detail: string,
  ) {
    super(`Carrier ${carrierId} has a malformed ${field} set: ${detail}`);
  }
}

export type EquipmentFlags = {
  liftgate: boolean;
  palletJack: boolean;
  gpsTracking: boolean;
  sideLoading: boolean;
  tarp: boolean;
};

/** The read-only view of a carrier that matching works on. */
export type CarrierProfile = {
  id: string;
  latitude: number | null;
  longitude: number | null;
  pickupRadiusKm: number | null;
  ignoreRadius: boolean;
  hasTransporter: boolean;
  hasLkw: boolean;
  lkwLengthCm: number | null;
  lkwWidthCm: number | null;
  lkwHeightCm: number | null;
  equipment: EquipmentFlags;
  pickupCountries: ReadonlySet<string>;
  deliveryCountries: ReadonlySet<string>;
};

const COUNTRY_CODE = /^[A-Z]{2}$/;

export function normalizeCountryCode(value: string | null | undefined): string | null {
  const code = (value ?? '').trim().toUpperCase();
  return code || null;
}

function toCoverageSet(
  carrierId: string,
  field: 'pickupCountries' | 'deliveryCountries',
  raw: unknown,
): ReadonlySet<string> {
  if (raw === null || raw === undefined) return new Set();
  if (!Array.isArray(raw)) {
    throw new MalformedCoverageError(carrierId, field, 'expected a list of country codes');
  }

  const codes = new Set<string>();
  for (const entry of raw) {
    if (typeof entry !== 'string') {
      throw new MalformedCoverageError(carrierId, field, `non-string entry ${JSON.stringify(entry)}`);
    }
    const code = entry.trim().toUpperCase();
    if (!COUNTRY_CODE.test(code)) {
      throw new MalformedCoverageError(carrierId, field, `invalid country code '${entry}'`);
    }
    codes.add(code);
  }
  return codes;
}

export function toCarrierProfile(carrier: Carrier): CarrierProfile {
  return {
    id: carrier.id,
    latitude: carrier.latitude ?? null,
    longitude: carrier.longitude ?? null,
    pickupRadiusKm: carrier.pickupRadiusKm ?? null,
    ignoreRadius: Boolean(carrier.ignoreRadius),
    hasTransporter: Boolean(carrier.hasTransporter),
    hasLkw: Boolean(carrier.hasLkw),
    lkwLengthCm: carrier.lkwLengthCm ?? null,
    lkwWidthCm: carrier.lkwWidthCm ?? null,
    lkwHeightCm: carrier.lkwHeightCm ?? null,
    equipment: {
      liftgate: Boolean(carrier.hasLiftgate),
      palletJack: Boolean(carrier.hasPalletJack),
      gpsTracking: Boolean(carrier.hasGpsTracking),
      sideLoading: Boolean(carrier.hasSideLoading),
      tarp: Boolean(carrier.hasTarp),
    },
    pickupCountries: toCoverageSet(carrier.id, 'pickupCountries', carrier.pickupCountries),
    deliveryCountries: toCoverageSet(carrier.id, 'deliveryCountries', carrier.deliveryCountries),
  };
}
