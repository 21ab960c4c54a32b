import { round2 } from '../common/money';
import {
  normalizeCountryCode,
  type CarrierProfile,
  type EquipmentFlags,
} from '../carriers/carrier-profile';
import type { TransportRequest } from '../transport-requests/entities/transport-request.entity';
import type {
  ShipmentCargo,
  VehicleRequirement,
} from '../transport-requests/shipment-cargo';
import { haversine } from './geo.utils';

export type MatchingRequest = {
  pickupLatitude: number | null;
  pickupLongitude: number | null;
  deliveryLatitude: number | null;
  deliveryLongitude: number | null;
  pickupCountry: string | null;
  deliveryCountry: string | null;
  vehicleRequirement: VehicleRequirement | null;
  cargo: ShipmentCargo;
  requiredEquipment: EquipmentFlags;
};

export type MatchCandidate = {
  carrierId: string;
  distanceToPickupKm: number | null;
  distanceToDeliveryKm: number | null;
  inRadius: boolean;
};

export type CarrierFilter = {
  name: string;
  apply(carriers: CarrierProfile[], request: MatchingRequest): CarrierProfile[];
};

export type MatchingTrace = {
  stages: Array<{ name: string; survivors: CarrierProfile[] }>;
  candidates: MatchCandidate[];
};

const EQUIPMENT: ReadonlyArray<keyof EquipmentFlags> = [
  'liftgate',
  'palletJack',
  'gpsTracking',
  'sideLoading',
  'tarp',
];

function hasPickupPoint(request: MatchingRequest): boolean {
  return request.pickupLatitude != null && request.pickupLongitude != null;
}

function distanceToPickup(carrier: CarrierProfile, request: MatchingRequest): number | null {
  return haversine(
    carrier.latitude,
    carrier.longitude,
    request.pickupLatitude,
    request.pickupLongitude,
  );
}

function distanceToDelivery(carrier: CarrierProfile, request: MatchingRequest): number | null {
  return haversine(
    carrier.latitude,
    carrier.longitude,
    request.deliveryLatitude,
    request.deliveryLongitude,
  );
}

export const vehicleTypeFilter: CarrierFilter = {
  name: 'vehicle_type',
  apply(carriers, request) {
    switch (request.vehicleRequirement) {
      case 'transporter':
        return carriers.filter((c) => c.hasTransporter);
      case 'lkw':
        return carriers.filter((c) => c.hasLkw);
      default:
        return carriers;
    }
  },
};

export const coverageFilter: CarrierFilter = {
  name: 'coverage',
  apply(carriers, request) {
    const pickup = request.pickupCountry;
    const delivery = request.deliveryCountry;
    if (!pickup || !delivery) return carriers;

    return carriers.filter(
      (c) => c.pickupCountries.has(pickup) && c.deliveryCountries.has(delivery),
    );
  },
};

export const radiusFilter: CarrierFilter = {
  name: 'radius',
  apply(carriers, request) {
    if (!hasPickupPoint(request)) return carriers;

    return carriers.filter((c) => {
      if (c.ignoreRadius) return true;
      if (c.latitude == null || c.longitude == null || c.pickupRadiusKm == null) {
        return false;
      }
      const distance = distanceToPickup(c, request);
      return distance !== null && distance <= c.pickupRadiusKm;
    });
  },
};

/**
 * Missing carrier dimensions count as adequate: an unsuitable carrier can
 * decline, a carrier never invited cannot offer.
 */
export const capacityFilter: CarrierFilter = {
  name: 'capacity',
  apply(carriers, request) {
    if (request.vehicleRequirement !== 'lkw') return carriers;
    if (request.cargo.mode !== 'packages') return carriers;

    const { lengthCm, widthCm, heightCm } = request.cargo.dimensions;
    if (lengthCm == null && widthCm == null && heightCm == null) return carriers;

    const fits = (needed: number | null, available: number | null) =>
      needed == null || available == null || available >= needed;

    return carriers.filter(
      (c) =>
        c.hasLkw &&
        fits(lengthCm, c.lkwLengthCm) &&
        fits(widthCm, c.lkwWidthCm) &&
        fits(heightCm, c.lkwHeightCm),
    );
  },
};

export const equipmentFilter: CarrierFilter = {
  name: 'equipment',
  apply(carriers, request) {
    const required = EQUIPMENT.filter((key) => request.requiredEquipment[key]);
    if (!required.length) return carriers;

    return carriers.filter((c) => required.every((key) => c.equipment[key]));
  },
};

/** Cheapest and most selective first. */
export const MATCHING_FILTERS: readonly CarrierFilter[] = [
  vehicleTypeFilter,
  coverageFilter,
  radiusFilter,
  capacityFilter,
  equipmentFilter,
];

export function toMatchCandidate(
  carrier: CarrierProfile,
  request: MatchingRequest,
): MatchCandidate {
  const toPickup = distanceToPickup(carrier, request);
  const toDelivery = distanceToDelivery(carrier, request);

  let inRadius = false;
  if (carrier.ignoreRadius) {
    inRadius = true;
  } else if (carrier.pickupRadiusKm != null && toPickup !== null) {
    inRadius = toPickup <= carrier.pickupRadiusKm;
  }

  // Distances are stored as a pair.
  const bothKnown = toPickup !== null && toDelivery !== null;

  return {
    carrierId: carrier.id,
    distanceToPickupKm: bothKnown ? round2(toPickup) : null,
    distanceToDeliveryKm: bothKnown ? round2(toDelivery) : null,
    inRadius,
  };
}

export function traceMatching(
  request: MatchingRequest,
  pool: CarrierProfile[],
  filters: readonly CarrierFilter[] = MATCHING_FILTERS,
): MatchingTrace {
  const stages: MatchingTrace['stages'] = [];
  let carriers = pool;

  for (const filter of filters) {
    carriers = filter.apply(carriers, request);
    stages.push({ name: filter.name, survivors: carriers });
  }

  return {
    stages,
    candidates: carriers.map((c) => toMatchCandidate(c, request)),
  };
}

export function runMatchingPipeline(
  request: MatchingRequest,
  pool: CarrierProfile[],
): MatchCandidate[] {
  return traceMatching(request, pool).candidates;
}

export function toMatchingRequest(
  request: TransportRequest,
  cargo: ShipmentCargo,
): MatchingRequest {
  return {
    pickupLatitude: request.startLatitude ?? null,
    pickupLongitude: request.startLongitude ?? null,
    deliveryLatitude: request.destinationLatitude ?? null,
    deliveryLongitude: request.destinationLongitude ?? null,
    pickupCountry: normalizeCountryCode(request.startCountry),
    deliveryCountry: normalizeCountryCode(request.destinationCountry),
    vehicleRequirement: request.vehicleType ?? null,
    cargo,
    requiredEquipment: {
      liftgate: Boolean(request.requiresLiftgate),
      palletJack: Boolean(request.requiresPalletJack),
      gpsTracking: Boolean(request.requiresGpsTracking),
      sideLoading: Boolean(request.requiresSideLoading),
      tarp: Boolean(request.requiresTarp),
    },
  };
}
