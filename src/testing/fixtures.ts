import { Carrier } from '../carriers/entities/carrier.entity';
import { CarrierRequest } from '../carrier-requests/entities/carrier-request.entity';
import { PricingRule } from '../pricing/entities/pricing-rule.entity';
import { TransportRequest } from '../transport-requests/entities/transport-request.entity';

export const BERLIN = { lat: 52.52, lng: 13.405 };
export const WARSAW = { lat: 52.2297, lng: 21.0122 };

let sequence = 0;

/** Distinct, increasing creation times so ordered queries are deterministic. */
function nextCreatedAt(): Date {
  sequence += 1;
  return new Date(Date.UTC(2026, 0, 1, 0, 0, sequence));
}

export function buildCarrier(overrides: Partial<Carrier> = {}): Carrier {
  return Object.assign(new Carrier(), {
    companyName: 'Spedition Nord',
    contactEmail: 'dispatch@nord.test',
    contactPhone: null,
    language: 'de',
    country: 'DE',
    address: null,
    latitude: BERLIN.lat,
    longitude: BERLIN.lng,
    pickupRadiusKm: 150,
    ignoreRadius: false,
    hasTransporter: true,
    hasLkw: true,
    lkwLengthCm: null,
    lkwWidthCm: null,
    lkwHeightCm: null,
    hasLiftgate: false,
    hasPalletJack: false,
    hasGpsTracking: false,
    hasSideLoading: false,
    hasTarp: false,
    pickupCountries: ['DE'],
    deliveryCountries: ['PL'],
    active: true,
    blacklisted: false,
    notes: null,
    createdAt: nextCreatedAt(),
    ...overrides,
  });
}

export function buildTransportRequest(
  overrides: Partial<TransportRequest> = {},
): TransportRequest {
  return Object.assign(new TransportRequest(), {
    status: 'new',
    startAddress: 'Alexanderplatz 1, Berlin',
    startCountry: 'DE',
    startLatitude: BERLIN.lat,
    startLongitude: BERLIN.lng,
    destinationAddress: 'Plac Defilad 1, Warszawa',
    destinationCountry: 'PL',
    destinationLatitude: WARSAW.lat,
    destinationLongitude: WARSAW.lng,
    distanceKm: 575,
    pickupDateFrom: new Date('2026-10-21T08:00:00Z'),
    pickupDateTo: null,
    deliveryDateFrom: null,
    deliveryDateTo: null,
    vehicleType: 'either',
    shippingMode: 'packages',
    cargoLengthCm: null,
    cargoWidthCm: null,
    cargoHeightCm: null,
    cargoWeightKg: null,
    loadingMeters: null,
    totalHeightCm: null,
    totalWeightKg: null,
    vehicleBookingType: null,
    requiresLiftgate: false,
    requiresPalletJack: false,
    requiresGpsTracking: false,
    requiresSideLoading: false,
    requiresTarp: false,
    driverLanguage: null,
    matchedCarrierId: null,
    createdAt: nextCreatedAt(),
    ...overrides,
  });
}

export function buildCarrierRequest(
  overrides: Partial<CarrierRequest> & Pick<CarrierRequest, 'transportRequestId' | 'carrierId'>,
): CarrierRequest {
  return Object.assign(new CarrierRequest(), {
    status: 'new',
    distanceToPickupKm: 12.5,
    distanceToDeliveryKm: 560.25,
    inRadius: true,
    emailSentAt: null,
    responseDate: null,
    offeredPrice: null,
    offeredDeliveryDate: null,
    transportType: null,
    vehicleType: null,
    driverLanguage: null,
    notes: null,
    createdAt: nextCreatedAt(),
    ...overrides,
  });
}

export function buildPricingRule(overrides: Partial<PricingRule> = {}): PricingRule {
  return Object.assign(new PricingRule(), {
    vehicleType: 'transporter',
    name: 'Transporter',
    ratePerKm: 1.2,
    minimumPrice: 80,
    weekendSurchargePercent: 15,
    expressSurchargePercent: 25,
    active: true,
    createdAt: nextCreatedAt(),
    ...overrides,
  });
}
