import type { CarrierProfile } from '../carriers/carrier-profile';
import { haversine } from './geo.utils';
import {
  MATCHING_FILTERS,
  runMatchingPipeline,
  toMatchCandidate,
  traceMatching,
  type MatchingRequest,
} from './matching-pipeline';

// Pickup in Berlin, delivery in Warsaw.
const PICKUP = { lat: 52.52, lng: 13.405 };
const DELIVERY = { lat: 52.2297, lng: 21.0122 };

function carrier(overrides: Partial<CarrierProfile> = {}): CarrierProfile {
  return {
    id: 'carrier-1',
    latitude: PICKUP.lat,
    longitude: PICKUP.lng,
    pickupRadiusKm: 100,
    ignoreRadius: false,
    hasTransporter: true,
    hasLkw: true,
    lkwLengthCm: null,
    lkwWidthCm: null,
    lkwHeightCm: null,
    equipment: {
      liftgate: false,
      palletJack: false,
      gpsTracking: false,
      sideLoading: false,
      tarp: false,
    },
    pickupCountries: new Set(['DE']),
    deliveryCountries: new Set(['PL']),
    ...overrides,
  };
}

function request(overrides: Partial<MatchingRequest> = {}): MatchingRequest {
  return {
    pickupLatitude: PICKUP.lat,
    pickupLongitude: PICKUP.lng,
    deliveryLatitude: DELIVERY.lat,
    deliveryLongitude: DELIVERY.lng,
    pickupCountry: 'DE',
    deliveryCountry: 'PL',
    vehicleRequirement: 'either',
    cargo: {
      mode: 'packages',
      packages: [],
      dimensions: { lengthCm: null, widthCm: null, heightCm: null },
    },
    requiredEquipment: {
      liftgate: false,
      palletJack: false,
      gpsTracking: false,
      sideLoading: false,
      tarp: false,
    },
    ...overrides,
  };
}

const ids = (carriers: Array<{ id: string } | { carrierId: string }>) =>
  carriers.map((c) => ('id' in c ? c.id : c.carrierId));

describe('matching pipeline', () => {
  it('applies the filters in a fixed order', () => {
    expect(MATCHING_FILTERS.map((f) => f.name)).toEqual([
      'vehicle_type',
      'coverage',
      'radius',
      'capacity',
      'equipment',
    ]);
  });

  it('returns an empty list for an empty pool', () => {
    const trace = traceMatching(request({ vehicleRequirement: 'lkw' }), []);
    expect(trace.candidates).toEqual([]);
    expect(trace.stages.every((s) => s.survivors.length === 0)).toBe(true);
  });

  describe('vehicle type', () => {
    it('keeps only LKW carriers when an LKW is required', () => {
      const pool = [
        carrier({ id: 'van-only', hasLkw: false }),
        carrier({ id: 'truck', hasLkw: true }),
      ];
      expect(ids(runMatchingPipeline(request({ vehicleRequirement: 'lkw' }), pool))).toEqual([
        'truck',
      ]);
    });

    it('keeps only transporter carriers when a transporter is required', () => {
      const pool = [
        carrier({ id: 'van', hasTransporter: true, hasLkw: false }),
        carrier({ id: 'truck', hasTransporter: false, hasLkw: true }),
      ];
      expect(
        ids(runMatchingPipeline(request({ vehicleRequirement: 'transporter' }), pool)),
      ).toEqual(['van']);
    });

    it('keeps everyone for either or no requirement', () => {
      const pool = [
        carrier({ id: 'van', hasLkw: false }),
        carrier({ id: 'truck', hasTransporter: false }),
      ];
      expect(runMatchingPipeline(request({ vehicleRequirement: 'either' }), pool)).toHaveLength(2);
      expect(runMatchingPipeline(request({ vehicleRequirement: null }), pool)).toHaveLength(2);
    });
  });

  describe('coverage', () => {
    it('requires both the pickup and the delivery country', () => {
      const pool = [
        carrier({
          id: 'A',
          pickupCountries: new Set(['DE', 'AT']),
          deliveryCountries: new Set(['DE', 'PL']),
        }),
        carrier({
          id: 'B',
          pickupCountries: new Set(['DE']),
          deliveryCountries: new Set(['DE', 'AT']),
        }),
      ];
      expect(ids(runMatchingPipeline(request(), pool))).toEqual(['A']);
    });

    it('is a no-op when either request country is unknown', () => {
      const pool = [
        carrier({ id: 'nowhere', pickupCountries: new Set(), deliveryCountries: new Set() }),
      ];
      expect(runMatchingPipeline(request({ deliveryCountry: null }), pool)).toHaveLength(1);
    });

    it('excludes carriers with empty coverage when it applies', () => {
      const pool = [
        carrier({ id: 'nowhere', pickupCountries: new Set(), deliveryCountries: new Set() }),
      ];
      expect(runMatchingPipeline(request(), pool)).toEqual([]);
    });
  });

  describe('radius', () => {
    it('keeps a far-away carrier that ignores its radius', () => {
      // ~600 km south of Berlin.
      const far = carrier({
        id: 'far',
        latitude: 47.12,
        longitude: 13.405,
        pickupRadiusKm: 100,
        ignoreRadius: true,
      });
      const [match] = runMatchingPipeline(request(), [far]);
      expect(match.carrierId).toBe('far');
      expect(match.inRadius).toBe(true);
      expect(match.distanceToPickupKm).toBeGreaterThan(590);
    });

    it('drops a carrier outside its radius', () => {
      const far = carrier({ id: 'far', latitude: 47.12, longitude: 13.405 });
      expect(runMatchingPipeline(request(), [far])).toEqual([]);
    });

    it('drops carriers without a location or radius', () => {
      const pool = [
        carrier({ id: 'no-location', latitude: null }),
        carrier({ id: 'no-radius', pickupRadiusKm: null }),
      ];
      expect(runMatchingPipeline(request(), pool)).toEqual([]);
    });

    it('passes everyone when the pickup point is unknown', () => {
      const pool = [
        carrier({ id: 'no-location', latitude: null, longitude: null }),
        carrier({ id: 'far', latitude: 47.12, longitude: 13.405 }),
      ];
      const matches = runMatchingPipeline(
        request({ pickupLatitude: null, pickupLongitude: null }),
        pool,
      );
      expect(ids(matches)).toEqual(['no-location', 'far']);
      expect(matches.map((m) => m.inRadius)).toEqual([false, false]);
      expect(matches.map((m) => m.distanceToPickupKm)).toEqual([null, null]);
    });

    it('counts a carrier exactly on its radius as inside', () => {
      const latitude = PICKUP.lat + 1;
      const exact = haversine(latitude, PICKUP.lng, PICKUP.lat, PICKUP.lng);
      const edge = carrier({ id: 'edge', latitude, pickupRadiusKm: exact });
      expect(runMatchingPipeline(request(), [edge])).toHaveLength(1);
    });
  });

  describe('capacity', () => {
    const lkwRequest = request({
      vehicleRequirement: 'lkw',
      cargo: {
        mode: 'packages',
        packages: [],
        dimensions: { lengthCm: 600, widthCm: 240, heightCm: 250 },
      },
    });

    it('lets carriers with unknown box dimensions through', () => {
      expect(runMatchingPipeline(lkwRequest, [carrier({ id: 'unknown-box' })])).toHaveLength(1);
    });

    it('checks each known dimension independently', () => {
      const pool = [
        carrier({ id: 'big', lkwLengthCm: 720, lkwWidthCm: 245, lkwHeightCm: 260 }),
        carrier({ id: 'short', lkwLengthCm: 590 }),
        carrier({ id: 'low', lkwLengthCm: 720, lkwHeightCm: 200 }),
        carrier({ id: 'exact', lkwLengthCm: 600, lkwWidthCm: 240, lkwHeightCm: 250 }),
      ];
      expect(ids(runMatchingPipeline(lkwRequest, pool))).toEqual(['big', 'exact']);
    });

    it('ignores dimensions the request does not specify', () => {
      const onlyLength = request({
        vehicleRequirement: 'lkw',
        cargo: {
          mode: 'packages',
          packages: [],
          dimensions: { lengthCm: 400, widthCm: null, heightCm: null },
        },
      });
      const narrow = carrier({ id: 'narrow', lkwLengthCm: 500, lkwWidthCm: 10, lkwHeightCm: 10 });
      expect(runMatchingPipeline(onlyLength, [narrow])).toHaveLength(1);
    });

    it('does not apply to transporter requests or other shipping modes', () => {
      const tiny = carrier({ id: 'tiny', lkwLengthCm: 10, lkwWidthCm: 10, lkwHeightCm: 10 });
      const transporter = request({
        vehicleRequirement: 'transporter',
        cargo: lkwRequest.cargo,
      });
      const loadingMeters = request({
        vehicleRequirement: 'lkw',
        cargo: { mode: 'loading_meters', loadingMeters: 6, heightCm: 250, weightKg: 5000 },
      });
      expect(runMatchingPipeline(transporter, [tiny])).toHaveLength(1);
      expect(runMatchingPipeline(loadingMeters, [tiny])).toHaveLength(1);
    });
  });

  describe('equipment', () => {
    it('excludes a carrier missing one required item', () => {
      const needs = request({
        requiredEquipment: {
          liftgate: true,
          palletJack: true,
          gpsTracking: true,
          sideLoading: false,
          tarp: false,
        },
      });
      const pool = [
        carrier({
          id: 'complete',
          equipment: {
            liftgate: true,
            palletJack: true,
            gpsTracking: true,
            sideLoading: false,
            tarp: false,
          },
        }),
        carrier({
          id: 'no-gps',
          equipment: {
            liftgate: true,
            palletJack: true,
            gpsTracking: false,
            sideLoading: true,
            tarp: true,
          },
        }),
      ];
      expect(ids(runMatchingPipeline(needs, pool))).toEqual(['complete']);
    });

    it('accepts extra equipment that was not asked for', () => {
      const equipped = carrier({
        id: 'equipped',
        equipment: {
          liftgate: true,
          palletJack: true,
          gpsTracking: true,
          sideLoading: true,
          tarp: true,
        },
      });
      expect(runMatchingPipeline(request(), [equipped])).toHaveLength(1);
    });
  });

  it('narrows monotonically from stage to stage', () => {
    const pool = [
      carrier({ id: 'ok' }),
      carrier({ id: 'no-lkw', hasLkw: false }),
      carrier({ id: 'wrong-country', deliveryCountries: new Set(['FR']) }),
      carrier({ id: 'far', latitude: 47.12 }),
      carrier({ id: 'small', lkwHeightCm: 100 }),
      carrier({ id: 'no-tarp' }),
    ];
    const trace = traceMatching(
      request({
        vehicleRequirement: 'lkw',
        cargo: {
          mode: 'packages',
          packages: [],
          dimensions: { lengthCm: null, widthCm: null, heightCm: 200 },
        },
        requiredEquipment: {
          liftgate: false,
          palletJack: false,
          gpsTracking: false,
          sideLoading: false,
          tarp: true,
        },
      }),
      pool.map((c) =>
        c.id === 'no-tarp' ? c : { ...c, equipment: { ...c.equipment, tarp: true } },
      ),
    );

    expect(trace.stages.map((s) => ids(s.survivors))).toEqual([
      ['ok', 'wrong-country', 'far', 'small', 'no-tarp'],
      ['ok', 'far', 'small', 'no-tarp'],
      ['ok', 'small', 'no-tarp'],
      ['ok', 'no-tarp'],
      ['ok'],
    ]);

    let previous = new Set(pool.map((c) => c.id));
    for (const stage of trace.stages) {
      const current = new Set(ids(stage.survivors));
      current.forEach((id) => expect(previous.has(id)).toBe(true));
      previous = current;
    }
  });

  describe('match candidates', () => {
    it('rounds both distances to two decimals', () => {
      const near = carrier({ latitude: 52.4, longitude: 13.1 });
      const match = toMatchCandidate(near, request());
      expect(match.distanceToPickupKm).toBe(Math.round((match.distanceToPickupKm ?? 0) * 100) / 100);
      expect(match.distanceToDeliveryKm).toBeGreaterThan(500);
      expect(match.inRadius).toBe(true);
    });

    it('leaves both distances empty when the delivery point is unknown', () => {
      const match = toMatchCandidate(
        carrier(),
        request({ deliveryLatitude: null, deliveryLongitude: null }),
      );
      expect(match.distanceToPickupKm).toBeNull();
      expect(match.distanceToDeliveryKm).toBeNull();
      expect(match.inRadius).toBe(true);
    });

    it('reports in_radius false when no determination is possible', () => {
      const match = toMatchCandidate(carrier({ pickupRadiusKm: null }), request());
      expect(match.inRadius).toBe(false);
    });
  });
});
