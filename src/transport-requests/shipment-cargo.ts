import type { PackageItem } from './entities/package-item.entity';
import type { TransportRequest } from './entities/transport-request.entity';

export type VehicleRequirement = 'transporter' | 'lkw' | 'either';
export type ShippingMode = 'packages' | 'loading_meters' | 'vehicle_booking';

export const MAX_LOADING_METERS = 13.6;

export const VEHICLE_BOOKING_CATALOG = {
  sprinter: { name: 'Planen-Sprinter', maxWeightKg: 1000, pricingKey: 'sprinter' },
  sprinter_xxl: { name: 'Planensprinter XXL', maxWeightKg: 1100, pricingKey: 'sprinter' },
  lkw_7_5: { name: 'LKW 7,5 to.', maxWeightKg: 2500, pricingKey: 'lkw_7_5t' },
  lkw_12: { name: 'LKW 12 to.', maxWeightKg: 5000, pricingKey: 'lkw_12t' },
  lkw_40: { name: 'LKW 40 to.', maxWeightKg: 24000, pricingKey: 'lkw_24t' },
} as const;

export type VehicleBookingKey = keyof typeof VEHICLE_BOOKING_CATALOG;

export function isVehicleBookingKey(value: string): value is VehicleBookingKey {
  return Object.prototype.hasOwnProperty.call(VEHICLE_BOOKING_CATALOG, value);
}

export type CargoDimensions = {
  lengthCm: number | null;
  widthCm: number | null;
  heightCm: number | null;
};

export type PackageSpec = {
  packageType: string;
  quantity: number;
  lengthCm: number | null;
  widthCm: number | null;
  heightCm: number | null;
  weightKg: number;
};

export type PackagesCargo = {
  mode: 'packages';
  packages: PackageSpec[];
  /** Overall cargo envelope, used by the LKW capacity check. */
  dimensions: CargoDimensions;
};

export type LoadingMetersCargo = {
  mode: 'loading_meters';
  loadingMeters: number;
  heightCm: number | null;
  weightKg: number | null;
};

export type VehicleBookingCargo = {
  mode: 'vehicle_booking';
  vehicleKey: VehicleBookingKey;
};

export type ShipmentCargo = PackagesCargo | LoadingMetersCargo | VehicleBookingCargo;

export type CargoParseResult =
  | { status: 'ok'; cargo: ShipmentCargo }
  | { status: 'invalid'; errors: string[] };

function positiveOrNull(value: number | null, label: string, errors: string[]) {
  if (value === null || value === undefined) return null;
  if (!Number.isFinite(value) || value <= 0) {
    errors.push(`${label} must be greater than 0`);
    return null;
  }
  return value;
}

function toPackageSpec(item: PackageItem, index: number, errors: string[]): PackageSpec {
  const label = `Package ${index + 1}`;
  if (!item.packageType?.trim()) errors.push(`${label}: package type is required`);
  if (!Number.isInteger(item.quantity) || item.quantity <= 0) {
    errors.push(`${label}: quantity must be a whole number greater than 0`);
  }
  if (!Number.isFinite(item.weightKg) || item.weightKg <= 0) {
    errors.push(`${label}: weight must be greater than 0`);
  }

  return {
    packageType: item.packageType,
    quantity: item.quantity,
    lengthCm: positiveOrNull(item.lengthCm, `${label}: length`, errors),
    widthCm: positiveOrNull(item.widthCm, `${label}: width`, errors),
    heightCm: positiveOrNull(item.heightCm, `${label}: height`, errors),
    weightKg: item.weightKg,
  };
}

/**
 * Builds the cargo description for a request row. Rows whose fields do not
 * fit their shipping mode are reported as invalid instead of being coerced.
 */
export function toShipmentCargo(
  request: TransportRequest,
  packageItems: PackageItem[] = [],
): CargoParseResult {
  const errors: string[] = [];
  const mode = request.shippingMode ?? 'packages';

  if (mode !== 'packages' && packageItems.length > 0) {
    errors.push(`Package items are only allowed in packages mode (got ${mode})`);
  }
  if (mode !== 'loading_meters' && request.loadingMeters !== null && request.loadingMeters !== undefined) {
    errors.push(`Loading meters are only allowed in loading_meters mode (got ${mode})`);
  }
  if (mode !== 'vehicle_booking' && request.vehicleBookingType) {
    errors.push(`A vehicle booking type is only allowed in vehicle_booking mode (got ${mode})`);
  }

  let cargo: ShipmentCargo | null = null;

  switch (mode) {
    case 'packages': {
      const packages = packageItems.map((item, i) => toPackageSpec(item, i, errors));
      cargo = {
        mode,
        packages,
        dimensions: {
          lengthCm: positiveOrNull(request.cargoLengthCm, 'Cargo length', errors),
          widthCm: positiveOrNull(request.cargoWidthCm, 'Cargo width', errors),
          heightCm: positiveOrNull(request.cargoHeightCm, 'Cargo height', errors),
        },
      };
      break;
    }
    case 'loading_meters': {
      const lm = request.loadingMeters;
      if (lm === null || lm === undefined) {
        errors.push('Loading meters are required in loading_meters mode');
      } else if (!(lm > 0 && lm <= MAX_LOADING_METERS)) {
        errors.push(`Loading meters must be greater than 0 and at most ${MAX_LOADING_METERS}`);
      } else {
        cargo = {
          mode,
          loadingMeters: lm,
          heightCm: positiveOrNull(request.totalHeightCm, 'Total height', errors),
          weightKg: positiveOrNull(request.totalWeightKg, 'Total weight', errors),
        };
      }
      break;
    }
    case 'vehicle_booking': {
      const key = request.vehicleBookingType;
      if (!key || !isVehicleBookingKey(key)) {
        errors.push(`Unknown vehicle booking type: ${key ?? '(none)'}`);
      } else {
        cargo = { mode, vehicleKey: key };
      }
      break;
    }
    default:
      errors.push(`Unknown shipping mode: ${String(mode)}`);
  }

  if (errors.length || !cargo) {
    return { status: 'invalid', errors: Array.from(new Set(errors)) };
  }
  return { status: 'ok', cargo };
}

export function totalPackageWeightKg(cargo: PackagesCargo): number {
  return cargo.packages.reduce((sum, p) => sum + p.weightKg * p.quantity, 0);
}

export function totalPackageCount(cargo: PackagesCargo): number {
  return cargo.packages.reduce((sum, p) => sum + p.quantity, 0);
}

export function describeCargo(cargo: ShipmentCargo): string {
  switch (cargo.mode) {
    case 'packages': {
      const count = totalPackageCount(cargo);
      if (!count) return 'Packages';
      return `${count} package${count === 1 ? '' : 's'}, ${totalPackageWeightKg(cargo)} kg`;
    }
    case 'loading_meters':
      return `${cargo.loadingMeters} loading meters`;
    case 'vehicle_booking':
      return `Vehicle booking: ${VEHICLE_BOOKING_CATALOG[cargo.vehicleKey].name}`;
  }
}
