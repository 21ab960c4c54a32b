export const EARTH_RADIUS_KM = 6371;

type Coordinate = number | null | undefined;

function toRad(deg: number): number {
  return (deg * Math.PI) / 180;
}

/**
 * Great-circle distance between two points using the Haversine formula.
 * Straight-line proximity only; billing distance comes from the request.
 *
 * @returns distance in kilometers, or null when any coordinate is missing
 */
export function haversine(
  lat1: Coordinate,
  lon1: Coordinate,
  lat2: Coordinate,
  lon2: Coordinate,
): number | null {
  if (lat1 == null || lon1 == null || lat2 == null || lon2 == null) {
    return null;
  }

  const dLat = toRad(lat2 - lat1);
  const dLng = toRad(lon2 - lon1);

  const sinDLat = Math.sin(dLat / 2);
  const sinDLng = Math.sin(dLng / 2);

  const a =
    sinDLat * sinDLat +
    Math.cos(toRad(lat1)) * Math.cos(toRad(lat2)) * sinDLng * sinDLng;

  const c = 2 * Math.atan2(Math.sqrt(a), Math.sqrt(1 - a));

  return EARTH_RADIUS_KM * c;
}
