import { haversine } from './geo.utils';

const BERLIN = { lat: 52.52, lng: 13.405 };
const MUNICH = { lat: 48.1351, lng: 11.582 };
const WARSAW = { lat: 52.2297, lng: 21.0122 };

describe('haversine', () => {
  it('returns zero for identical points', () => {
    expect(haversine(BERLIN.lat, BERLIN.lng, BERLIN.lat, BERLIN.lng)).toBe(0);
  });

  it('is symmetric', () => {
    const there = haversine(BERLIN.lat, BERLIN.lng, WARSAW.lat, WARSAW.lng);
    const back = haversine(WARSAW.lat, WARSAW.lng, BERLIN.lat, BERLIN.lng);
    expect(there).not.toBeNull();
    expect(there).toBeCloseTo(back ?? NaN, 9);
  });

  it('matches the known Berlin to Munich great-circle distance', () => {
    expect(haversine(BERLIN.lat, BERLIN.lng, MUNICH.lat, MUNICH.lng)).toBeCloseTo(504, -1);
  });

  it('measures one degree of latitude as R * pi / 180', () => {
    expect(haversine(0, 0, 1, 0)).toBeCloseTo((6371 * Math.PI) / 180, 9);
  });

  it.each([
    [null, 13.4, 48.1, 11.5],
    [52.5, undefined, 48.1, 11.5],
    [52.5, 13.4, null, 11.5],
    [52.5, 13.4, 48.1, null],
  ])('returns null when a coordinate is missing (%p, %p, %p, %p)', (a, b, c, d) => {
    expect(haversine(a, b, c, d)).toBeNull();
  });

  it('treats zero coordinates as present', () => {
    expect(haversine(0, 0, 0, 0)).toBe(0);
  });
});
