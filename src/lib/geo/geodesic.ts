import { Geodesic } from 'geographiclib-geodesic';

/**
 * Geodesic solutions on the WGS84 ellipsoid. Angles are in degrees, distances in meters.
 * Karney's algorithm converges for every pair of points, antipodes included.
 */

export interface InverseResult {
  distance: number;
  /** Forward azimuth at the start point, degrees clockwise from north in [0, 360) */
  initialBearing: number;
}

export interface DirectResult {
  latitude: number;
  longitude: number;
}

export function normalizeBearing(degrees: number): number {
  const wrapped = degrees % 360;
  return wrapped < 0 ? wrapped + 360 : wrapped;
}

export function inverse(lat1: number, lon1: number, lat2: number, lon2: number): InverseResult {
  const { s12 = 0, azi1 = 0 } = Geodesic.WGS84.Inverse(lat1, lon1, lat2, lon2);
  return { distance: s12, initialBearing: normalizeBearing(azi1) };
}

/**
 * Point reached by travelling `distance` meters from (lat1, lon1) on the given initial bearing.
 * Longitude comes back in [-180, 180].
 */
export function direct(lat1: number, lon1: number, bearing: number, distance: number): DirectResult {
  const { lat2 = lat1, lon2 = lon1 } = Geodesic.WGS84.Direct(lat1, lon1, bearing, distance);
  return { latitude: lat2, longitude: lon2 };
}
