import { Dms } from './Dms';
import { direct, inverse } from './geodesic';
import { headingToPoint } from './vector';

/**
 * Immutable latitude/longitude pair in degrees on the WGS84 ellipsoid.
 */
export class LatLon {
  readonly lat: number;

  readonly lon: number;

  constructor(lat: number, lon: number) {
    this.lat = lat;
    this.lon = lon;
  }

  static fromRadians(lat: number, lon: number): LatLon {
    return new LatLon((lat * 180) / Math.PI, (lon * 180) / Math.PI);
  }

  static fromDms(lat: Dms, lon: Dms): LatLon {
    return new LatLon(lat.toDegrees(), lon.toDegrees());
  }

  latitude(): number {
    return this.lat;
  }

  longitude(): number {
    return this.lon;
  }

  toRadians(): [number, number] {
    return [(this.lat * Math.PI) / 180, (this.lon * Math.PI) / 180];
  }

  toDms(): [Dms, Dms] {
    return [Dms.fromDegreesLatitude(this.lat), Dms.fromDegreesLongitude(this.lon)];
  }

  /**
   * Distance in meters to another position
   */
  distance(other: LatLon): number {
    return inverse(this.lat, this.lon, other.lat, other.lon).distance;
  }

  /**
   * Initial bearing in degrees towards another position
   */
  bearing(other: LatLon): number {
    return inverse(this.lat, this.lon, other.lat, other.lon).initialBearing;
  }

  /**
   * Position offset by a distance in meters along a bearing in degrees
   */
  destination(bearing: number, distance: number): LatLon {
    const { latitude, longitude } = direct(this.lat, this.lon, bearing, distance);
    return new LatLon(latitude, longitude);
  }

  /**
   * Offset to another position as [east, north] meters on the local tangent plane
   */
  distanceXy(other: LatLon): [number, number] {
    const { distance, initialBearing } = inverse(this.lat, this.lon, other.lat, other.lon);
    const unit = headingToPoint(initialBearing);
    return [unit.x * distance, unit.y * distance];
  }

  toString(): string {
    const [lat, lon] = this.toDms();
    return `${lat} ${lon}`;
  }
}
