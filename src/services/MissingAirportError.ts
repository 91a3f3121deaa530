import type { LatLon } from '../lib/geo';

export class MissingAirportError extends Error {
  public readonly milestone: 'departure' | 'arrival';

  public readonly position: LatLon;

  constructor(milestone: 'departure' | 'arrival', position: LatLon) {
    super(`No ${milestone} airport contains position ${position.toString()}`);
    this.name = 'MissingAirportError';
    this.milestone = milestone;
    this.position = position;
    Object.setPrototypeOf(this, MissingAirportError.prototype);
  }
}
