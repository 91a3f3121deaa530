export type Cardinal = 'N' | 'S' | 'E' | 'W';

/**
 * Degrees, minutes and seconds. The cardinal is only set for values
 * created as a latitude or a longitude.
 */
export class Dms {
  readonly degrees: number;

  readonly minutes: number;

  readonly seconds: number;

  readonly cardinal: Cardinal | null;

  constructor(degrees: number, minutes: number, seconds: number, cardinal: Cardinal | null = null) {
    this.degrees = degrees;
    this.minutes = minutes;
    this.seconds = seconds;
    this.cardinal = cardinal;
  }

  static fromDegrees(value: number, cardinal: Cardinal | null = null): Dms {
    const abs = Math.abs(value);
    const degrees = Math.floor(abs);
    const minutes = Math.floor((abs - degrees) * 60);
    const seconds = (abs - degrees - minutes / 60) * 3600;
    return new Dms(degrees, minutes, seconds, cardinal);
  }

  static fromDegreesLatitude(latitude: number): Dms {
    return Dms.fromDegrees(latitude, latitude < 0 ? 'S' : 'N');
  }

  static fromDegreesLongitude(longitude: number): Dms {
    return Dms.fromDegrees(longitude, longitude < 0 ? 'W' : 'E');
  }

  toDegrees(): number {
    const value = this.degrees + this.minutes / 60 + this.seconds / 3600;
    return this.cardinal === 'S' || this.cardinal === 'W' ? -value : value;
  }

  toString(): string {
    return `${this.degrees}°${this.minutes}'${this.seconds.toFixed(2)}"${this.cardinal ?? ''}`;
  }
}
