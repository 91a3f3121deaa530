import type { Aircraft } from './aircraft.types';
import type { Airport } from './navdata.types';

export enum FlightState {
  Preflight = 'preflight',
  Taxi = 'taxi',
  EnRoute = 'en_route',
  Landed = 'landed',
  Complete = 'complete',
}

export interface AirportMilestone {
  /** null when no airport contained the position under the record-unknown policy */
  airport: Airport | null;
  time: Date;
}

export interface Flight {
  aircraft: Aircraft;
  state: FlightState;
  taxiOut?: Date;
  departure?: AirportMilestone;
  arrival?: AirportMilestone;
  shutdown?: Date;
}

export const MISSING_AIRPORT_POLICIES = ['record-unknown', 'retry', 'fail'] as const;
export type MissingAirportPolicy = typeof MISSING_AIRPORT_POLICIES[number];

/**
 * Destination for completed flights
 */
export interface FlightSink {
  log(flight: Flight): Promise<void>;
}
