/**
 * Telemetry and simulator connection type definitions
 */
import type { LatLon } from '../lib/geo';

export interface Aircraft {
  title: string;
  icao: string;
  registration: string;
  position: LatLon;
  /** One flag per engine */
  enginesOn: boolean[];
  onGround: boolean;
}

export type SimMessage =
  | { type: 'open' }
  | { type: 'quit' }
  | { type: 'telemetry'; aircraft: Aircraft }
  | { type: 'waiting' }
  | { type: 'unknown'; detail: string };

/**
 * A source of simulator messages. Implementations own their transport and
 * must return from nextMessage() within their configured timeout.
 */
export interface SimConnection {
  readonly name: string;
  open(): Promise<void>;
  nextMessage(): Promise<SimMessage>;
  close(): Promise<void>;
}

export const SIM_CHOICES = ['MSFS', 'XP12'] as const;
export type SimChoice = typeof SIM_CHOICES[number];
