import type { Aircraft } from '../types/aircraft.types';
import type { Airport } from '../types/navdata.types';
import { FlightState } from '../types/flight.types';
import type { AirportMilestone, Flight, MissingAirportPolicy } from '../types/flight.types';
import logger from '../utils/logger';
import { MissingAirportError } from './MissingAirportError';

export interface FlightTrackerOptions {
  missingAirportPolicy: MissingAirportPolicy;
  resetOnAircraftChange: boolean;
}

type AirportResolution =
  | { resolved: true; airport: Airport | null }
  | { resolved: false };

export const anyEngineOn = (aircraft: Aircraft): boolean => aircraft.enginesOn.some(Boolean);

export const sameAircraft = (a: Aircraft, b: Aircraft): boolean => a.title === b.title
  && a.icao === b.icao
  && a.registration === b.registration;

/**
 * Flight lifecycle state machine.
 *
 * Holds at most one flight. Each telemetry sample applies at most one
 * transition, chosen by the current state:
 *
 *   Preflight -> Taxi       any engine running
 *   Taxi      -> EnRoute    left the ground (departure airport recorded)
 *   EnRoute   -> Landed     touched down (arrival airport recorded)
 *   Landed    -> EnRoute    left the ground again (touch and go)
 *   Landed    -> Complete   all engines off on the ground
 *
 * A flight that reaches Complete is returned from update() and the slot is cleared.
 */
class FlightTracker {
  private current: Flight | null = null;

  private readonly options: FlightTrackerOptions;

  constructor(options: FlightTrackerOptions) {
    this.options = options;
  }

  get currentFlight(): Flight | null {
    return this.current;
  }

  /**
   * Apply one telemetry sample. `airport` is the airport containing the
   * sample's position, if any. Returns the flight when it completes.
   */
  update(aircraft: Aircraft, airport: Airport | null, now: Date): Flight | null {
    if (this.current && this.options.resetOnAircraftChange && !sameAircraft(this.current.aircraft, aircraft)) {
      logger.info('Aircraft changed mid-flight, discarding flight in progress', {
        previous: this.current.aircraft.title,
        current: aircraft.title,
        state: this.current.state,
      });
      this.current = null;
    }

    if (!this.current) {
      this.current = FlightTracker.createFlight(aircraft);
      logger.info('Tracking new flight', {
        title: aircraft.title,
        icao: aircraft.icao,
        registration: aircraft.registration,
      });
    }

    const flight = this.current;
    const previous = flight.state;
    this.transition(flight, aircraft, airport, now);

    if (flight.state !== previous) {
      logger.info('Flight state changed', {
        from: previous,
        to: flight.state,
        registration: flight.aircraft.registration,
      });
    }

    if (flight.state === FlightState.Complete) {
      this.current = null;
      return flight;
    }
    return null;
  }

  /**
   * Drop the flight in progress, returning it
   */
  reset(): Flight | null {
    const flight = this.current;
    this.current = null;
    return flight;
  }

  private transition(flight: Flight, aircraft: Aircraft, airport: Airport | null, now: Date): void {
    switch (flight.state) {
      case FlightState.Preflight:
        if (anyEngineOn(aircraft)) {
          flight.taxiOut = now;
          flight.state = FlightState.Taxi;
        }
        break;
      case FlightState.Taxi:
        if (!aircraft.onGround) {
          const milestone = this.milestone('departure', aircraft, airport, now);
          if (milestone) {
            flight.departure = milestone;
            flight.state = FlightState.EnRoute;
          }
        }
        break;
      case FlightState.EnRoute:
        if (aircraft.onGround) {
          const milestone = this.milestone('arrival', aircraft, airport, now);
          if (milestone) {
            flight.arrival = milestone;
            flight.state = FlightState.Landed;
          }
        }
        break;
      case FlightState.Landed:
        if (!aircraft.onGround) {
          // touch and go or go-around; the earlier arrival stays recorded
          flight.state = FlightState.EnRoute;
        } else if (!anyEngineOn(aircraft)) {
          flight.shutdown = now;
          flight.state = FlightState.Complete;
        }
        break;
      case FlightState.Complete:
        break;
      default: {
        const unreachable: never = flight.state;
        throw new Error(`Unknown flight state: ${String(unreachable)}`);
      }
    }
  }

  private milestone(
    kind: 'departure' | 'arrival',
    aircraft: Aircraft,
    airport: Airport | null,
    now: Date,
  ): AirportMilestone | null {
    const resolution = this.resolveAirport(kind, aircraft, airport);
    return resolution.resolved ? { airport: resolution.airport, time: now } : null;
  }

  private resolveAirport(
    kind: 'departure' | 'arrival',
    aircraft: Aircraft,
    airport: Airport | null,
  ): AirportResolution {
    if (airport) {
      return { resolved: true, airport };
    }

    switch (this.options.missingAirportPolicy) {
      case 'fail':
        throw new MissingAirportError(kind, aircraft.position);
      case 'retry':
        logger.warn(`No ${kind} airport found, retrying on the next sample`, {
          position: aircraft.position.toString(),
        });
        return { resolved: false };
      case 'record-unknown':
      default:
        logger.warn(`No ${kind} airport found, recording an unknown airport`, {
          position: aircraft.position.toString(),
        });
        return { resolved: true, airport: null };
    }
  }

  static createFlight(aircraft: Aircraft): Flight {
    return {
      aircraft: { ...aircraft, enginesOn: [...aircraft.enginesOn] },
      state: FlightState.Preflight,
    };
  }
}

export default FlightTracker;
