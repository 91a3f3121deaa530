import type { SimConnection } from '../types/aircraft.types';
import type { FlightSink } from '../types/flight.types';
import type { AirportLookup } from '../types/navdata.types';
import logger from '../utils/logger';
import type FlightTracker from './FlightTracker';

export interface FlightRecorderDependencies {
  connection: SimConnection;
  airports: AirportLookup;
  logbook: FlightSink;
  tracker: FlightTracker;
  clock?: () => Date;
}

/**
 * Drives the tracker from a simulator connection, one message per step,
 * and hands completed flights to the logbook.
 */
class FlightRecorder {
  private readonly connection: SimConnection;

  private readonly airports: AirportLookup;

  private readonly logbook: FlightSink;

  private readonly tracker: FlightTracker;

  private readonly clock: () => Date;

  private running = false;

  private flightsLogged = 0;

  constructor({
    connection,
    airports,
    logbook,
    tracker,
    clock = () => new Date(),
  }: FlightRecorderDependencies) {
    this.connection = connection;
    this.airports = airports;
    this.logbook = logbook;
    this.tracker = tracker;
    this.clock = clock;
  }

  get loggedCount(): number {
    return this.flightsLogged;
  }

  get isRunning(): boolean {
    return this.running;
  }

  /**
   * Handle a single message. Resolves to false once the simulator has quit.
   */
  async step(): Promise<boolean> {
    const message = await this.connection.nextMessage();

    switch (message.type) {
      case 'open':
        logger.info('Simulator session opened', { sim: this.connection.name });
        return true;
      case 'waiting':
        return true;
      case 'unknown':
        logger.debug('Ignoring simulator message', { sim: this.connection.name, detail: message.detail });
        return true;
      case 'telemetry': {
        const { aircraft } = message;
        const airport = await this.airports.findContaining(aircraft.position);
        const completed = this.tracker.update(aircraft, airport, this.clock());
        if (completed) {
          await this.logbook.log(completed);
          this.flightsLogged += 1;
        }
        return true;
      }
      case 'quit':
      default: {
        const dropped = this.tracker.reset();
        if (dropped) {
          logger.warn('Simulator quit before the flight completed', {
            registration: dropped.aircraft.registration,
            state: dropped.state,
          });
        }
        logger.info('Simulator session closed', { sim: this.connection.name });
        await this.connection.close();
        return false;
      }
    }
  }

  async run(): Promise<void> {
    this.running = true;
    logger.info('Flight recorder started', { sim: this.connection.name });
    try {
      while (this.running) {
        if (!(await this.step())) {
          break;
        }
      }
    } finally {
      this.running = false;
      logger.info('Flight recorder stopped', { sim: this.connection.name, flightsLogged: this.flightsLogged });
    }
  }

  /**
   * Stop after the message in flight; connections bound each wait by their timeout
   */
  stop(): void {
    this.running = false;
  }
}

export default FlightRecorder;
