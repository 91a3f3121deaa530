#!/usr/bin/env node
import config from './config';
import { createSimConnection } from './connections';
import AirportRepository from './repositories/AirportRepository';
import { closeConnections, getConnection } from './repositories/DatabaseConnection';
import { simChoiceSchema } from './schemas/config.schemas';
import FlightRecorder from './services/FlightRecorder';
import FlightTracker from './services/FlightTracker';
import LogbookService from './services/LogbookService';
import { SIM_CHOICES } from './types/aircraft.types';
import type { SimConnection } from './types/aircraft.types';
import logger from './utils/logger';

export const USAGE = `USAGE: sim-logbook <${SIM_CHOICES.join('|')}>`;

let recorder: FlightRecorder | null = null;
let connection: SimConnection | null = null;

export async function stopFlightRecorder(): Promise<void> {
  if (recorder) {
    recorder.stop();
  }
  if (connection) {
    try {
      await connection.close();
    } catch (error) {
      logger.warn('Error closing simulator connection', { error: (error as Error).message });
    }
    connection = null;
  }
  await closeConnections();
}

export default async function startFlightRecorder(args: string[]): Promise<number> {
  const choice = simChoiceSchema.safeParse(args[0]);
  if (!choice.success) {
    logger.error(USAGE, { received: args[0] ?? null });
    return 2;
  }
  const sim = choice.data;

  const database = getConnection(sim);
  await database.initConnection();
  const airports = new AirportRepository(database.getDb());
  if (config.database.spatialIndexBootstrap) {
    await airports.ensureSpatialIndex();
  }

  const logbook = new LogbookService(config.logbook.path);
  await logbook.initialize();

  connection = await createSimConnection(sim, config.sim);
  await connection.open();

  recorder = new FlightRecorder({
    connection,
    airports,
    logbook,
    tracker: new FlightTracker(config.tracking),
  });

  logger.info('Starting flight recorder', {
    sim,
    logbook: config.logbook.path,
    missingAirportPolicy: config.tracking.missingAirportPolicy,
  });
  await recorder.run();
  await stopFlightRecorder();
  return 0;
}

if (require.main === module) {
  const shutdown = async (signal: string) => {
    logger.info(`Received ${signal}, shutting down flight recorder`);
    await stopFlightRecorder();
    process.exit(0);
  };
  const onSignal = (signal: string) => {
    shutdown(signal).catch((error: Error) => {
      logger.error('Error during shutdown', { error: error.message });
      process.exit(1);
    });
  };
  process.on('SIGINT', () => onSignal('SIGINT'));
  process.on('SIGTERM', () => onSignal('SIGTERM'));

  startFlightRecorder(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch(async (error: Error) => {
      logger.error('Fatal error in flight recorder', { error: error.message, stack: error.stack });
      await stopFlightRecorder();
      process.exit(1);
    });
}
