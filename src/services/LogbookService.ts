import fs from 'fs';
import Papa from 'papaparse';
import type { AirportMilestone, Flight, FlightSink } from '../types/flight.types';
import logger from '../utils/logger';

export const LOGBOOK_HEADER = [
  'Aircraft Name',
  'Aircraft ICAO',
  'Registration',
  'Taxi Time',
  'Departure ICAO',
  'Departure Time',
  'Arrival ICAO',
  'Arrival Time',
  'Shutdown Time',
] as const;

const NEWLINE = '\r\n';

/**
 * UTC timestamp as `YYYY-MM-DD HH:MM:SS`
 */
export function formatLogbookTime(date: Date): string {
  return date.toISOString().replace('T', ' ').substring(0, 19);
}

const formatTime = (date?: Date): string => (date ? formatLogbookTime(date) : '');
const formatIdent = (milestone?: AirportMilestone): string => milestone?.airport?.ident ?? '';

const toCsvLine = (fields: readonly string[]): string => `${Papa.unparse([[...fields]], { newline: NEWLINE })}${NEWLINE}`;

/**
 * Appends completed flights to a CSV logbook
 */
class LogbookService implements FlightSink {
  private readonly filePath: string;

  private initialized = false;

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  /**
   * Create the logbook with a header row unless it already exists
   */
  async initialize(): Promise<void> {
    if (this.initialized) {
      return;
    }
    try {
      await fs.promises.writeFile(this.filePath, toCsvLine(LOGBOOK_HEADER), { flag: 'wx' });
      logger.info('Created logbook', { path: this.filePath });
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code !== 'EEXIST') {
        throw error;
      }
    }
    this.initialized = true;
  }

  async log(flight: Flight): Promise<void> {
    await this.initialize();
    await fs.promises.appendFile(this.filePath, toCsvLine(LogbookService.toRecord(flight)));
    logger.info('Flight logged', {
      path: this.filePath,
      registration: flight.aircraft.registration,
      departure: formatIdent(flight.departure),
      arrival: formatIdent(flight.arrival),
    });
  }

  static toRecord(flight: Flight): string[] {
    return [
      flight.aircraft.title,
      flight.aircraft.icao,
      flight.aircraft.registration,
      formatTime(flight.taxiOut),
      formatIdent(flight.departure),
      formatTime(flight.departure?.time),
      formatIdent(flight.arrival),
      formatTime(flight.arrival?.time),
      formatTime(flight.shutdown),
    ];
  }
}

export default LogbookService;
