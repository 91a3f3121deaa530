import fs from 'fs';
import os from 'os';
import path from 'path';
import LogbookService, { LOGBOOK_HEADER, formatLogbookTime } from '../LogbookService';
import { LatLon } from '../../lib/geo';
import { FlightState } from '../../types/flight.types';
import type { Flight } from '../../types/flight.types';

jest.mock('../../utils/logger', () => ({
  debug: jest.fn(),
  info: jest.fn(),
  warn: jest.fn(),
  error: jest.fn(),
}));

const HEADER_LINE = `${LOGBOOK_HEADER.join(',')}\r\n`;

const completedFlight = (): Flight => ({
  aircraft: {
    title: 'Cessna Skyhawk',
    icao: 'C172',
    registration: 'N12345',
    position: new LatLon(34.875, 33.624722),
    enginesOn: [false],
    onGround: true,
  },
  state: FlightState.Complete,
  taxiOut: new Date(Date.UTC(2024, 4, 1, 10, 5, 0)),
  departure: {
    airport: { id: 1, ident: 'LCPH', position: new LatLon(34.717778, 32.485556) },
    time: new Date(Date.UTC(2024, 4, 1, 10, 15, 0)),
  },
  arrival: {
    airport: { id: 2, ident: 'LCLK', position: new LatLon(34.875, 33.624722) },
    time: new Date(Date.UTC(2024, 4, 1, 10, 45, 30)),
  },
  shutdown: new Date(Date.UTC(2024, 4, 1, 10, 50, 0)),
});

describe('LogbookService', () => {
  let dir: string;
  let logbookPath: string;

  beforeEach(async () => {
    dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'logbook-'));
    logbookPath = path.join(dir, 'logbook.csv');
  });

  afterEach(async () => {
    await fs.promises.rm(dir, { recursive: true, force: true });
  });

  it('formats timestamps in UTC without milliseconds', () => {
    expect(formatLogbookTime(new Date(Date.UTC(2024, 0, 2, 3, 4, 5, 678)))).toBe('2024-01-02 03:04:05');
  });

  it('writes the header once and appends flights', async () => {
    const logbook = new LogbookService(logbookPath);
    await logbook.initialize();
    await logbook.log(completedFlight());

    const reopened = new LogbookService(logbookPath);
    await reopened.initialize();
    await reopened.log(completedFlight());

    const row = 'Cessna Skyhawk,C172,N12345,2024-05-01 10:05:00,LCPH,2024-05-01 10:15:00,'
      + 'LCLK,2024-05-01 10:45:30,2024-05-01 10:50:00\r\n';
    expect(await fs.promises.readFile(logbookPath, 'utf8')).toBe(`${HEADER_LINE}${row}${row}`);
  });

  it('leaves unset milestones and unknown airports empty', () => {
    const flight: Flight = {
      ...completedFlight(),
      departure: { airport: null, time: new Date(Date.UTC(2024, 4, 1, 10, 15, 0)) },
      arrival: undefined,
    };

    expect(LogbookService.toRecord(flight)).toEqual([
      'Cessna Skyhawk',
      'C172',
      'N12345',
      '2024-05-01 10:05:00',
      '',
      '2024-05-01 10:15:00',
      '',
      '',
      '2024-05-01 10:50:00',
    ]);
  });

  it('quotes fields that contain commas', async () => {
    const flight = completedFlight();
    flight.aircraft.title = 'Beechcraft Baron, G58';
    const logbook = new LogbookService(logbookPath);
    await logbook.log(flight);

    const lines = (await fs.promises.readFile(logbookPath, 'utf8')).split('\r\n');
    expect(lines[1]?.startsWith('"Beechcraft Baron, G58",C172,')).toBe(true);
  });

  it('propagates write failures other than an existing file', async () => {
    const logbook = new LogbookService(path.join(dir, 'missing', 'logbook.csv'));

    await expect(logbook.initialize()).rejects.toMatchObject({ code: 'ENOENT' });
  });
});
