import MsfsConnection, { USER_AIRCRAFT_DEFINE_ID } from '../MsfsConnection';
import { FakeNativeTelemetryApi } from './fixtures/fakeNativeBinding';
import { rawRecord } from './fixtures/rawRecord';

jest.mock('../../utils/logger', () => ({
  debug: jest.fn(),
  info: jest.fn(),
  warn: jest.fn(),
  error: jest.fn(),
}));

const options = { appName: 'Logbook', pollIntervalMs: 1000 };

const record = rawRecord({
  title: 'Cessna Skyhawk',
  atcId: 'N12345',
  engines: [1, 0, 0, 0],
  latitudeRadians: 0.6,
  longitudeRadians: 0.5,
  onGround: 1,
});

describe('MsfsConnection', () => {
  let api: FakeNativeTelemetryApi;
  let sleep: jest.Mock<Promise<void>, [number]>;
  let connection: MsfsConnection;

  beforeEach(() => {
    api = new FakeNativeTelemetryApi();
    sleep = jest.fn<Promise<void>, [number]>().mockResolvedValue(undefined);
    connection = new MsfsConnection(api, options, sleep);
  });

  it('registers the data definitions and requests user aircraft data on open', async () => {
    await connection.open();

    expect(api.appName).toBe('Logbook');
    expect(api.definitions.map(({ definition }) => definition.name)).toEqual([
      'TITLE',
      'ENG COMBUSTION:1',
      'ENG COMBUSTION:2',
      'ENG COMBUSTION:3',
      'ENG COMBUSTION:4',
      'PLANE LATITUDE',
      'PLANE LONGITUDE',
      'SIM ON GROUND',
      'ATC ID',
    ]);
    expect(api.requests).toEqual([{ requestId: 0, defineId: USER_AIRCRAFT_DEFINE_ID }]);
  });

  it('waits one poll interval when nothing is queued', async () => {
    await expect(connection.nextMessage()).resolves.toEqual({ type: 'waiting' });
    expect(sleep).toHaveBeenCalledWith(1000);
  });

  it('maps dispatches to messages', async () => {
    api.dispatches.push(
      { kind: 'open' },
      { kind: 'simObjectData', defineId: USER_AIRCRAFT_DEFINE_ID, data: record },
      { kind: 'other', id: 'EVENT' },
      { kind: 'quit' },
    );

    await expect(connection.nextMessage()).resolves.toEqual({ type: 'open' });
    const telemetry = await connection.nextMessage();
    expect(telemetry.type).toBe('telemetry');
    if (telemetry.type === 'telemetry') {
      expect(telemetry.aircraft.registration).toBe('N12345');
      expect(telemetry.aircraft.enginesOn).toEqual([true, false, false, false]);
    }
    await expect(connection.nextMessage()).resolves.toEqual({ type: 'unknown', detail: 'unhandled dispatch EVENT' });
    await expect(connection.nextMessage()).resolves.toEqual({ type: 'quit' });
    expect(sleep).not.toHaveBeenCalled();
  });

  it('reports undecodable records as unknown', async () => {
    api.dispatches.push({ kind: 'simObjectData', defineId: USER_AIRCRAFT_DEFINE_ID, data: Buffer.alloc(8) });

    await expect(connection.nextMessage()).resolves.toEqual({
      type: 'unknown',
      detail: 'Expected at least 216 bytes of sim data, received 8',
    });
  });

  it('closes the binding once and then reports quit', async () => {
    await connection.close();
    await connection.close();

    expect(api.closed).toBe(true);
    await expect(connection.nextMessage()).resolves.toEqual({ type: 'quit' });
  });
});
