import {
  MalformedRecordError,
  decodeSimData,
  decodeSimDataFrame,
  encodeSimData,
  simDataToAircraft,
} from '..';
import type { SimData } from '..';

function buildSimData(overrides: Partial<SimData> = {}): SimData {
  return {
    icao: 'C172',
    name: 'Cessna Skyhawk',
    registration: 'N12345',
    latitude: 34.717778,
    longitude: 32.485556,
    engineOn: true,
    onGround: false,
    ...overrides,
  };
}

describe('SimData codec', () => {
  it('encodes fields in wire order', () => {
    expect(encodeSimData(buildSimData())).toBe(
      'C172,Cessna Skyhawk,N12345,34.717778,32.485556,true,false',
    );
  });

  it('decodes a record', () => {
    expect(decodeSimData('B738,Boeing 737-800,5B-DCX,-33.9461,151.1772,false,true')).toEqual({
      icao: 'B738',
      name: 'Boeing 737-800',
      registration: '5B-DCX',
      latitude: -33.9461,
      longitude: 151.1772,
      engineOn: false,
      onGround: true,
    });
  });

  it.each([
    buildSimData(),
    buildSimData({ latitude: -89.123456789012, longitude: 179.99999999999997 }),
    buildSimData({ latitude: 1e-7, longitude: -0.1, engineOn: false, onGround: true }),
    buildSimData({ icao: '', name: '', registration: '' }),
  ])('round-trips %o', (record) => {
    expect(decodeSimData(encodeSimData(record))).toEqual(record);
  });

  it('ignores a trailing line break and extra fields', () => {
    const decoded = decodeSimData('A320,Airbus A320,D-AXLA,50.1,8.6,true,true,extra\r\n');
    expect(decoded.registration).toBe('D-AXLA');
    expect(decoded.onGround).toBe(true);
  });

  it('rejects records with fewer than seven fields', () => {
    expect(() => decodeSimData('A320,Airbus A320,D-AXLA,50.1,8.6,true'))
      .toThrow(MalformedRecordError);
    expect(() => decodeSimData('')).toThrow('Expected 7 fields, received 1');
  });

  it.each([
    ['non-numeric latitude', 'A320,Airbus,D-AXLA,north,8.6,true,true'],
    ['empty longitude', 'A320,Airbus,D-AXLA,50.1,,true,true'],
    ['capitalised flag', 'A320,Airbus,D-AXLA,50.1,8.6,True,true'],
    ['numeric flag', 'A320,Airbus,D-AXLA,50.1,8.6,true,1'],
  ])('rejects a record with a %s', (_label, csv) => {
    expect(() => decodeSimData(csv)).toThrow(MalformedRecordError);
  });

  it('names the offending field', () => {
    try {
      decodeSimData('A320,Airbus,D-AXLA,50.1,8.6,yes,true');
      throw new Error('expected decode to fail');
    } catch (error) {
      expect(error).toBeInstanceOf(MalformedRecordError);
      expect((error as MalformedRecordError).message).toMatch(/^Invalid field 5:/);
      expect((error as MalformedRecordError).record).toBe('A320,Airbus,D-AXLA,50.1,8.6,yes,true');
    }
  });

  it('refuses to encode text that would break the field layout', () => {
    expect(() => encodeSimData(buildSimData({ name: 'Boeing 737, Max' })))
      .toThrow(MalformedRecordError);
  });

  it('converts to an aircraft with a single engine flag', () => {
    const aircraft = simDataToAircraft(buildSimData());
    expect(aircraft.title).toBe('Cessna Skyhawk');
    expect(aircraft.icao).toBe('C172');
    expect(aircraft.enginesOn).toEqual([true]);
    expect(aircraft.onGround).toBe(false);
    expect(aircraft.position.latitude()).toBe(34.717778);
    expect(aircraft.position.longitude()).toBe(32.485556);
  });

  describe('decodeSimDataFrame', () => {
    it('decodes a UTF-8 payload', () => {
      const payload = Buffer.from('D-EFGH,Zlín Z-242,D-EFGH,50.1,8.6,false,true', 'utf8');

      expect(decodeSimDataFrame(payload).name).toBe('Zlín Z-242');
    });

    it('rejects bytes that are not UTF-8', () => {
      const payload = Buffer.concat([
        Buffer.from('C172,Cessna ', 'utf8'),
        Buffer.from([0xff, 0xfe]),
        Buffer.from(',N12345,34.7,32.4,true,true', 'utf8'),
      ]);

      expect(() => decodeSimDataFrame(payload)).toThrow(new MalformedRecordError('Record is not valid UTF-8', ''));
    });
  });
});
