import { TextDecoder } from 'util';
import { LatLon } from '../lib/geo';
import type { Aircraft } from '../types/aircraft.types';
import type { NativeDataDefinition } from './nativeTelemetry.types';

export class RawSimDataError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RawSimDataError';
    Object.setPrototypeOf(this, RawSimDataError.prototype);
  }
}

const TITLE_BYTES = 128;
const ATC_ID_BYTES = 32;
const FLOAT64_BYTES = 8;
const ENGINE_COUNT = 4;

/**
 * Byte offsets of the user aircraft record, fields packed without padding
 */
export const RAW_SIM_DATA_LAYOUT = {
  title: 0,
  engineCombustion: TITLE_BYTES,
  latitude: TITLE_BYTES + ENGINE_COUNT * FLOAT64_BYTES,
  longitude: TITLE_BYTES + (ENGINE_COUNT + 1) * FLOAT64_BYTES,
  onGround: TITLE_BYTES + (ENGINE_COUNT + 2) * FLOAT64_BYTES,
  atcId: TITLE_BYTES + (ENGINE_COUNT + 3) * FLOAT64_BYTES,
} as const;

export const RAW_SIM_DATA_SIZE = RAW_SIM_DATA_LAYOUT.atcId + ATC_ID_BYTES;

/**
 * Data definitions registered with the simulator, in record order
 */
export const RAW_SIM_DATA_DEFINITIONS: readonly NativeDataDefinition[] = [
  { name: 'TITLE', units: '', type: 'string128' },
  { name: 'ENG COMBUSTION:1', units: 'Boolean', type: 'float64' },
  { name: 'ENG COMBUSTION:2', units: 'Boolean', type: 'float64' },
  { name: 'ENG COMBUSTION:3', units: 'Boolean', type: 'float64' },
  { name: 'ENG COMBUSTION:4', units: 'Boolean', type: 'float64' },
  { name: 'PLANE LATITUDE', units: 'Radians', type: 'float64' },
  { name: 'PLANE LONGITUDE', units: 'Radians', type: 'float64' },
  { name: 'SIM ON GROUND', units: 'Boolean', type: 'float64' },
  // may or may not hold the registration, depending on the aircraft
  { name: 'ATC ID', units: '', type: 'string32' },
];

// the simulator does not expose the ICAO type designator
export const UNKNOWN_ICAO = 'N/A';

const utf8 = new TextDecoder('utf-8', { fatal: true });

function readCString(buffer: Buffer, offset: number, size: number, field: string): string {
  const bytes = buffer.subarray(offset, offset + size);
  const end = bytes.indexOf(0);
  if (end === -1) {
    throw new RawSimDataError(`${field} is not NUL-terminated`);
  }
  try {
    return utf8.decode(bytes.subarray(0, end));
  } catch {
    throw new RawSimDataError(`${field} is not valid UTF-8`);
  }
}

/**
 * Decode the fixed-layout user aircraft record field by field
 */
export function decodeRawSimData(buffer: Buffer): Aircraft {
  if (buffer.length < RAW_SIM_DATA_SIZE) {
    throw new RawSimDataError(
      `Expected at least ${RAW_SIM_DATA_SIZE} bytes of sim data, received ${buffer.length}`,
    );
  }

  const enginesOn: boolean[] = [];
  for (let engine = 0; engine < ENGINE_COUNT; engine += 1) {
    const offset = RAW_SIM_DATA_LAYOUT.engineCombustion + engine * FLOAT64_BYTES;
    enginesOn.push(buffer.readDoubleLE(offset) !== 0);
  }

  return {
    title: readCString(buffer, RAW_SIM_DATA_LAYOUT.title, TITLE_BYTES, 'title'),
    icao: UNKNOWN_ICAO,
    registration: readCString(buffer, RAW_SIM_DATA_LAYOUT.atcId, ATC_ID_BYTES, 'ATC id'),
    position: LatLon.fromRadians(
      buffer.readDoubleLE(RAW_SIM_DATA_LAYOUT.latitude),
      buffer.readDoubleLE(RAW_SIM_DATA_LAYOUT.longitude),
    ),
    enginesOn,
    onGround: buffer.readDoubleLE(RAW_SIM_DATA_LAYOUT.onGround) !== 0,
  };
}
