import { TextDecoder } from 'util';
import { LatLon } from '../geo';
import { simDataFieldsSchema } from '../../schemas/simData.schemas';
import type { Aircraft } from '../../types/aircraft.types';
import { MalformedRecordError } from './MalformedRecordError';

export const FIELD_COUNT = 7;

const FORBIDDEN_TEXT = /[,\r\n]/;

const utf8 = new TextDecoder('utf-8', { fatal: true });

/**
 * One telemetry sample as sent by the X-Plane plugin:
 * `icao,name,registration,latitude,longitude,engine_on,on_ground`
 */
export interface SimData {
  icao: string;
  name: string;
  registration: string;
  latitude: number;
  longitude: number;
  engineOn: boolean;
  onGround: boolean;
}

export function decodeSimData(csv: string): SimData {
  const fields = csv.replace(/\r?\n$/, '').split(',');
  if (fields.length < FIELD_COUNT) {
    throw new MalformedRecordError(
      `Expected ${FIELD_COUNT} fields, received ${fields.length}`,
      csv,
    );
  }

  const parsed = simDataFieldsSchema.safeParse(fields);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new MalformedRecordError(
      `Invalid field ${issue?.path.join('.') ?? '?'}: ${issue?.message ?? 'unknown error'}`,
      csv,
    );
  }

  const [icao, name, registration, latitude, longitude, engineOn, onGround] = parsed.data;
  return {
    icao,
    name,
    registration,
    latitude,
    longitude,
    engineOn,
    onGround,
  };
}

/**
 * Decode a frame payload. Bytes that are not valid UTF-8 make the record malformed.
 */
export function decodeSimDataFrame(payload: Buffer): SimData {
  let csv: string;
  try {
    csv = utf8.decode(payload);
  } catch {
    throw new MalformedRecordError('Record is not valid UTF-8', payload.toString('hex'));
  }
  return decodeSimData(csv);
}

export function encodeSimData(data: SimData): string {
  const text = [data.icao, data.name, data.registration];
  if (text.some((value) => FORBIDDEN_TEXT.test(value))) {
    throw new MalformedRecordError('Text fields cannot contain commas or line breaks', text.join('|'));
  }

  return [
    ...text,
    String(data.latitude),
    String(data.longitude),
    String(data.engineOn),
    String(data.onGround),
  ].join(',');
}

export function simDataToAircraft(data: SimData): Aircraft {
  return {
    title: data.name,
    icao: data.icao,
    registration: data.registration,
    position: new LatLon(data.latitude, data.longitude),
    enginesOn: [data.engineOn],
    onGround: data.onGround,
  };
}
