import { RAW_SIM_DATA_LAYOUT, RAW_SIM_DATA_SIZE } from '../../rawSimData';

export interface RawRecordFields {
  title: string;
  atcId: string;
  engines: number[];
  latitudeRadians: number;
  longitudeRadians: number;
  onGround: number;
}

export function rawRecord(fields: RawRecordFields): Buffer {
  const buffer = Buffer.alloc(RAW_SIM_DATA_SIZE);
  buffer.write(fields.title, RAW_SIM_DATA_LAYOUT.title, 'utf8');
  fields.engines.forEach((value, engine) => {
    buffer.writeDoubleLE(value, RAW_SIM_DATA_LAYOUT.engineCombustion + engine * 8);
  });
  buffer.writeDoubleLE(fields.latitudeRadians, RAW_SIM_DATA_LAYOUT.latitude);
  buffer.writeDoubleLE(fields.longitudeRadians, RAW_SIM_DATA_LAYOUT.longitude);
  buffer.writeDoubleLE(fields.onGround, RAW_SIM_DATA_LAYOUT.onGround);
  buffer.write(fields.atcId, RAW_SIM_DATA_LAYOUT.atcId, 'utf8');
  return buffer;
}
