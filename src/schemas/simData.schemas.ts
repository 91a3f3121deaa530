import { z } from 'zod';

// decimal literal as written by the producers, e.g. "-12.5", "34", "1e-7"
const FLOAT_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

export const floatFieldSchema = z
  .string()
  .regex(FLOAT_PATTERN, 'expected a decimal number')
  .transform((value) => Number(value));

export const boolFieldSchema = z
  .enum(['true', 'false'])
  .transform((value) => value === 'true');

export const simDataFieldsSchema = z
  .tuple([
    z.string(), // icao
    z.string(), // name
    z.string(), // registration
    floatFieldSchema, // latitude
    floatFieldSchema, // longitude
    boolFieldSchema, // engine_on
    boolFieldSchema, // on_ground
  ])
  .rest(z.string());

export type SimDataFields = z.infer<typeof simDataFieldsSchema>;
