export {
  FIELD_COUNT,
  decodeSimData,
  decodeSimDataFrame,
  encodeSimData,
  simDataToAircraft,
} from './SimData';
export type { SimData } from './SimData';
export { MalformedRecordError } from './MalformedRecordError';
export {
  FrameReader,
  LENGTH_PREFIX_BYTES,
  MAX_FRAME_PAYLOAD,
  encodeFrame,
} from './framing';
