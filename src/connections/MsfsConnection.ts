import type { MsfsConfig } from '../types/config.types';
import type { SimConnection, SimMessage } from '../types/aircraft.types';
import logger from '../utils/logger';
import type { NativeTelemetryApi } from './nativeTelemetry.types';
import { RAW_SIM_DATA_DEFINITIONS, RawSimDataError, decodeRawSimData } from './rawSimData';

export const USER_AIRCRAFT_DEFINE_ID = 0;
export const USER_AIRCRAFT_REQUEST_ID = 0;

const delay = (ms: number): Promise<void> => new Promise<void>((resolve) => {
  setTimeout(resolve, ms);
});

/**
 * Polls the native simulator SDK for the user aircraft record
 */
class MsfsConnection implements SimConnection {
  readonly name = 'MSFS';

  private readonly api: NativeTelemetryApi;

  private readonly options: MsfsConfig;

  private readonly sleep: (ms: number) => Promise<void>;

  private closed = false;

  constructor(api: NativeTelemetryApi, options: MsfsConfig, sleep: (ms: number) => Promise<void> = delay) {
    this.api = api;
    this.options = options;
    this.sleep = sleep;
  }

  async open(): Promise<void> {
    await this.api.connect(this.options.appName);
    RAW_SIM_DATA_DEFINITIONS.forEach((definition) => {
      this.api.addDataDefinition(USER_AIRCRAFT_DEFINE_ID, definition);
    });
    this.api.requestDataOnUserObject(USER_AIRCRAFT_REQUEST_ID, USER_AIRCRAFT_DEFINE_ID);
    logger.info('Requested user aircraft data from MSFS', {
      appName: this.options.appName,
      definitions: RAW_SIM_DATA_DEFINITIONS.length,
    });
  }

  async nextMessage(): Promise<SimMessage> {
    if (this.closed) {
      return { type: 'quit' };
    }

    const dispatch = this.api.getNextDispatch();
    if (!dispatch) {
      await this.sleep(this.options.pollIntervalMs);
      return { type: 'waiting' };
    }

    switch (dispatch.kind) {
      case 'open':
        return { type: 'open' };
      case 'quit':
        return { type: 'quit' };
      case 'simObjectData':
        if (dispatch.defineId !== USER_AIRCRAFT_DEFINE_ID) {
          return { type: 'unknown', detail: `sim object data for define ${dispatch.defineId}` };
        }
        try {
          return { type: 'telemetry', aircraft: decodeRawSimData(dispatch.data) };
        } catch (error) {
          if (error instanceof RawSimDataError) {
            return { type: 'unknown', detail: error.message };
          }
          throw error;
        }
      case 'other':
      default:
        return { type: 'unknown', detail: `unhandled dispatch ${dispatch.id}` };
    }
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    await this.api.close();
  }
}

export default MsfsConnection;
