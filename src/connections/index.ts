import path from 'path';
import type { SimChoice, SimConnection } from '../types/aircraft.types';
import type { SimConfig } from '../types/config.types';
import MsfsConnection from './MsfsConnection';
import XplaneConnection from './XplaneConnection';
import type { NativeTelemetryApi } from './nativeTelemetry.types';

export class SimBindingError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SimBindingError';
    Object.setPrototypeOf(this, SimBindingError.prototype);
  }
}

const API_METHODS = [
  'connect',
  'addDataDefinition',
  'requestDataOnUserObject',
  'getNextDispatch',
  'close',
] as const;

export function isNativeTelemetryApi(value: unknown): value is NativeTelemetryApi {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  return API_METHODS.every((method) => typeof Reflect.get(value, method) === 'function');
}

/**
 * Load the native SDK binding. The module must export createNativeTelemetryApi().
 */
export async function loadNativeBinding(modulePath: string | undefined): Promise<NativeTelemetryApi> {
  if (!modulePath) {
    throw new SimBindingError('MSFS requires MSFS_BINDING_MODULE to point at a native SDK binding');
  }

  const resolved = path.resolve(modulePath);
  let loaded: unknown;
  try {
    loaded = await import(resolved);
  } catch (error) {
    throw new SimBindingError(`Unable to load MSFS binding ${resolved}: ${(error as Error).message}`);
  }

  const factory: unknown = typeof loaded === 'object' && loaded !== null
    ? Reflect.get(loaded, 'createNativeTelemetryApi')
    : undefined;
  if (typeof factory !== 'function') {
    throw new SimBindingError(`${resolved} does not export createNativeTelemetryApi()`);
  }

  const api: unknown = await factory();
  if (!isNativeTelemetryApi(api)) {
    throw new SimBindingError(`${resolved} returned an incomplete telemetry API`);
  }
  return api;
}

export async function createSimConnection(choice: SimChoice, simConfig: SimConfig): Promise<SimConnection> {
  switch (choice) {
    case 'XP12':
      return new XplaneConnection(simConfig.xplane);
    case 'MSFS':
    default:
      return new MsfsConnection(await loadNativeBinding(simConfig.msfs.bindingModule), simConfig.msfs);
  }
}

export { MsfsConnection, XplaneConnection };
export { RawSimDataError, decodeRawSimData } from './rawSimData';
export type { NativeDispatch, NativeTelemetryApi } from './nativeTelemetry.types';
