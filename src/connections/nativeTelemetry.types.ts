/**
 * Contract for a native simulator SDK binding. The binding itself lives
 * outside this project and is loaded from MSFS_BINDING_MODULE.
 */

export type NativeDataType = 'string128' | 'string32' | 'float64';

export interface NativeDataDefinition {
  name: string;
  units: string;
  type: NativeDataType;
}

export type NativeDispatch =
  | { kind: 'open' }
  | { kind: 'quit' }
  | { kind: 'simObjectData'; defineId: number; data: Buffer }
  | { kind: 'other'; id: string };

export interface NativeTelemetryApi {
  connect(appName: string): Promise<void>;
  addDataDefinition(defineId: number, definition: NativeDataDefinition): void;
  /** Request the definition for the user aircraft once per second */
  requestDataOnUserObject(requestId: number, defineId: number): void;
  /** Non-blocking; null when no message is queued */
  getNextDispatch(): NativeDispatch | null;
  close(): Promise<void>;
}
