import net from 'net';
import type { Duplex } from 'stream';
import {
  FrameReader,
  MalformedRecordError,
  decodeSimDataFrame,
  simDataToAircraft,
} from '../lib/simData';
import type { Aircraft, SimConnection, SimMessage } from '../types/aircraft.types';
import type { XplaneConfig } from '../types/config.types';
import logger from '../utils/logger';

// the plugin going away shows up as one of these rather than a clean EOF
const DISCONNECT_CODES = new Set(['ECONNABORTED', 'ECONNRESET', 'EPIPE']);

export type SocketFactory = () => Duplex;

/**
 * Reads length-prefixed CSV telemetry frames pushed by the X-Plane plugin
 */
class XplaneConnection implements SimConnection {
  readonly name = 'XP12';

  private readonly options: XplaneConfig;

  private readonly createSocket: SocketFactory | undefined;

  private readonly reader = new FrameReader();

  private readonly queue: Aircraft[] = [];

  private socket: Duplex | null = null;

  private openPending = false;

  private ended = false;

  private failure: Error | null = null;

  private wake: (() => void) | null = null;

  constructor(options: XplaneConfig, createSocket?: SocketFactory) {
    this.options = options;
    this.createSocket = createSocket;
  }

  async open(): Promise<void> {
    const socket = this.createSocket ? this.createSocket() : await this.connect();
    socket.on('data', (chunk: Buffer) => this.onData(chunk));
    socket.on('end', () => this.onEnd());
    socket.on('close', () => this.onEnd());
    socket.on('error', (error: NodeJS.ErrnoException) => this.onError(error));
    this.socket = socket;
    this.openPending = true;
    logger.info('Connected to X-Plane', { host: this.options.host, port: this.options.port });
  }

  async nextMessage(): Promise<SimMessage> {
    const ready = this.takeMessage();
    if (ready) {
      return ready;
    }
    await this.waitForActivity();
    return this.takeMessage() ?? { type: 'waiting' };
  }

  async close(): Promise<void> {
    this.ended = true;
    if (this.socket) {
      this.socket.removeAllListeners('data');
      this.socket.destroy();
      this.socket = null;
    }
    this.notify();
  }

  private connect(): Promise<net.Socket> {
    const { host, port, connectTimeoutMs } = this.options;
    return new Promise((resolve, reject) => {
      const socket = net.createConnection({ host, port });
      const timer = setTimeout(() => {
        socket.destroy();
        reject(new Error(`Timed out connecting to X-Plane at ${host}:${port}`));
      }, connectTimeoutMs);
      const onError = (error: Error) => {
        clearTimeout(timer);
        reject(error);
      };
      socket.once('error', onError);
      socket.once('connect', () => {
        clearTimeout(timer);
        socket.off('error', onError);
        resolve(socket);
      });
    });
  }

  private takeMessage(): SimMessage | null {
    if (this.openPending) {
      this.openPending = false;
      return { type: 'open' };
    }
    const aircraft = this.queue.shift();
    if (aircraft) {
      return { type: 'telemetry', aircraft };
    }
    if (this.failure) {
      throw this.failure;
    }
    if (this.ended) {
      return { type: 'quit' };
    }
    return null;
  }

  private waitForActivity(): Promise<void> {
    return new Promise<void>((resolve) => {
      const timer = setTimeout(() => {
        this.wake = null;
        resolve();
      }, this.options.readTimeoutMs);
      this.wake = () => {
        clearTimeout(timer);
        this.wake = null;
        resolve();
      };
    });
  }

  private notify(): void {
    if (this.wake) {
      this.wake();
    }
  }

  private onData(chunk: Buffer): void {
    this.reader.push(chunk).forEach((frame) => {
      try {
        this.queue.push(simDataToAircraft(decodeSimDataFrame(frame)));
      } catch (error) {
        if (error instanceof MalformedRecordError) {
          logger.debug('Skipping malformed telemetry record', {
            record: error.record,
            error: error.message,
          });
        } else {
          this.failure = error instanceof Error ? error : new Error(String(error));
        }
      }
    });
    this.notify();
  }

  private onEnd(): void {
    this.ended = true;
    this.notify();
  }

  private onError(error: NodeJS.ErrnoException): void {
    if (error.code && DISCONNECT_CODES.has(error.code)) {
      logger.info('X-Plane closed the connection', { code: error.code });
      this.ended = true;
    } else {
      this.failure = error;
    }
    this.notify();
  }
}

export default XplaneConnection;
