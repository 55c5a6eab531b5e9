import { WebSocket } from 'ws';
import type { RawData } from 'ws';
import { TypedEventEmitter } from '../handlers/TypedEventEmitter';
import {
  CONNECTION_ERROR_CODES,
  ConnectionError,
  EventHandler,
  RawScanPayload,
  TRANSPORT_EVENTS,
  TransportEventMap,
} from '../types';

export interface ConnectOptions {
  timeoutMs: number;
  signal: AbortSignal;
}

// One sensor session; a new transport is created for every connection attempt
export interface ScanTransport {
  connect(url: string, options: ConnectOptions): Promise<void>;
  // Resolves once the open session ends
  closed(): Promise<ConnectionError>;
  disconnect(): void;
  // Runs inside the socket's open callback, before the first payload is delivered
  onOpen(handler: EventHandler<string>): void;
  onPayload(handler: EventHandler<RawScanPayload>): void;
}

export type TransportFactory = () => ScanTransport;

type TransportState = 'idle' | 'connecting' | 'open' | 'closed';

// WebSocket session over the ws client
export class WebSocketTransport extends TypedEventEmitter<TransportEventMap> implements ScanTransport {
  private ws: WebSocket | null = null;
  private state: TransportState = 'idle';
  private closedPromise: Promise<ConnectionError> | null = null;
  private lastError: Error | null = null;

  connect(url: string, { timeoutMs, signal }: ConnectOptions): Promise<void> {
    if (this.state !== 'idle') {
      return Promise.reject(new Error(`Transport already ${this.state}`));
    }
    if (signal.aborted) {
      this.state = 'closed';
      return Promise.reject(new ConnectionError(CONNECTION_ERROR_CODES.CLOSED, 'Connection attempt aborted'));
    }
    this.state = 'connecting';

    let ws: WebSocket;
    try {
      ws = new WebSocket(url);
    } catch (error) {
      this.state = 'closed';
      return Promise.reject(new ConnectionError(
        CONNECTION_ERROR_CODES.UNREACHABLE,
        `Invalid server address ${url}: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error }
      ));
    }
    this.ws = ws;

    return new Promise<void>((resolve, reject) => {
      let settled = false;

      const settle = (error?: ConnectionError) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        signal.removeEventListener('abort', onAbort);
        if (error) {
          this.state = 'closed';
          ws.terminate();
          reject(error);
        } else {
          this.state = 'open';
          resolve();
        }
      };

      const onAbort = () => settle(new ConnectionError(CONNECTION_ERROR_CODES.CLOSED, 'Connection attempt aborted'));
      const timer = setTimeout(() => {
        settle(new ConnectionError(CONNECTION_ERROR_CODES.TIMEOUT, `No connection to ${url} within ${timeoutMs}ms`));
      }, timeoutMs);
      signal.addEventListener('abort', onAbort, { once: true });

      this.closedPromise = new Promise<ConnectionError>(resolveClosed => {
        ws.on('close', (code: number, reason: Buffer) => {
          this.state = 'closed';
          const detail = this.lastError
            ? this.lastError.message
            : `code ${code}${reason.length > 0 ? `, ${reason.toString()}` : ''}`;
          settle(new ConnectionError(CONNECTION_ERROR_CODES.UNREACHABLE, `Connection to ${url} closed before open (${detail})`));
          resolveClosed(new ConnectionError(CONNECTION_ERROR_CODES.CLOSED, `Connection to ${url} closed (${detail})`));
        });
      });

      ws.on('open', () => {
        settle();
        if (this.state === 'open') {
          this.emit(TRANSPORT_EVENTS.OPEN, url);
        }
      });

      ws.on('message', (data: RawData) => {
        this.emit(TRANSPORT_EVENTS.PAYLOAD, data);
      });

      // Registered for the socket's lifetime; ws throws on an unhandled 'error'
      ws.on('error', (error: Error) => {
        this.lastError = error;
        settle(new ConnectionError(CONNECTION_ERROR_CODES.UNREACHABLE, `Cannot reach ${url}: ${error.message}`, { cause: error }));
      });
    });
  }

  closed(): Promise<ConnectionError> {
    return this.closedPromise
      ?? Promise.resolve(new ConnectionError(CONNECTION_ERROR_CODES.CLOSED, 'Transport was never opened'));
  }

  // Tear down immediately; a pending closed() resolves once the socket reports close
  disconnect(): void {
    if (this.ws) {
      this.ws.terminate();
    }
    this.state = 'closed';
  }

  onOpen(handler: EventHandler<string>): void {
    this.on(TRANSPORT_EVENTS.OPEN, handler);
  }

  onPayload(handler: EventHandler<RawScanPayload>): void {
    this.on(TRANSPORT_EVENTS.PAYLOAD, handler);
  }

  getState(): TransportState {
    return this.state;
  }
}
