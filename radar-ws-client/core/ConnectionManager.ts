import { v4 as uuidv4 } from 'uuid';
import { validateClientConfig } from '../config/RadarClientConfig';
import type { RadarClientConfig } from '../config/RadarClientConfig';
import { computePosition } from '../geometry/GeometryTransform';
import { TypedEventEmitter } from '../handlers/TypedEventEmitter';
import { decodeScanReport } from '../protocol/ScanDecoder';
import { WebSocketTransport } from '../transport/WebSocketTransport';
import type { ScanTransport, TransportFactory } from '../transport/WebSocketTransport';
import {
  ClientStats,
  ConnectionError,
  ConnectivityState,
  EVENT_TYPES,
  EventPayloadMap,
  RawScanPayload,
  toConnectionError,
} from '../types';
import { ScanLogger, scanLogger } from '../utils/ScanLogger';
import { sleep } from '../utils/sleep';

export interface ConnectionManagerOptions {
  createTransport?: TransportFactory;
  logger?: ScanLogger;
}

type SessionCounters = Omit<ClientStats, 'uptime'>;

/**
 * Owns the sensor session: connects, forwards decoded reports, and after any loss
 * waits the fixed reconnect delay before trying again, until stop() is called.
 *
 * Events are emitted synchronously in the order they are produced.
 */
export class ConnectionManager extends TypedEventEmitter<EventPayloadMap> {
  private readonly config: RadarClientConfig;
  private readonly createTransport: TransportFactory;

  private state: ConnectivityState = 'disconnected';
  private running = false;
  private abortController: AbortController | null = null;
  private loopPromise: Promise<void> | null = null;
  private transport: ScanTransport | null = null;
  private startTime = 0;
  private stopTime = 0;
  private counters: SessionCounters = {
    connectionAttempts: 0,
    sessionsEstablished: 0,
    reportsReceived: 0,
    decodeFailures: 0,
    connectionErrors: 0,
  };

  constructor(config: RadarClientConfig, options: ConnectionManagerOptions = {}) {
    super(options.logger ?? scanLogger);
    this.config = validateClientConfig({ ...config });
    this.createTransport = options.createTransport ?? (() => new WebSocketTransport());
  }

  start(): void {
    if (this.running) {
      this.logger.warn('Connection manager already running', undefined, 'CONNECTION');
      return;
    }
    this.running = true;
    this.startTime = Date.now();
    this.stopTime = 0;
    const controller = new AbortController();
    this.abortController = controller;
    this.logger.info(`Connection manager started for ${this.config.serverAddress}`, undefined, 'CONNECTION');
    this.loopPromise = this.runLoop(controller.signal).catch(error => {
      this.logger.error('Connection loop terminated unexpectedly', error, 'CONNECTION');
    });
  }

  // Aborts whichever wait the loop is in; resolves once the loop has exited
  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;
    this.stopTime = Date.now();

    this.abortController?.abort();
    this.abortController = null;
    this.transport?.disconnect();

    if (this.state !== 'disconnected') {
      this.state = 'disconnected';
      this.emit(EVENT_TYPES.CONNECTIVITY_CHANGED, this.state);
    }

    const loop = this.loopPromise;
    this.loopPromise = null;
    if (loop) {
      await loop;
    }
    this.logger.info('Connection manager stopped', undefined, 'CONNECTION');
  }

  getState(): ConnectivityState {
    return this.state;
  }

  isRunning(): boolean {
    return this.running;
  }

  getConfig(): RadarClientConfig {
    return { ...this.config };
  }

  getStats(): ClientStats {
    return {
      ...this.counters,
      uptime: this.startTime === 0 ? 0 : (this.running ? Date.now() : this.stopTime) - this.startTime,
    };
  }

  private async runLoop(signal: AbortSignal): Promise<void> {
    const reconnectDelayMs = this.config.reconnectDelaySeconds * 1000;

    while (!signal.aborted) {
      await this.runSession(signal);
      if (signal.aborted) break;

      this.transitionTo('disconnected', signal);
      this.logger.info(`Reconnecting in ${reconnectDelayMs}ms`, undefined, 'CONNECTION');
      await sleep(reconnectDelayMs, signal);
    }
  }

  // One connect-and-receive cycle; every failure ends here as a value, never as a rejection
  private async runSession(signal: AbortSignal): Promise<void> {
    const sessionId = uuidv4();
    const transport = this.createTransport();
    this.transport = transport;

    this.transitionTo('connecting', signal);
    this.counters.connectionAttempts++;
    this.logger.logSession(sessionId, `Connecting to ${this.config.serverAddress}`);

    // Frames can arrive in the same tick as the open, so announce the session from the open callback
    transport.onOpen(() => {
      if (signal.aborted) return;
      this.counters.sessionsEstablished++;
      this.transitionTo('connected', signal);
      this.logger.logSession(sessionId, 'Connected');
    });
    transport.onPayload(payload => this.handlePayload(payload, signal));

    try {
      await transport.connect(this.config.serverAddress, {
        timeoutMs: this.config.connectTimeoutSeconds * 1000,
        signal,
      });
      if (signal.aborted) return;

      const reason = await transport.closed();
      if (signal.aborted) return;
      this.reportConnectionError(sessionId, 'Session', reason, signal);
    } catch (error) {
      if (signal.aborted) return;
      this.reportConnectionError(sessionId, 'Connect', toConnectionError(error), signal);
    } finally {
      transport.disconnect();
      if (this.transport === transport) {
        this.transport = null;
      }
    }
  }

  private handlePayload(payload: RawScanPayload, signal: AbortSignal): void {
    if (signal.aborted) return;

    const result = decodeScanReport(payload);
    if (!result.success) {
      this.counters.decodeFailures++;
      this.logger.warn(`Skipping scan message: ${result.error.message}`, { code: result.error.code, field: result.error.field }, 'DECODER');
      this.emit(EVENT_TYPES.DECODE_FAILED, result.error);
      return;
    }

    const report = result.data;
    const position = computePosition(
      report,
      this.config.surfaceRadius,
      this.config.maxRangeUnits,
      this.config.propagationSpeed
    );
    this.counters.reportsReceived++;
    this.emit(EVENT_TYPES.REPORT_RECEIVED, {
      angleDegrees: report.scanAngleDegrees,
      position,
      report,
      receivedAt: Date.now(),
    });
  }

  private reportConnectionError(sessionId: string, phase: string, error: ConnectionError, signal: AbortSignal): void {
    if (signal.aborted) return;
    this.counters.connectionErrors++;
    this.logger.logSessionError(sessionId, phase, error);
    this.emit(EVENT_TYPES.CONNECTION_ERROR, error);
  }

  private transitionTo(next: ConnectivityState, signal: AbortSignal): void {
    if (signal.aborted || this.state === next) return;
    this.state = next;
    this.emit(EVENT_TYPES.CONNECTIVITY_CHANGED, next);
  }
}
