/**
 * Display Bridge
 *
 * Hands pipeline events to a DisplayPort on the display's own frame cadence.
 * Connectivity changes are delivered in order and never dropped; scan updates
 * are coalesced so at most one undelivered update is held (newest wins).
 */

import {
  ConnectionManager,
  ConnectivityState,
  DISPLAY,
  EVENT_TYPES,
  ScanUpdate,
  scanLogger,
} from '../radar-ws-client';
import type { DisplayPort } from './DisplayPort';

type PendingEvent =
  | { kind: 'connectivity'; state: ConnectivityState }
  | { kind: 'scan'; update: ScanUpdate };

export interface DisplayBridgeOptions {
  frameIntervalMs?: number;
}

export class DisplayBridge {
  private readonly frameIntervalMs: number;
  private pending: PendingEvent[] = [];
  private flushTimer: NodeJS.Timeout | null = null;
  private droppedUpdates = 0;
  private source: ConnectionManager | null = null;

  private readonly handleConnectivity = (state: ConnectivityState): void => {
    this.pending.push({ kind: 'connectivity', state });
    this.scheduleFlush();
  };

  private readonly handleReport = (update: ScanUpdate): void => {
    const last = this.pending[this.pending.length - 1];
    if (last && last.kind === 'scan') {
      // Stale sweep superseded before the display consumed it
      this.pending[this.pending.length - 1] = { kind: 'scan', update };
      this.droppedUpdates++;
    } else {
      this.pending.push({ kind: 'scan', update });
    }
    this.scheduleFlush();
  };

  constructor(private readonly display: DisplayPort, options: DisplayBridgeOptions = {}) {
    this.frameIntervalMs = options.frameIntervalMs ?? DISPLAY.DEFAULT_FRAME_INTERVAL_MS;
  }

  attach(manager: ConnectionManager): void {
    if (this.source) {
      this.detach();
    }
    this.source = manager;
    manager.on(EVENT_TYPES.CONNECTIVITY_CHANGED, this.handleConnectivity);
    manager.on(EVENT_TYPES.REPORT_RECEIVED, this.handleReport);
  }

  // Stops listening; anything still pending is delivered first
  detach(): void {
    if (this.source) {
      this.source.off(EVENT_TYPES.CONNECTIVITY_CHANGED, this.handleConnectivity);
      this.source.off(EVENT_TYPES.REPORT_RECEIVED, this.handleReport);
      this.source = null;
    }
    this.flush();
  }

  flush(): void {
    if (this.flushTimer) {
      clearTimeout(this.flushTimer);
      this.flushTimer = null;
    }
    const batch = this.pending;
    this.pending = [];

    for (const event of batch) {
      try {
        if (event.kind === 'connectivity') {
          this.display.onConnectivityChanged(event.state);
        } else {
          this.display.onScanUpdate(event.update.angleDegrees, event.update.position);
        }
      } catch (error) {
        scanLogger.error(`Display rejected ${event.kind} update`, error, 'DISPLAY');
      }
    }
  }

  getPendingCount(): number {
    return this.pending.length;
  }

  getDroppedUpdates(): number {
    return this.droppedUpdates;
  }

  private scheduleFlush(): void {
    if (this.flushTimer) return;
    this.flushTimer = setTimeout(() => {
      this.flushTimer = null;
      this.flush();
    }, this.frameIntervalMs);
  }
}
