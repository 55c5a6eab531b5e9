import type { ConnectivityState, RawScanPayload, ScanUpdate } from './messages';
import type { ConnectionError, DecodeError } from './responses';

// Event types
export const EVENT_TYPES = {
  CONNECTIVITY_CHANGED: 'connectivityChanged',
  REPORT_RECEIVED: 'reportReceived',
  DECODE_FAILED: 'decodeFailed',
  CONNECTION_ERROR: 'connectionError',
} as const;

export type EventType = typeof EVENT_TYPES[keyof typeof EVENT_TYPES];

// Event payload mapping
export interface EventPayloadMap {
  [EVENT_TYPES.CONNECTIVITY_CHANGED]: ConnectivityState;
  [EVENT_TYPES.REPORT_RECEIVED]: ScanUpdate;
  [EVENT_TYPES.DECODE_FAILED]: DecodeError;
  [EVENT_TYPES.CONNECTION_ERROR]: ConnectionError;
}

// Transport-level events
export const TRANSPORT_EVENTS = {
  OPEN: 'open',
  PAYLOAD: 'payload',
} as const;

export interface TransportEventMap {
  // Server address the session opened to
  [TRANSPORT_EVENTS.OPEN]: string;
  [TRANSPORT_EVENTS.PAYLOAD]: RawScanPayload;
}

// Type-safe event handler
export type EventHandler<TPayload> = (payload: TPayload) => void;
