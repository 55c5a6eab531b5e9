// Wire schema of one inbound scan message (JSON text frame)
export interface WireEchoResponse {
  time: number;   // Two-way propagation time in seconds
  power: number;  // Normalized reflectivity (0..1)
}

export interface WireScanMessage {
  scanAngle: number;       // Degrees, integer in [0, 360)
  pulseDuration: number;   // Microseconds, integer >= 0
  echoResponses: WireEchoResponse[];
}

// Raw frame as it arrives from the socket (text or binary fragments)
export type RawScanPayload = string | Buffer | ArrayBuffer | Buffer[];

// Decoded echo
export interface EchoResponse {
  readonly roundTripSeconds: number;
  readonly power: number;
}

// Decoded scan report
export interface ScanReport {
  readonly scanAngleDegrees: number;
  readonly pulseDurationMicroseconds: number;
  readonly echoes: readonly EchoResponse[];
}

// Display-surface coordinate
export interface Position {
  x: number;
  y: number;
}

export type ConnectivityState = 'disconnected' | 'connecting' | 'connected';

// Published once per decoded report, with or without a target
export interface ScanUpdate {
  angleDegrees: number;
  position: Position | null;
  report: ScanReport;
  receivedAt: number;
}

// Wire field names, used in decode diagnostics
export const WIRE_FIELDS = {
  SCAN_ANGLE: 'scanAngle',
  PULSE_DURATION: 'pulseDuration',
  ECHO_RESPONSES: 'echoResponses',
  ECHO_TIME: 'time',
  ECHO_POWER: 'power',
} as const;

export type WireField = typeof WIRE_FIELDS[keyof typeof WIRE_FIELDS];
