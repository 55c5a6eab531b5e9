// Result type for operations that reject input without throwing
export type Result<T, E> =
  | { success: true; data: T }
  | { success: false; error: E };

// Helper functions for Result type
export const Ok = <T, E = never>(data: T): Result<T, E> => ({ success: true, data });
export const Err = <E, T = never>(error: E): Result<T, E> => ({ success: false, error });

// Decode failure codes
export const DECODE_ERROR_CODES = {
  MALFORMED: 'MALFORMED',
  OUT_OF_RANGE: 'OUT_OF_RANGE',
} as const;

export type DecodeErrorCode = typeof DECODE_ERROR_CODES[keyof typeof DECODE_ERROR_CODES];

export interface DecodeError {
  code: DecodeErrorCode;
  message: string;
  field?: string;
}

// Connection failure codes
export const CONNECTION_ERROR_CODES = {
  UNREACHABLE: 'UNREACHABLE',
  CLOSED: 'CLOSED',
  TIMEOUT: 'TIMEOUT',
} as const;

export type ConnectionErrorCode = typeof CONNECTION_ERROR_CODES[keyof typeof CONNECTION_ERROR_CODES];

// Ends a session or prevents its establishment; always recovered by a delayed retry
export class ConnectionError extends Error {
  readonly code: ConnectionErrorCode;

  constructor(code: ConnectionErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConnectionError';
    this.code = code;
  }
}

export function toConnectionError(error: unknown): ConnectionError {
  if (error instanceof ConnectionError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new ConnectionError(CONNECTION_ERROR_CODES.UNREACHABLE, message, { cause: error });
}

// Client statistics
export interface ClientStats {
  connectionAttempts: number;
  sessionsEstablished: number;
  reportsReceived: number;
  decodeFailures: number;
  connectionErrors: number;
  uptime: number;
}
