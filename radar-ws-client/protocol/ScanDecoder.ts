import {
  DECODE_ERROR_CODES,
  DecodeError,
  EchoResponse,
  Err,
  Ok,
  RawScanPayload,
  Result,
  ScanReport,
  WIRE_FIELDS,
  WireScanMessage,
} from '../types';
import { GEOMETRY } from '../utils/constants';

const malformed = (message: string, field?: string): DecodeError => ({
  code: DECODE_ERROR_CODES.MALFORMED,
  message,
  field,
});

const outOfRange = (message: string, field: string): DecodeError => ({
  code: DECODE_ERROR_CODES.OUT_OF_RANGE,
  message,
  field,
});

function payloadToText(raw: RawScanPayload): string {
  if (typeof raw === 'string') return raw;
  if (Array.isArray(raw)) return Buffer.concat(raw).toString('utf8');
  if (Buffer.isBuffer(raw)) return raw.toString('utf8');
  return Buffer.from(new Uint8Array(raw)).toString('utf8');
}

function asObject(value: unknown): Record<string, unknown> | null {
  if (!value || typeof value !== 'object' || Array.isArray(value)) {
    return null;
  }
  return { ...value };
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

function decodeEcho(value: unknown, index: number): Result<EchoResponse, DecodeError> {
  const echo = asObject(value);
  const path = `${WIRE_FIELDS.ECHO_RESPONSES}[${index}]`;
  if (!echo) {
    return Err(malformed(`Echo ${index} is not an object`, path));
  }

  const time = echo[WIRE_FIELDS.ECHO_TIME];
  if (!isFiniteNumber(time)) {
    return Err(malformed(`Echo ${index} is missing a numeric ${WIRE_FIELDS.ECHO_TIME}`, `${path}.${WIRE_FIELDS.ECHO_TIME}`));
  }
  const power = echo[WIRE_FIELDS.ECHO_POWER];
  if (!isFiniteNumber(power)) {
    return Err(malformed(`Echo ${index} is missing a numeric ${WIRE_FIELDS.ECHO_POWER}`, `${path}.${WIRE_FIELDS.ECHO_POWER}`));
  }

  if (time < 0) {
    return Err(outOfRange(`Echo ${index} round-trip time ${time} is negative`, `${path}.${WIRE_FIELDS.ECHO_TIME}`));
  }
  if (power < 0 || power > 1) {
    return Err(outOfRange(`Echo ${index} power ${power} is outside [0, 1]`, `${path}.${WIRE_FIELDS.ECHO_POWER}`));
  }

  return Ok(Object.freeze({ roundTripSeconds: time, power }));
}

// Parse and validate one inbound scan message; never throws
export function decodeScanReport(raw: RawScanPayload): Result<ScanReport, DecodeError> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(payloadToText(raw));
  } catch (error) {
    return Err(malformed(`Payload is not valid JSON: ${error instanceof Error ? error.message : String(error)}`));
  }

  const message = asObject(parsed);
  if (!message) {
    return Err(malformed('Payload is not a JSON object'));
  }

  const scanAngle = message[WIRE_FIELDS.SCAN_ANGLE];
  if (typeof scanAngle !== 'number' || !Number.isInteger(scanAngle)) {
    return Err(malformed(`Missing or non-integer ${WIRE_FIELDS.SCAN_ANGLE}`, WIRE_FIELDS.SCAN_ANGLE));
  }
  const pulseDuration = message[WIRE_FIELDS.PULSE_DURATION];
  if (typeof pulseDuration !== 'number' || !Number.isInteger(pulseDuration)) {
    return Err(malformed(`Missing or non-integer ${WIRE_FIELDS.PULSE_DURATION}`, WIRE_FIELDS.PULSE_DURATION));
  }
  const echoResponses = message[WIRE_FIELDS.ECHO_RESPONSES];
  if (!Array.isArray(echoResponses)) {
    return Err(malformed(`Missing or non-array ${WIRE_FIELDS.ECHO_RESPONSES}`, WIRE_FIELDS.ECHO_RESPONSES));
  }

  if (scanAngle < 0 || scanAngle >= GEOMETRY.FULL_CIRCLE_DEGREES) {
    return Err(outOfRange(`${WIRE_FIELDS.SCAN_ANGLE} ${scanAngle} is outside [0, 360)`, WIRE_FIELDS.SCAN_ANGLE));
  }
  if (pulseDuration < 0) {
    return Err(outOfRange(`${WIRE_FIELDS.PULSE_DURATION} ${pulseDuration} is negative`, WIRE_FIELDS.PULSE_DURATION));
  }

  const echoes: EchoResponse[] = [];
  for (let index = 0; index < echoResponses.length; index++) {
    const echo = decodeEcho(echoResponses[index], index);
    if (!echo.success) return echo;
    echoes.push(echo.data);
  }

  return Ok(Object.freeze({
    scanAngleDegrees: scanAngle,
    pulseDurationMicroseconds: pulseDuration,
    echoes: Object.freeze(echoes),
  }));
}

// Serialize a report back to its wire document
export function encodeScanReport(report: ScanReport): string {
  const message: WireScanMessage = {
    scanAngle: report.scanAngleDegrees,
    pulseDuration: report.pulseDurationMicroseconds,
    echoResponses: report.echoes.map(echo => ({ time: echo.roundTripSeconds, power: echo.power })),
  };
  return JSON.stringify(message);
}
