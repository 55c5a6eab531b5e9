/**
 * Scan Decoder Tests
 */

import { decodeScanReport, encodeScanReport } from './ScanDecoder';
import { DECODE_ERROR_CODES, ScanReport } from '../types';

function wire(message: Record<string, unknown>): string {
  return JSON.stringify(message);
}

function expectDecoded(raw: string | Buffer | ArrayBuffer | Buffer[]): ScanReport {
  const result = decodeScanReport(raw);
  if (!result.success) {
    throw new Error(`Expected success, got ${result.error.code}: ${result.error.message}`);
  }
  return result.data;
}

function expectFailure(raw: string) {
  const result = decodeScanReport(raw);
  if (result.success) {
    throw new Error('Expected decode failure');
  }
  return result.error;
}

describe('decodeScanReport', () => {
  describe('Valid messages', () => {
    test('should decode a report with one echo', () => {
      const report = expectDecoded(wire({
        scanAngle: 0,
        pulseDuration: 10,
        echoResponses: [{ time: 0.001, power: 0.5 }],
      }));

      expect(report).toEqual({
        scanAngleDegrees: 0,
        pulseDurationMicroseconds: 10,
        echoes: [{ roundTripSeconds: 0.001, power: 0.5 }],
      });
    });

    test('should accept an empty echo list', () => {
      const report = expectDecoded(wire({ scanAngle: 90, pulseDuration: 5, echoResponses: [] }));

      expect(report.scanAngleDegrees).toBe(90);
      expect(report.echoes).toHaveLength(0);
    });

    test('should keep echo order', () => {
      const report = expectDecoded(wire({
        scanAngle: 45,
        pulseDuration: 1,
        echoResponses: [{ time: 0.002, power: 0.1 }, { time: 0.0005, power: 0.9 }],
      }));

      expect(report.echoes.map(echo => echo.roundTripSeconds)).toEqual([0.002, 0.0005]);
    });

    test('should decode Buffer, ArrayBuffer and fragmented payloads', () => {
      const text = wire({ scanAngle: 12, pulseDuration: 3, echoResponses: [] });
      const buffer = Buffer.from(text, 'utf8');
      const arrayBuffer = new ArrayBuffer(buffer.length);
      new Uint8Array(arrayBuffer).set(buffer);
      const fragments = [buffer.subarray(0, 10), buffer.subarray(10)];

      expect(expectDecoded(buffer).scanAngleDegrees).toBe(12);
      expect(expectDecoded(arrayBuffer).scanAngleDegrees).toBe(12);
      expect(expectDecoded(fragments).scanAngleDegrees).toBe(12);
    });

    test('should ignore unknown fields', () => {
      const report = expectDecoded(wire({ scanAngle: 1, pulseDuration: 1, echoResponses: [], gain: 3 }));
      expect(Object.keys(report)).toEqual(['scanAngleDegrees', 'pulseDurationMicroseconds', 'echoes']);
    });

    test('should return frozen reports', () => {
      const report = expectDecoded(wire({ scanAngle: 1, pulseDuration: 1, echoResponses: [{ time: 0, power: 0 }] }));

      expect(Object.isFrozen(report)).toBe(true);
      expect(Object.isFrozen(report.echoes)).toBe(true);
      expect(Object.isFrozen(report.echoes[0])).toBe(true);
    });
  });

  describe('Angle range', () => {
    test.each([0, 359])('should accept boundary angle %i', (scanAngle) => {
      expect(expectDecoded(wire({ scanAngle, pulseDuration: 0, echoResponses: [] })).scanAngleDegrees).toBe(scanAngle);
    });

    test.each([360, -1, 720])('should reject angle %i as out of range', (scanAngle) => {
      const error = expectFailure(wire({ scanAngle, pulseDuration: 0, echoResponses: [] }));

      expect(error.code).toBe(DECODE_ERROR_CODES.OUT_OF_RANGE);
      expect(error.field).toBe('scanAngle');
    });
  });

  describe('Malformed messages', () => {
    test('should reject a message missing scanAngle', () => {
      const error = expectFailure(wire({ pulseDuration: 10, echoResponses: [] }));

      expect(error.code).toBe(DECODE_ERROR_CODES.MALFORMED);
      expect(error.field).toBe('scanAngle');
    });

    test('should reject invalid JSON', () => {
      expect(expectFailure('{"scanAngle": 10,').code).toBe(DECODE_ERROR_CODES.MALFORMED);
    });

    test.each(['[]', '42', 'null', '"text"'])('should reject non-object document %s', (raw) => {
      expect(expectFailure(raw).code).toBe(DECODE_ERROR_CODES.MALFORMED);
    });

    test('should reject a fractional angle', () => {
      const error = expectFailure(wire({ scanAngle: 12.5, pulseDuration: 1, echoResponses: [] }));
      expect(error.code).toBe(DECODE_ERROR_CODES.MALFORMED);
    });

    test('should reject a string angle', () => {
      const error = expectFailure(wire({ scanAngle: '12', pulseDuration: 1, echoResponses: [] }));
      expect(error.code).toBe(DECODE_ERROR_CODES.MALFORMED);
    });

    test('should reject a missing pulseDuration', () => {
      const error = expectFailure(wire({ scanAngle: 12, echoResponses: [] }));

      expect(error.code).toBe(DECODE_ERROR_CODES.MALFORMED);
      expect(error.field).toBe('pulseDuration');
    });

    test('should reject non-array echoResponses', () => {
      const error = expectFailure(wire({ scanAngle: 12, pulseDuration: 1, echoResponses: { time: 1, power: 1 } }));

      expect(error.code).toBe(DECODE_ERROR_CODES.MALFORMED);
      expect(error.field).toBe('echoResponses');
    });

    test('should reject an echo without power', () => {
      const error = expectFailure(wire({ scanAngle: 12, pulseDuration: 1, echoResponses: [{ time: 0.001 }] }));

      expect(error.code).toBe(DECODE_ERROR_CODES.MALFORMED);
      expect(error.field).toBe('echoResponses[0].power');
    });

    test('should reject a non-object echo', () => {
      const error = expectFailure(wire({
        scanAngle: 12,
        pulseDuration: 1,
        echoResponses: [{ time: 0.001, power: 0.2 }, 7],
      }));

      expect(error.code).toBe(DECODE_ERROR_CODES.MALFORMED);
      expect(error.field).toBe('echoResponses[1]');
    });
  });

  describe('Value ranges', () => {
    test('should reject negative pulse duration', () => {
      const error = expectFailure(wire({ scanAngle: 12, pulseDuration: -1, echoResponses: [] }));
      expect(error.code).toBe(DECODE_ERROR_CODES.OUT_OF_RANGE);
    });

    test('should reject negative round-trip time', () => {
      const error = expectFailure(wire({ scanAngle: 12, pulseDuration: 1, echoResponses: [{ time: -0.1, power: 0.2 }] }));

      expect(error.code).toBe(DECODE_ERROR_CODES.OUT_OF_RANGE);
      expect(error.field).toBe('echoResponses[0].time');
    });

    test('should reject power above 1', () => {
      const error = expectFailure(wire({ scanAngle: 12, pulseDuration: 1, echoResponses: [{ time: 0.1, power: 1.5 }] }));

      expect(error.code).toBe(DECODE_ERROR_CODES.OUT_OF_RANGE);
      expect(error.field).toBe('echoResponses[0].power');
    });
  });
});

describe('encodeScanReport', () => {
  test('should write the wire field names', () => {
    const report: ScanReport = {
      scanAngleDegrees: 270,
      pulseDurationMicroseconds: 8,
      echoes: [{ roundTripSeconds: 0.0004, power: 0.25 }],
    };

    expect(encodeScanReport(report)).toBe('{"scanAngle":270,"pulseDuration":8,"echoResponses":[{"time":0.0004,"power":0.25}]}');
  });

  test('should round-trip through decode', () => {
    const report: ScanReport = {
      scanAngleDegrees: 123,
      pulseDurationMicroseconds: 42,
      echoes: [{ roundTripSeconds: 0.00123, power: 0.75 }, { roundTripSeconds: 0.0009, power: 0 }],
    };

    expect(expectDecoded(encodeScanReport(report))).toEqual(report);
  });
});
