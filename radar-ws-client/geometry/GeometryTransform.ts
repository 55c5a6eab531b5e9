/**
 * Range/bearing to display-surface transform.
 *
 * The surface is a square canvas of side 2 * surfaceRadius with the sensor at its center.
 * Only the first echo of a report is plotted; later echoes are ignored.
 */

import type { Position, ScanReport } from '../types';
import { GEOMETRY } from '../utils/constants';

export function toRadians(degrees: number): number {
  return (degrees * Math.PI) / 180;
}

// Two-way propagation time to one-way distance
export function oneWayDistance(roundTripSeconds: number, propagationSpeed: number = GEOMETRY.PROPAGATION_SPEED): number {
  return (roundTripSeconds * propagationSpeed) / 2;
}

// Fraction of the displayable range; values above 1 lie outside the surface circle and are not clamped
export function rangeFraction(
  roundTripSeconds: number,
  maxRangeUnits: number,
  propagationSpeed: number = GEOMETRY.PROPAGATION_SPEED
): number {
  return oneWayDistance(roundTripSeconds, propagationSpeed) / maxRangeUnits;
}

export function computePosition(
  report: ScanReport,
  surfaceRadius: number,
  maxRangeUnits: number,
  propagationSpeed: number = GEOMETRY.PROPAGATION_SPEED
): Position | null {
  const [firstEcho] = report.echoes;
  if (!firstEcho) {
    return null;
  }

  const r = rangeFraction(firstEcho.roundTripSeconds, maxRangeUnits, propagationSpeed);
  const angle = toRadians(report.scanAngleDegrees);

  return {
    x: r * surfaceRadius * Math.cos(angle) + surfaceRadius,
    y: r * surfaceRadius * Math.sin(angle) + surfaceRadius,
  };
}
