import type { ConnectivityState, Position } from '../radar-ws-client';
import type { DisplayPort } from './DisplayPort';

export interface PixelPoint {
  x: number;
  y: number;
}

export interface RadarFrame {
  beamAngleDegrees: number;
  target: Position | null;
  targetPixel: PixelPoint | null;
  targetVisible: boolean;
  connectivity: ConnectivityState;
  frameCount: number;
}

export type FrameListener = (frame: Readonly<RadarFrame>) => void;

// Raster surfaces address whole pixels; truncate toward zero
export function toPixel(position: Position): PixelPoint {
  return { x: Math.trunc(position.x), y: Math.trunc(position.y) };
}

// Headless DisplayPort: keeps only what the next redraw needs
export class RadarDisplayState implements DisplayPort {
  private beamAngleDegrees = 0;
  private target: Position | null = null;
  private connectivity: ConnectivityState = 'disconnected';
  private frameCount = 0;
  private listeners = new Set<FrameListener>();

  onConnectivityChanged(state: ConnectivityState): void {
    this.connectivity = state;
    if (state === 'disconnected') {
      // Last known target is stale once the sensor is gone
      this.target = null;
    }
    this.notify();
  }

  onScanUpdate(angleDegrees: number, position: Position | null): void {
    this.beamAngleDegrees = angleDegrees;
    // An empty sweep keeps the previous marker on screen
    if (position) {
      this.target = { ...position };
    }
    this.notify();
  }

  snapshot(): Readonly<RadarFrame> {
    const target = this.target ? { ...this.target } : null;
    return Object.freeze({
      beamAngleDegrees: this.beamAngleDegrees,
      target,
      targetPixel: target ? toPixel(target) : null,
      targetVisible: target !== null,
      connectivity: this.connectivity,
      frameCount: this.frameCount,
    });
  }

  subscribe(listener: FrameListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private notify(): void {
    this.frameCount++;
    const frame = this.snapshot();
    this.listeners.forEach(listener => listener(frame));
  }
}
