import type { ConnectivityState, Position } from '../radar-ws-client';

// Consumed by a rendering surface; all drawing and redraw scheduling stays on its side
export interface DisplayPort {
  onConnectivityChanged(state: ConnectivityState): void;
  onScanUpdate(angleDegrees: number, position: Position | null): void;
}
