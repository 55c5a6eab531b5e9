export { DisplayBridge } from './DisplayBridge';
export type { DisplayBridgeOptions } from './DisplayBridge';
export { RadarDisplayState, toPixel } from './RadarDisplayState';
export type { RadarFrame, PixelPoint, FrameListener } from './RadarDisplayState';
export type { DisplayPort } from './DisplayPort';
