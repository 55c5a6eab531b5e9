// Connection defaults
export const CONNECTION = {
  DEFAULT_SERVER_ADDRESS: 'ws://localhost:4000',
  DEFAULT_RECONNECT_DELAY_SECONDS: 5,
  DEFAULT_CONNECT_TIMEOUT_SECONDS: 5,
} as const;

// Geometry defaults
export const GEOMETRY = {
  DEFAULT_SURFACE_RADIUS: 150,
  DEFAULT_MAX_RANGE_UNITS: 200,
  // Speed of light in km/s, matching round-trip times in seconds
  PROPAGATION_SPEED: 300_000,
  FULL_CIRCLE_DEGREES: 360,
} as const;

// Display hand-off
export const DISPLAY = {
  DEFAULT_FRAME_INTERVAL_MS: 16, // ~60fps
} as const;
