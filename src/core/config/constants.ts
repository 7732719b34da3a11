// src/core/config/constants.ts
export const DEFAULT_TIMEOUT = 30000; // 30 seconds
export const DEFAULT_SETTLE_DELAY = 1000;
export const SVG_READY_TIMEOUT = 3000;

export const DEFAULT_VIEWPORT_WIDTH = 2400;
export const DEFAULT_VIEWPORT_HEIGHT = 1600;
export const DEFAULT_DEVICE_SCALE_FACTOR = 2;
export const DEFAULT_PADDING = 20;

export const PADDING_PX = {
  none: 0,
  minimal: 8,
  comfortable: 20,
} as const;

// Alternate Chrome/Chromium executable, consulted only by the executable-path launch strategy
export const CHROME_PATH_ENV = 'DIAGRAM_SNAP_CHROME';

export const TEMP_DIR_PREFIX = 'diagram-snap-';
