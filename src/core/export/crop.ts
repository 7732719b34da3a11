// src/core/export/crop.ts
import type { BoundingBox, CropBox } from '../types/index.js';

function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

/**
 * Maps a CSS-pixel content box onto the captured bitmap.
 *
 * The box is scaled by the device-scale factor, grown by `padding * scale` on
 * every side and clamped so the result is non-empty and lies inside the
 * image. Returns null when there is nothing sensible to crop to; callers ship
 * the uncropped capture in that case.
 */
export function calculateCropBox(
  bounds: BoundingBox | null | undefined,
  imageWidth: number,
  imageHeight: number,
  deviceScaleFactor: number,
  padding: number
): CropBox | null {
  if (!bounds) {
    return null;
  }
  const values = [bounds.x, bounds.y, bounds.width, bounds.height];
  if (!values.every(Number.isFinite) || bounds.width <= 0 || bounds.height <= 0) {
    return null;
  }
  if (!(imageWidth >= 1 && imageHeight >= 1)) {
    return null;
  }

  const scale = deviceScaleFactor >= 1 ? deviceScaleFactor : 1;
  const grow = Math.max(0, padding) * scale;

  const x = clamp(Math.round(bounds.x * scale - grow), 0, imageWidth - 1);
  const y = clamp(Math.round(bounds.y * scale - grow), 0, imageHeight - 1);
  const width = clamp(Math.round(bounds.width * scale + grow * 2), 1, imageWidth - x);
  const height = clamp(Math.round(bounds.height * scale + grow * 2), 1, imageHeight - y);

  return { x0: x, y0: y, x1: x + width, y1: y + height };
}

export function cropBoxSize(box: CropBox): { width: number; height: number } {
  return { width: box.x1 - box.x0, height: box.y1 - box.y0 };
}
