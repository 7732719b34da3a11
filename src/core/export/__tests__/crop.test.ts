import { describe, it, expect } from '@jest/globals';
import { calculateCropBox, cropBoxSize } from '../crop.js';
import type { CropBox } from '../../types/index.js';

function expectInside(box: CropBox | null, width: number, height: number): void {
  expect(box).not.toBeNull();
  if (!box) return;
  expect(box.x0).toBeGreaterThanOrEqual(0);
  expect(box.y0).toBeGreaterThanOrEqual(0);
  expect(box.x0).toBeLessThan(box.x1);
  expect(box.y0).toBeLessThan(box.y1);
  expect(box.x1).toBeLessThanOrEqual(width);
  expect(box.y1).toBeLessThanOrEqual(height);
  expect(Number.isInteger(box.x0) && Number.isInteger(box.y0)).toBe(true);
  expect(Number.isInteger(box.x1) && Number.isInteger(box.y1)).toBe(true);
}

describe('calculateCropBox', () => {
  it('scales and pads the content box', () => {
    const box = calculateCropBox({ x: 100, y: 50, width: 200, height: 100 }, 1000, 700, 2, 8);
    expect(box).toEqual({ x0: 184, y0: 84, x1: 616, y1: 316 });
  });

  it('clamps to image edges when the padded box overflows', () => {
    const box = calculateCropBox({ x: -5, y: -10, width: 1200, height: 900 }, 1000, 700, 1, 10);
    expect(box).toEqual({ x0: 0, y0: 0, x1: 1000, y1: 700 });
  });

  it('returns null without a bounding box', () => {
    expect(calculateCropBox(null, 1000, 700, 2, 8)).toBeNull();
    expect(calculateCropBox(undefined, 1000, 700, 2, 8)).toBeNull();
  });

  it('returns null for zero or negative area', () => {
    expect(calculateCropBox({ x: 10, y: 10, width: 0, height: 50 }, 1000, 700, 1, 8)).toBeNull();
    expect(calculateCropBox({ x: 10, y: 10, width: 50, height: 0 }, 1000, 700, 1, 8)).toBeNull();
    expect(calculateCropBox({ x: 10, y: 10, width: -20, height: 50 }, 1000, 700, 1, 8)).toBeNull();
  });

  it('returns null for non-finite coordinates', () => {
    expect(calculateCropBox({ x: Infinity, y: 0, width: 10, height: 10 }, 1000, 700, 1, 0)).toBeNull();
    expect(calculateCropBox({ x: 0, y: NaN, width: 10, height: 10 }, 1000, 700, 1, 0)).toBeNull();
  });

  it('rounds fractional CSS coordinates', () => {
    const box = calculateCropBox({ x: 10.4, y: 20.6, width: 100.2, height: 50.5 }, 1000, 700, 1, 0);
    expect(box).toEqual({ x0: 10, y0: 21, x1: 110, y1: 72 });
  });

  it('keeps a one-pixel box when content starts past the right and bottom edges', () => {
    const box = calculateCropBox({ x: 2000, y: 1500, width: 40, height: 40 }, 1000, 700, 1, 0);
    expect(box).toEqual({ x0: 999, y0: 699, x1: 1000, y1: 700 });
  });

  it('clamps a box that overflows only the bottom right', () => {
    const box = calculateCropBox({ x: 900, y: 600, width: 300, height: 300 }, 1000, 700, 1, 20);
    expect(box).toEqual({ x0: 880, y0: 580, x1: 1000, y1: 700 });
  });

  it('stays inside the image across scales, paddings and offsets', () => {
    const width = 640;
    const height = 480;
    for (const scale of [1, 2, 3]) {
      for (const padding of [0, 4, 8, 20, 500]) {
        for (const x of [-400, -1, 0, 13.5, 300, 639, 2000]) {
          for (const y of [-400, 0, 7.25, 240, 479, 2000]) {
            const box = calculateCropBox({ x, y, width: 50, height: 30 }, width, height, scale, padding);
            expectInside(box, width, height);
          }
        }
      }
    }
  });

  it('returns null for an empty image', () => {
    expect(calculateCropBox({ x: 0, y: 0, width: 10, height: 10 }, 0, 700, 1, 0)).toBeNull();
  });
});

describe('cropBoxSize', () => {
  it('derives width and height from the corners', () => {
    expect(cropBoxSize({ x0: 184, y0: 84, x1: 616, y1: 316 })).toEqual({ width: 432, height: 232 });
  });
});
