// src/core/types/index.ts
export type CropMode = 'none' | 'safe' | 'tight';

export type PaddingMode = 'none' | 'minimal' | 'comfortable';

export interface ExportPolicy {
  readonly cropMode: CropMode;
  readonly paddingMode: PaddingMode;
}

export interface ExportPreset {
  readonly name: string;
  readonly viewportWidth: number;
  readonly viewportHeight: number;
  readonly deviceScaleFactor: number;
  readonly cropMode: CropMode;
  readonly paddingMode: PaddingMode;
  readonly description: string;
}

/** Rectangle in CSS pixels, relative to the page viewport. */
export interface BoundingBox {
  x: number;
  y: number;
  width: number;
  height: number;
}

/** Rectangle in bitmap pixels; x1/y1 are exclusive. */
export interface CropBox {
  x0: number;
  y0: number;
  x1: number;
  y1: number;
}

export interface ImageSize {
  width: number;
  height: number;
}
