// src/core/config/export-policy.ts
import { PADDING_PX } from './constants.js';
import type { CropMode, ExportPolicy, PaddingMode } from '../types/index.js';

export const CROP_MODES: readonly CropMode[] = ['none', 'safe', 'tight'];
export const PADDING_MODES: readonly PaddingMode[] = ['none', 'minimal', 'comfortable'];

export const DEFAULT_EXPORT_POLICY: ExportPolicy = Object.freeze({
  cropMode: 'safe',
  paddingMode: 'minimal',
});

function isCropMode(value: unknown): value is CropMode {
  return typeof value === 'string' && (CROP_MODES as readonly string[]).includes(value);
}

function isPaddingMode(value: unknown): value is PaddingMode {
  return typeof value === 'string' && (PADDING_MODES as readonly string[]).includes(value);
}

/**
 * Unknown or missing crop modes fall back to `safe`; config values are
 * sanitized, never rejected.
 */
export function normalizeCropMode(value: unknown): CropMode {
  return isCropMode(value) ? value : DEFAULT_EXPORT_POLICY.cropMode;
}

export function normalizePaddingMode(value: unknown): PaddingMode {
  return isPaddingMode(value) ? value : DEFAULT_EXPORT_POLICY.paddingMode;
}

export function createExportPolicy(input: { cropMode?: unknown; paddingMode?: unknown } = {}): ExportPolicy {
  return Object.freeze({
    cropMode: normalizeCropMode(input.cropMode ?? DEFAULT_EXPORT_POLICY.cropMode),
    paddingMode: normalizePaddingMode(input.paddingMode ?? DEFAULT_EXPORT_POLICY.paddingMode),
  });
}

export function resolvePadding(policy: ExportPolicy = DEFAULT_EXPORT_POLICY): number {
  return PADDING_PX[policy.paddingMode];
}

/** Rounds to the nearest integer, ties to even (2.5 -> 2, 3.5 -> 4). */
export function roundHalfEven(value: number): number {
  const floor = Math.floor(value);
  const diff = value - floor;
  if (diff > 0.5) return floor + 1;
  if (diff < 0.5) return floor;
  return floor % 2 === 0 ? floor : floor + 1;
}

/**
 * Padding actually applied around the content box. `tight` halves it
 * (ties to even, so 5 -> 2 and 7 -> 4); other modes use it as given.
 */
export function effectivePadding(cropMode: CropMode, padding: number): number {
  const base = Math.max(0, padding);
  if (cropMode === 'tight') {
    return roundHalfEven(base / 2);
  }
  return base;
}
