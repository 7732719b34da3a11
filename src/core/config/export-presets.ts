// src/core/config/export-presets.ts
import { createExportPolicy } from './export-policy.js';
import type { ExportPolicy, ExportPreset } from '../types/index.js';

function preset(value: ExportPreset): ExportPreset {
  return Object.freeze(value);
}

export const EXPORT_PRESETS: Readonly<Record<string, ExportPreset>> = Object.freeze({
  linkedin: preset({
    name: 'linkedin',
    viewportWidth: 1200,
    viewportHeight: 627,
    deviceScaleFactor: 1,
    cropMode: 'none',
    paddingMode: 'none',
    description: 'LinkedIn feed image (1200x627)',
  }),
  x: preset({
    name: 'x',
    viewportWidth: 1600,
    viewportHeight: 900,
    deviceScaleFactor: 1,
    cropMode: 'none',
    paddingMode: 'none',
    description: 'X/Twitter landscape image (1600x900)',
  }),
  'substack-hero': preset({
    name: 'substack-hero',
    viewportWidth: 1400,
    viewportHeight: 700,
    deviceScaleFactor: 1,
    cropMode: 'none',
    paddingMode: 'none',
    description: 'Substack hero image (1400x700)',
  }),
});

export function listExportPresets(): string[] {
  return Object.keys(EXPORT_PRESETS).sort();
}

/**
 * Exact, case-sensitive lookup. Missing, empty or unknown names give null.
 */
export function getExportPreset(name: string | null | undefined): ExportPreset | null {
  if (!name || !Object.prototype.hasOwnProperty.call(EXPORT_PRESETS, name)) {
    return null;
  }
  return EXPORT_PRESETS[name] ?? null;
}

export function policyForPreset(value: ExportPreset): ExportPolicy {
  return createExportPolicy({ cropMode: value.cropMode, paddingMode: value.paddingMode });
}
