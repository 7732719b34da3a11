// src/core/index.ts
export { PngExporter, exportHtmlToPng, resolveExportOptions } from './orchestrator.js';
export { BrowserLauncher, LAUNCH_STRATEGIES } from './render/browser.js';
export type { BrowserLauncherOptions } from './render/browser.js';
export { PageCapturer } from './render/page.js';
export { CONTENT_SELECTORS, detectContentBounds, measureContentBounds } from './render/content-bounds.js';
export type { ContentSelectorTable } from './render/content-bounds.js';
export { calculateCropBox } from './export/crop.js';
export {
  DEFAULT_EXPORT_POLICY,
  createExportPolicy,
  effectivePadding,
  roundHalfEven,
  normalizeCropMode,
  normalizePaddingMode,
  resolvePadding,
} from './config/export-policy.js';
export { EXPORT_PRESETS, getExportPreset, listExportPresets, policyForPreset } from './config/export-presets.js';
export { SnapError, ErrorCode, formatError, toExportError } from './errors.js';
export type { ExportError, ExportOptions, ExportResult } from './export/types.js';
export type * from './types/index.js';
export type { BrowserSession, LaunchAttempt, LaunchStrategy, LaunchStrategyName } from './render/types.js';
