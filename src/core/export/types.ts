// src/core/export/types.ts
import type { CropBox, CropMode } from '../types/index.js';

export interface ExportOptions {
  viewportWidth?: number;
  viewportHeight?: number;
  deviceScaleFactor?: number;
  padding?: number;       // CSS pixels, before crop-mode scaling
  cropMode?: CropMode | string;
  htmlPath?: string;      // caller-owned HTML location, never deleted
  omitBackground?: boolean;
  timeout?: number;       // navigation timeout in ms
  settleDelay?: number;   // grace period after network idle in ms
  verbose?: boolean;
}

export interface ResolvedExportOptions {
  viewportWidth: number;
  viewportHeight: number;
  deviceScaleFactor: number;
  padding: number;
  cropMode: CropMode;
  htmlPath?: string;
  omitBackground: boolean;
  timeout: number;
  settleDelay: number;
  verbose: boolean;
}

export interface ExportResult {
  outputPath: string;
  cropped: boolean;
  cropBox?: CropBox;
  /** Absent when the written PNG could not be measured. */
  imageWidth?: number;
  imageHeight?: number;
  launchStrategy: string;
  warnings: string[];
}

export interface ExportError {
  code: ErrorCode;
  message: string;
  retryable: boolean;
  suggestion?: string;
}

export enum ErrorCode {
  BROWSER_NOT_INSTALLED = 'browser_not_installed',
  BROWSER_LAUNCH_FAILED = 'browser_launch_failed',
  NAVIGATION_FAILED = 'navigation_failed',
  CAPTURE_FAILED = 'capture_failed',
  FILESYSTEM_ERROR = 'filesystem_error',
  INVALID_OPTIONS = 'invalid_options',
  UNKNOWN_PRESET = 'unknown_preset',
}
