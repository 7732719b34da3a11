// src/core/orchestrator.ts
import * as fs from 'fs/promises';
import * as path from 'path';
import { BrowserLauncher, type BrowserLauncherOptions } from './render/browser.js';
import { PageCapturer } from './render/page.js';
import { detectContentBounds } from './render/content-bounds.js';
import { calculateCropBox } from './export/crop.js';
import { copyImage, cropImage, readImageSize } from './export/image.js';
import { TempWorkspace } from './export/workspace.js';
import { effectivePadding, normalizeCropMode } from './config/export-policy.js';
import {
  DEFAULT_DEVICE_SCALE_FACTOR,
  DEFAULT_PADDING,
  DEFAULT_SETTLE_DELAY,
  DEFAULT_TIMEOUT,
  DEFAULT_VIEWPORT_HEIGHT,
  DEFAULT_VIEWPORT_WIDTH,
} from './config/constants.js';
import { SnapError, errorMessage } from './errors.js';
import { ErrorCode } from './export/types.js';
import type { ExportOptions, ExportResult, ResolvedExportOptions } from './export/types.js';
import type { CapturedPage, LaunchStrategyName } from './render/types.js';
import type { ImageSize } from './types/index.js';

function requirePositiveInteger(name: string, value: number): number {
  if (!Number.isInteger(value) || value <= 0) {
    throw new SnapError(ErrorCode.INVALID_OPTIONS, `${name} must be a positive integer, got ${value}`);
  }
  return value;
}

function requireNonNegative(name: string, value: number): number {
  if (!Number.isFinite(value) || value < 0) {
    throw new SnapError(ErrorCode.INVALID_OPTIONS, `${name} must be a non-negative number, got ${value}`);
  }
  return value;
}

export function resolveExportOptions(options: ExportOptions = {}): ResolvedExportOptions {
  return {
    viewportWidth: requirePositiveInteger('viewportWidth', options.viewportWidth ?? DEFAULT_VIEWPORT_WIDTH),
    viewportHeight: requirePositiveInteger('viewportHeight', options.viewportHeight ?? DEFAULT_VIEWPORT_HEIGHT),
    deviceScaleFactor: requirePositiveInteger(
      'deviceScaleFactor',
      options.deviceScaleFactor ?? DEFAULT_DEVICE_SCALE_FACTOR
    ),
    padding: requireNonNegative('padding', options.padding ?? DEFAULT_PADDING),
    cropMode: normalizeCropMode(options.cropMode),
    htmlPath: options.htmlPath,
    omitBackground: options.omitBackground ?? false,
    timeout: requireNonNegative('timeout', options.timeout ?? DEFAULT_TIMEOUT),
    settleDelay: requireNonNegative('settleDelay', options.settleDelay ?? DEFAULT_SETTLE_DELAY),
    verbose: options.verbose ?? false,
  };
}

export class PngExporter {
  private launcher: BrowserLauncher;

  constructor(options?: BrowserLauncherOptions) {
    this.launcher = new BrowserLauncher(options);
  }

  async export(html: string, outputPath: string, options: ExportOptions = {}): Promise<ExportResult> {
    const resolved = resolveExportOptions(options);
    const target = path.resolve(outputPath);

    try {
      await fs.mkdir(path.dirname(target), { recursive: true });
    } catch (error) {
      throw new SnapError(
        ErrorCode.FILESYSTEM_ERROR,
        `Failed to create output directory: ${path.dirname(target)}`,
        false,
        `Check permissions for directory: ${path.dirname(target)}`,
        { outputPath: target },
        error
      );
    }

    const workspace = await TempWorkspace.create(html, resolved.htmlPath);
    try {
      const session = await this.launcher.acquire();
      try {
        const captured = await new PageCapturer(session.browser).capture(
          workspace.htmlPath,
          workspace.screenshotPath,
          resolved
        );
        try {
          return await this.writeOutput(captured, target, resolved, session.strategy);
        } finally {
          await captured.context.close().catch((error: unknown) => {
            console.error(`[WARN] Failed to close browser context: ${errorMessage(error)}`);
          });
        }
      } finally {
        await this.launcher.release(session).catch((error: unknown) => {
          console.error(`[WARN] Failed to close browser: ${errorMessage(error)}`);
        });
      }
    } finally {
      await workspace.dispose();
    }
  }

  private async writeOutput(
    captured: CapturedPage,
    target: string,
    options: ResolvedExportOptions,
    launchStrategy: LaunchStrategyName
  ): Promise<ExportResult> {
    const warnings: string[] = [];
    let captureSize: ImageSize | undefined;

    if (options.cropMode !== 'none') {
      try {
        const bounds = await detectContentBounds(captured.page);
        captureSize = await readImageSize(captured.screenshotPath);
        const padding = effectivePadding(options.cropMode, options.padding);
        const cropBox = calculateCropBox(
          bounds,
          captureSize.width,
          captureSize.height,
          options.deviceScaleFactor,
          padding
        );

        if (options.verbose) {
          console.error(`[DEBUG] Content bounds: ${JSON.stringify(bounds)}, padding ${padding}px`);
        }

        if (cropBox) {
          const size = await cropImage(captured.screenshotPath, cropBox, target);
          return {
            outputPath: target,
            cropped: true,
            cropBox,
            imageWidth: size.width,
            imageHeight: size.height,
            launchStrategy,
            warnings,
          };
        }
        warnings.push('No visible content region found; using full-page capture');
      } catch (error) {
        warnings.push(`Could not crop (${errorMessage(error)}); using full-page capture`);
      }
    }

    await copyImage(captured.screenshotPath, target);

    // The copy is byte-identical, so a size read before it still holds.
    let size = captureSize;
    if (!size) {
      try {
        size = await readImageSize(target);
      } catch (error) {
        warnings.push(`Could not read image size (${errorMessage(error)})`);
      }
    }

    for (const warning of warnings) {
      console.error(`[WARN] ${warning}`);
    }

    return {
      outputPath: target,
      cropped: false,
      imageWidth: size?.width,
      imageHeight: size?.height,
      launchStrategy,
      warnings,
    };
  }
}

/**
 * Renders `html` and writes a PNG to `outputPath`, returning the absolute
 * output path.
 */
export async function exportHtmlToPng(
  html: string,
  outputPath: string,
  options: ExportOptions = {}
): Promise<string> {
  const exporter = new PngExporter({ verbose: options.verbose });
  const result = await exporter.export(html, outputPath, options);
  return result.outputPath;
}
