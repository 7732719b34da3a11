// src/cli/commands/export.ts
import { Command, InvalidArgumentError } from 'commander';
import * as fs from 'fs/promises';
import * as path from 'path';
import { PngExporter } from '../../core/orchestrator.js';
import { createExportPolicy, resolvePadding } from '../../core/config/export-policy.js';
import { getExportPreset, listExportPresets, policyForPreset } from '../../core/config/export-presets.js';
import { SnapError, formatError } from '../../core/errors.js';
import { ErrorCode } from '../../core/export/types.js';
import type { ExportOptions } from '../../core/export/types.js';
import type { ExportPreset } from '../../core/types/index.js';

export interface ExportCommandOptions {
  out?: string;
  preset?: string;
  width?: number;
  height?: number;
  scale?: number;
  cropMode?: string;
  paddingMode?: string;
  padding?: number;
  omitBackground?: boolean;
  htmlPath?: string;
  json?: boolean;
  verbose?: boolean;
}

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

export function parseNonNegativeInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return parsed;
}

export function defaultOutputPath(inputPath: string): string {
  const parsed = path.parse(inputPath);
  return path.join(parsed.dir, `${parsed.name}.png`);
}

/**
 * Explicit flags win over a preset, a preset wins over the built-in policy.
 */
export function buildExportOptions(options: ExportCommandOptions): ExportOptions {
  let preset: ExportPreset | null = null;
  if (options.preset !== undefined) {
    preset = getExportPreset(options.preset);
    if (!preset) {
      throw new SnapError(
        ErrorCode.UNKNOWN_PRESET,
        `Unknown export preset: ${options.preset}`,
        false,
        `Use one of: ${listExportPresets().join(', ')}`
      );
    }
  }

  const base = preset ? policyForPreset(preset) : undefined;
  const policy = createExportPolicy({
    cropMode: options.cropMode ?? base?.cropMode,
    paddingMode: options.paddingMode ?? base?.paddingMode,
  });

  return {
    viewportWidth: options.width ?? preset?.viewportWidth,
    viewportHeight: options.height ?? preset?.viewportHeight,
    deviceScaleFactor: options.scale ?? preset?.deviceScaleFactor,
    cropMode: policy.cropMode,
    padding: options.padding ?? resolvePadding(policy),
    omitBackground: options.omitBackground ?? false,
    htmlPath: options.htmlPath,
    verbose: options.verbose ?? false,
  };
}

export function registerExportCommand(program: Command): void {
  program
    .command('export <html-file>')
    .description('Render an HTML file and write a cropped PNG')
    .option('-o, --out <png>', 'Output PNG path (default: input name with .png)')
    .option('--preset <name>', 'Export preset (see `presets`)')
    .option('--width <px>', 'Viewport width in CSS pixels', parsePositiveInt)
    .option('--height <px>', 'Viewport height in CSS pixels', parsePositiveInt)
    .option('--scale <factor>', 'Device scale factor', parsePositiveInt)
    .option('--crop-mode <mode>', 'Crop mode (none|safe|tight)')
    .option('--padding-mode <mode>', 'Padding mode (none|minimal|comfortable)')
    .option('--padding <px>', 'Padding in CSS pixels (overrides --padding-mode)', parseNonNegativeInt)
    .option('--omit-background', 'Capture with a transparent background', false)
    .option('--html-path <path>', 'Keep the rendered HTML at this path')
    .option('--json', 'Output JSON to stdout', false)
    .option('--verbose', 'Verbose output', false)
    .action(async (htmlFile: string, options: ExportCommandOptions) => {
      try {
        const exportOptions = buildExportOptions(options);
        const html = await fs.readFile(htmlFile, 'utf8');
        const outputPath = options.out ?? defaultOutputPath(htmlFile);

        const exporter = new PngExporter({ verbose: options.verbose });
        const result = await exporter.export(html, outputPath, exportOptions);

        if (options.json) {
          console.log(JSON.stringify(result, null, 2));
          return;
        }

        console.log('Exported to:', result.outputPath);
        if (result.imageWidth !== undefined && result.imageHeight !== undefined) {
          console.log(`Size: ${result.imageWidth}x${result.imageHeight}${result.cropped ? ' (cropped)' : ''}`);
        }
      } catch (error) {
        console.error('Error:', formatError(error));
        process.exit(1);
      }
    });
}
