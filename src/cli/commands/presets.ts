// src/cli/commands/presets.ts
import { Command } from 'commander';
import { EXPORT_PRESETS, listExportPresets } from '../../core/config/export-presets.js';

export function registerPresetsCommand(program: Command): void {
  program
    .command('presets')
    .description('List export presets')
    .option('--json', 'Output JSON to stdout', false)
    .action((options: { json?: boolean }) => {
      const presets = listExportPresets().map(name => EXPORT_PRESETS[name]);

      if (options.json) {
        console.log(JSON.stringify(presets, null, 2));
        return;
      }

      for (const preset of presets) {
        console.log(
          `${preset.name.padEnd(14)} ${preset.viewportWidth}x${preset.viewportHeight} @${preset.deviceScaleFactor}x ` +
            `crop=${preset.cropMode} padding=${preset.paddingMode}  ${preset.description}`
        );
      }
    });
}
