#!/usr/bin/env node

import { Command } from 'commander';
import { registerExportCommand } from './commands/export.js';
import { registerInstallBrowsersCommand } from './commands/install-browsers.js';
import { registerPresetsCommand } from './commands/presets.js';

export function buildProgram(): Command {
  const program = new Command();

  program
    .name('diagram-snap')
    .description('Render HTML diagrams to cropped PNG files')
    .version('0.1.0');

  registerInstallBrowsersCommand(program);
  registerExportCommand(program);
  registerPresetsCommand(program);

  return program;
}

export async function runCli(argv: string[] = process.argv): Promise<void> {
  const program = buildProgram();
  await program.parseAsync(argv);
}

if (process.env.NODE_ENV !== 'test') {
  void runCli();
}
