// src/cli/commands/install-browsers.ts
import { Command } from 'commander';
import { execSync } from 'child_process';
import { CHROME_PATH_ENV } from '../../core/config/constants.js';

export function registerInstallBrowsersCommand(program: Command): void {
  program
    .command('install-browsers')
    .description('Install the Playwright Chromium build used for export')
    .action(() => {
      try {
        execSync('npx playwright install chromium', {
          stdio: 'inherit',
        });
        console.log('✓ Browsers installed successfully');
      } catch {
        console.error('✗ Failed to install browsers');
        console.error(`Note: set ${CHROME_PATH_ENV} to use an existing Chrome instead.`);
        process.exit(1);
      }
    });
}
