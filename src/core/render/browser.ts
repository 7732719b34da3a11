// src/core/render/browser.ts
import { chromium, webkit, type Browser } from 'playwright';
import * as fs from 'fs/promises';
import { CHROME_PATH_ENV } from '../config/constants.js';
import { SnapError, errorMessage } from '../errors.js';
import { ErrorCode } from '../export/types.js';
import type {
  BrowserSession,
  LaunchAttempt,
  LaunchContext,
  LaunchStrategy,
} from './types.js';

const NO_SANDBOX_ARGS = ['--no-sandbox'];

async function pathExists(target: string): Promise<boolean> {
  try {
    await fs.access(target);
    return true;
  } catch {
    return false;
  }
}

/**
 * Tried in order until one yields a browser. Later entries are more
 * permissive, so the default launch is used whenever the host allows it.
 */
export const LAUNCH_STRATEGIES: readonly LaunchStrategy[] = [
  {
    name: 'default',
    launch: () => chromium.launch({ headless: true }),
  },
  {
    name: 'executable-path',
    launch: async ({ env }: LaunchContext) => {
      const executablePath = env[CHROME_PATH_ENV];
      if (!executablePath || !(await pathExists(executablePath))) {
        return null;
      }
      return chromium.launch({ headless: true, executablePath, args: NO_SANDBOX_ARGS });
    },
  },
  {
    name: 'chrome-channel',
    launch: () => chromium.launch({ headless: true, channel: 'chrome', args: NO_SANDBOX_ARGS }),
  },
  {
    name: 'no-sandbox',
    diagnostic: true,
    launch: () => chromium.launch({ headless: true, chromiumSandbox: false }),
  },
  {
    name: 'webkit',
    launch: () => webkit.launch({ headless: true }),
  },
];

const MISSING_EXECUTABLE = /Executable doesn't exist|playwright install/i;

export interface BrowserLauncherOptions {
  strategies?: readonly LaunchStrategy[];
  env?: NodeJS.ProcessEnv;
  verbose?: boolean;
}

export class BrowserLauncher {
  private strategies: readonly LaunchStrategy[];
  private env: NodeJS.ProcessEnv;
  private verbose: boolean;

  constructor(options: BrowserLauncherOptions = {}) {
    this.strategies = options.strategies ?? LAUNCH_STRATEGIES;
    this.env = options.env ?? process.env;
    this.verbose = options.verbose ?? false;
  }

  async acquire(): Promise<BrowserSession> {
    const attempts: LaunchAttempt[] = [];

    for (const strategy of this.strategies) {
      let browser: Browser | null;
      try {
        browser = await strategy.launch({ env: this.env });
      } catch (error) {
        attempts.push({ strategy: strategy.name, ok: false, reason: 'failed', error });
        if (this.verbose) {
          console.error(`[DEBUG] Launch strategy '${strategy.name}' failed: ${errorMessage(error)}`);
        }
        continue;
      }

      if (!browser) {
        attempts.push({ strategy: strategy.name, ok: false, reason: 'skipped' });
        continue;
      }

      attempts.push({ strategy: strategy.name, ok: true });
      if (attempts.length > 1) {
        console.error(`[INFO] Browser launched with fallback strategy '${strategy.name}'`);
      }
      return { browser, strategy: strategy.name, attempts };
    }

    throw this.exhausted(attempts);
  }

  async release(session: BrowserSession): Promise<void> {
    await session.browser.close();
  }

  private exhausted(attempts: LaunchAttempt[]): SnapError {
    const failures = attempts.filter(
      (attempt): attempt is Extract<LaunchAttempt, { ok: false }> => !attempt.ok && attempt.reason === 'failed'
    );
    const diagnosticNames = new Set(
      this.strategies.filter(strategy => strategy.diagnostic).map(strategy => strategy.name)
    );
    const reported =
      failures.find(attempt => diagnosticNames.has(attempt.strategy)) ?? failures[failures.length - 1];

    const cause = reported?.error;
    const detail = cause === undefined ? 'no launch strategy applied' : errorMessage(cause);
    const context = {
      attempts: attempts.map(attempt =>
        attempt.ok
          ? { strategy: attempt.strategy, ok: true }
          : {
              strategy: attempt.strategy,
              ok: false,
              reason: attempt.reason,
              error: attempt.error === undefined ? undefined : errorMessage(attempt.error),
            }
      ),
    };

    if (MISSING_EXECUTABLE.test(detail)) {
      return new SnapError(
        ErrorCode.BROWSER_NOT_INSTALLED,
        `No browser executable available: ${detail}`,
        false,
        'Run: npx playwright install chromium (or diagram-snap install-browsers)',
        context,
        cause
      );
    }

    return new SnapError(
      ErrorCode.BROWSER_LAUNCH_FAILED,
      `Failed to launch browser: ${detail}`,
      false,
      `Install Chromium with 'npx playwright install chromium' or point ${CHROME_PATH_ENV} at a Chrome executable`,
      context,
      cause
    );
  }
}
