// src/core/render/types.ts
import type { Browser, BrowserContext, Page } from 'playwright';

export type LaunchStrategyName =
  | 'default'
  | 'executable-path'
  | 'chrome-channel'
  | 'no-sandbox'
  | 'webkit';

export interface LaunchContext {
  env: NodeJS.ProcessEnv;
}

export interface LaunchStrategy {
  name: LaunchStrategyName;
  /** Its error is the one reported when every strategy fails. */
  diagnostic?: boolean;
  /** Resolves null when the strategy does not apply on this host. */
  launch(context: LaunchContext): Promise<Browser | null>;
}

export type LaunchAttempt =
  | { strategy: LaunchStrategyName; ok: true }
  | { strategy: LaunchStrategyName; ok: false; reason: 'skipped' | 'failed'; error?: unknown };

export interface BrowserSession {
  browser: Browser;
  strategy: LaunchStrategyName;
  attempts: LaunchAttempt[];
}

export interface CaptureOptions {
  viewportWidth: number;
  viewportHeight: number;
  deviceScaleFactor: number;
  omitBackground: boolean;
  timeout: number;
  settleDelay: number;
}

export interface CapturedPage {
  context: BrowserContext;
  page: Page;
  screenshotPath: string;
}
