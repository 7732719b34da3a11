// src/core/render/page.ts
import type { Browser, Page } from 'playwright';
import { pathToFileURL } from 'url';
import { SVG_READY_TIMEOUT } from '../config/constants.js';
import { SnapError, errorMessage } from '../errors.js';
import { ErrorCode } from '../export/types.js';
import type { CaptureOptions, CapturedPage } from './types.js';

export class PageCapturer {
  constructor(private browser: Browser) {}

  /**
   * Loads the HTML file in a fresh context and writes a full-page PNG.
   * The returned context stays open so the caller can still query the page;
   * the caller closes it.
   */
  async capture(htmlPath: string, screenshotPath: string, options: CaptureOptions): Promise<CapturedPage> {
    const context = await this.browser.newContext({
      viewport: { width: options.viewportWidth, height: options.viewportHeight },
      deviceScaleFactor: options.deviceScaleFactor,
    });

    try {
      const page = await context.newPage();

      try {
        await page.goto(pathToFileURL(htmlPath).href, {
          waitUntil: 'networkidle',
          timeout: options.timeout,
        });
      } catch (error) {
        throw new SnapError(
          ErrorCode.NAVIGATION_FAILED,
          `Failed to load ${htmlPath}: ${errorMessage(error)}`,
          true,
          'Check that the HTML does not wait on unreachable network resources',
          { htmlPath },
          error
        );
      }

      // Animations and late layout
      await page.waitForTimeout(options.settleDelay);
      await this.waitForScriptedSvg(page);

      try {
        await page.screenshot({
          path: screenshotPath,
          fullPage: true,
          omitBackground: options.omitBackground,
        });
      } catch (error) {
        throw new SnapError(
          ErrorCode.CAPTURE_FAILED,
          `Failed to capture screenshot: ${errorMessage(error)}`,
          true,
          undefined,
          { screenshotPath },
          error
        );
      }

      return { context, page, screenshotPath };
    } catch (error) {
      await context.close();
      throw error;
    }
  }

  /**
   * Some templates draw their SVG from script after load. Waits are
   * best-effort; pages without these hooks pass straight through.
   */
  private async waitForScriptedSvg(page: Page): Promise<void> {
    await page
      .waitForFunction(
        () => {
          const container = document.querySelector('#board-game-container');
          if (!container) return true;
          const svg = container.querySelector('svg');
          return svg !== null && svg.children.length > 0;
        },
        undefined,
        { timeout: SVG_READY_TIMEOUT }
      )
      .catch(() => undefined);

    await page
      .waitForFunction(
        () => {
          const mockups = Array.from(document.querySelectorAll('[id^="mockup-"]'));
          return mockups.every(mockup => {
            const svg = mockup.querySelector('svg');
            return svg !== null && svg.children.length > 0;
          });
        },
        undefined,
        { timeout: SVG_READY_TIMEOUT }
      )
      .catch(() => undefined);
  }
}
