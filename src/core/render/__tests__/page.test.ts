import { describe, it, expect, beforeEach, jest } from '@jest/globals';
import type { Browser } from 'playwright';
import { pathToFileURL } from 'url';
import { PageCapturer } from '../page.js';
import { SnapError } from '../../errors.js';
import { ErrorCode } from '../../export/types.js';
import type { CaptureOptions } from '../types.js';

describe('PageCapturer', () => {
  const options: CaptureOptions = {
    viewportWidth: 1200,
    viewportHeight: 627,
    deviceScaleFactor: 2,
    omitBackground: true,
    timeout: 15000,
    settleDelay: 250,
  };

  const mockResolved = <T>(value: T) => {
    return jest.fn(() => Promise.resolve(value)) as jest.Mock;
  };

  let page: {
    goto: jest.Mock;
    waitForTimeout: jest.Mock;
    waitForFunction: jest.Mock;
    screenshot: jest.Mock;
  };
  let context: { newPage: jest.Mock; close: jest.Mock };
  let browser: { newContext: jest.Mock };

  beforeEach(() => {
    page = {
      goto: mockResolved(null),
      waitForTimeout: mockResolved(undefined),
      waitForFunction: mockResolved(true),
      screenshot: mockResolved(Buffer.alloc(0)),
    };
    context = {
      newPage: mockResolved(page),
      close: mockResolved(undefined),
    };
    browser = { newContext: mockResolved(context) };
  });

  const capturer = () => new PageCapturer(browser as unknown as Browser);

  it('captures a full-page screenshot at the requested viewport and scale', async () => {
    const captured = await capturer().capture('/tmp/snap/page.html', '/tmp/snap/capture.png', options);

    expect(browser.newContext).toHaveBeenCalledWith({
      viewport: { width: 1200, height: 627 },
      deviceScaleFactor: 2,
    });
    expect(page.goto).toHaveBeenCalledWith(pathToFileURL('/tmp/snap/page.html').href, {
      waitUntil: 'networkidle',
      timeout: 15000,
    });
    expect(page.waitForTimeout).toHaveBeenCalledWith(250);
    expect(page.screenshot).toHaveBeenCalledWith({
      path: '/tmp/snap/capture.png',
      fullPage: true,
      omitBackground: true,
    });
    expect(captured.page).toBe(page);
    expect(captured.context).toBe(context);
    expect(captured.screenshotPath).toBe('/tmp/snap/capture.png');
    expect(context.close).not.toHaveBeenCalled();
  });

  it('waits for script-rendered SVG without failing when it never appears', async () => {
    page.waitForFunction = jest.fn(() => Promise.reject(new Error('Timeout 3000ms exceeded'))) as jest.Mock;

    await capturer().capture('/tmp/snap/page.html', '/tmp/snap/capture.png', options);

    expect(page.waitForFunction).toHaveBeenCalledTimes(2);
    expect(page.waitForFunction).toHaveBeenCalledWith(expect.any(Function), undefined, { timeout: 3000 });
    expect(page.screenshot).toHaveBeenCalledTimes(1);
  });

  it('raises NAVIGATION_FAILED and closes the context when loading fails', async () => {
    page.goto = jest.fn(() => Promise.reject(new Error('net::ERR_FILE_NOT_FOUND'))) as jest.Mock;

    const error = await capturer()
      .capture('/tmp/snap/page.html', '/tmp/snap/capture.png', options)
      .then(() => undefined, (reason: unknown) => reason);

    expect(error).toBeInstanceOf(SnapError);
    expect(error).toMatchObject({
      code: ErrorCode.NAVIGATION_FAILED,
      message: 'Failed to load /tmp/snap/page.html: net::ERR_FILE_NOT_FOUND',
    });
    expect(page.screenshot).not.toHaveBeenCalled();
    expect(context.close).toHaveBeenCalledTimes(1);
  });

  it('raises CAPTURE_FAILED when the screenshot fails', async () => {
    page.screenshot = jest.fn(() => Promise.reject(new Error('Target closed'))) as jest.Mock;

    await expect(
      capturer().capture('/tmp/snap/page.html', '/tmp/snap/capture.png', options)
    ).rejects.toMatchObject({
      code: ErrorCode.CAPTURE_FAILED,
      message: 'Failed to capture screenshot: Target closed',
    });
    expect(context.close).toHaveBeenCalledTimes(1);
  });
});
