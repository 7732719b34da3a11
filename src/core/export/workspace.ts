// src/core/export/workspace.ts
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { TEMP_DIR_PREFIX } from '../config/constants.js';
import { SnapError, errorMessage } from '../errors.js';
import { ErrorCode } from './types.js';

/**
 * Per-export scratch directory. Everything the export creates for itself
 * lives under `dir`; a caller-supplied HTML path lives outside it and is
 * left in place by `dispose()`.
 */
export class TempWorkspace {
  private disposed = false;

  private constructor(
    readonly dir: string,
    readonly htmlPath: string,
    readonly screenshotPath: string
  ) {}

  static async create(html: string, callerHtmlPath?: string): Promise<TempWorkspace> {
    let dir: string;
    try {
      dir = await fs.mkdtemp(path.join(os.tmpdir(), TEMP_DIR_PREFIX));
    } catch (error) {
      throw new SnapError(
        ErrorCode.FILESYSTEM_ERROR,
        `Failed to create temporary directory: ${errorMessage(error)}`,
        false,
        `Check permissions for ${os.tmpdir()}`,
        undefined,
        error
      );
    }

    const workspace = new TempWorkspace(
      dir,
      callerHtmlPath ? path.resolve(callerHtmlPath) : path.join(dir, 'page.html'),
      path.join(dir, 'capture.png')
    );

    try {
      if (callerHtmlPath) {
        await fs.mkdir(path.dirname(workspace.htmlPath), { recursive: true });
      }
      await fs.writeFile(workspace.htmlPath, html, 'utf8');
    } catch (error) {
      await workspace.dispose();
      throw new SnapError(
        ErrorCode.FILESYSTEM_ERROR,
        `Failed to write HTML to ${workspace.htmlPath}: ${errorMessage(error)}`,
        false,
        `Check permissions for ${path.dirname(workspace.htmlPath)}`,
        { htmlPath: workspace.htmlPath },
        error
      );
    }

    return workspace;
  }

  async dispose(): Promise<void> {
    if (this.disposed) {
      return;
    }
    this.disposed = true;
    await fs.rm(this.dir, { recursive: true, force: true });
  }
}
