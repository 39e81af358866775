/**
 * Captures the appliance's display with `scrot`
 */

import { mkdir, readFile, rm } from 'node:fs/promises';
import { join } from 'node:path';
import type { ScreenshotProvider } from '../../types/index.js';
import { findBinary } from '../system/binaries.js';
import { runCommand } from '../system/command.js';

export interface ScreenshotOptions {
  outputDir: string;
  binPaths: string[];
  display?: string;
  timeoutMs?: number;
}

export class ApplianceScreenshotProvider implements ScreenshotProvider {
  constructor(private readonly options: ScreenshotOptions) {}

  async captureScreenshot(): Promise<Buffer> {
    const scrot = await findBinary('scrot', this.options.binPaths);
    if (!scrot) {
      throw new Error(`scrot not found in ${this.options.binPaths.join(', ')}`);
    }

    await mkdir(this.options.outputDir, { recursive: true });
    const file = join(this.options.outputDir, `screenshot-${Date.now()}.png`);

    try {
      await runCommand(scrot, ['--overwrite', file], {
        timeoutMs: this.options.timeoutMs,
        env: { DISPLAY: this.options.display ?? ':0' },
      });
      return await readFile(file);
    } finally {
      await rm(file, { force: true });
    }
  }
}
