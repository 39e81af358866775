/**
 * Desktop camera provider
 *
 * Lists cameras through `system_profiler` and captures a still with
 * `imagesnap` when it is installed in one of the platform's bin paths.
 */

import { readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { z } from 'zod';
import type { CameraInfo, CameraProvider } from '../../types/index.js';
import { createSubsystemLogger, errorMessage } from '../../../logging/subsystem.js';
import { findBinary } from '../system/binaries.js';
import { runCommand } from '../system/command.js';

const log = createSubsystemLogger('device/providers/camera');

const cameraListSchema = z.object({
  SPCameraDataType: z
    .array(
      z.object({
        _name: z.string(),
        'spcamera_unique-id': z.string().optional(),
      }),
    )
    .default([]),
});

export function parseCameraList(json: string): CameraInfo['devices'] {
  const parsed = cameraListSchema.safeParse(JSON.parse(json));
  if (!parsed.success) {
    return [];
  }
  return parsed.data.SPCameraDataType.map(camera => ({
    id: camera['spcamera_unique-id'] ?? camera._name,
    name: camera._name,
  }));
}

export class DesktopCameraProvider implements CameraProvider {
  constructor(
    private readonly binPaths: string[],
    private readonly timeoutMs?: number,
  ) {}

  async getCameraInfo(): Promise<CameraInfo> {
    try {
      const output = await runCommand('system_profiler', ['SPCameraDataType', '-json'], { timeoutMs: this.timeoutMs });
      const devices = parseCameraList(output);
      return { available: devices.length > 0, devices };
    } catch (error) {
      log.warn('Failed to list cameras', { error: errorMessage(error) });
      return { available: false, devices: [] };
    }
  }

  async captureImage(): Promise<Buffer> {
    const imagesnap = await findBinary('imagesnap', this.binPaths);
    if (!imagesnap) {
      throw new Error(`imagesnap not found in ${this.binPaths.join(', ')}`);
    }

    const file = join(tmpdir(), `camera-${Date.now()}.jpg`);
    try {
      await runCommand(imagesnap, ['-q', '-w', '1', file], { timeoutMs: this.timeoutMs });
      return await readFile(file);
    } finally {
      await rm(file, { force: true });
    }
  }
}
