/**
 * Desktop Tracker Provider
 *
 * Talks to the audience tracker that runs beside the desktop player over its
 * local HTTP API. A tracker that is down or slow is reported as unavailable.
 */

import { z } from 'zod';
import type { TrackerProvider, TrackerStats, TrackerStatus } from '../../types/index.js';
import { createSubsystemLogger, errorMessage } from '../../../logging/subsystem.js';

const log = createSubsystemLogger('device/providers/tracker');

export const DEFAULT_TRACKER_TIMEOUT_MS = 5000;

const statsSchema = z.record(z.unknown());

export class DesktopTrackerProvider implements TrackerProvider {
  private readonly baseUrl: string;

  constructor(
    baseUrl: string,
    private readonly timeoutMs: number = DEFAULT_TRACKER_TIMEOUT_MS,
  ) {
    this.baseUrl = baseUrl.replace(/\/+$/, '');
  }

  async getStatus(): Promise<TrackerStatus> {
    try {
      await this.get('/health');
      return { available: true, status: 'running' };
    } catch (error) {
      log.debug('Tracker health check failed', { url: this.baseUrl, error: errorMessage(error) });
      return { available: false, status: 'not_running' };
    }
  }

  async getStats(): Promise<TrackerStats> {
    try {
      const response = await this.get('/api/stats');
      const stats = statsSchema.parse(await response.json());
      return { available: true, stats };
    } catch (error) {
      const message = errorMessage(error);
      log.warn('Tracker stats unavailable', { url: this.baseUrl, error: message });
      return { available: false, stats: {}, error: message };
    }
  }

  private async get(path: string): Promise<Response> {
    const response = await fetch(`${this.baseUrl}${path}`, {
      signal: AbortSignal.timeout(this.timeoutMs),
    });
    if (!response.ok) {
      throw new Error(`Tracker ${path} answered HTTP ${response.status}`);
    }
    return response;
  }
}
