import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { DesktopTrackerProvider } from './desktop-tracker-provider.js';

const mockFetch = vi.fn<typeof fetch>();

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json' },
  });
}

describe('DesktopTrackerProvider', () => {
  beforeEach(() => {
    mockFetch.mockReset();
    vi.stubGlobal('fetch', mockFetch);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  describe('getStatus', () => {
    it('should report a tracker that answers its health check as running', async () => {
      mockFetch.mockResolvedValue(jsonResponse({ status: 'ok' }));

      await expect(new DesktopTrackerProvider('http://localhost:8080/').getStatus()).resolves.toEqual({
        available: true,
        status: 'running',
      });
      expect(mockFetch.mock.calls[0]?.[0]).toBe('http://localhost:8080/health');
    });

    it('should report a refused connection as not running', async () => {
      mockFetch.mockRejectedValue(new TypeError('fetch failed'));

      await expect(new DesktopTrackerProvider('http://localhost:8080').getStatus()).resolves.toEqual({
        available: false,
        status: 'not_running',
      });
    });

    it('should report an error status as not running', async () => {
      mockFetch.mockResolvedValue(jsonResponse({}, 503));

      const status = await new DesktopTrackerProvider('http://localhost:8080').getStatus();

      expect(status.available).toBe(false);
    });
  });

  describe('getStats', () => {
    it('should return the tracker counters', async () => {
      mockFetch.mockResolvedValue(jsonResponse({ visitors: 42, impressions: 310 }));

      await expect(new DesktopTrackerProvider('http://localhost:8080').getStats()).resolves.toEqual({
        available: true,
        stats: { visitors: 42, impressions: 310 },
      });
      expect(mockFetch.mock.calls[0]?.[0]).toBe('http://localhost:8080/api/stats');
    });

    it('should pass a timeout signal to every request', async () => {
      mockFetch.mockResolvedValue(jsonResponse({}));

      await new DesktopTrackerProvider('http://localhost:8080', 250).getStats();

      expect(mockFetch.mock.calls[0]?.[1]?.signal).toBeInstanceOf(AbortSignal);
    });

    it('should report a timed out request as unavailable', async () => {
      mockFetch.mockRejectedValue(
        Object.assign(new Error('The operation was aborted due to timeout'), { name: 'TimeoutError' }),
      );

      await expect(new DesktopTrackerProvider('http://localhost:8080').getStats()).resolves.toEqual({
        available: false,
        stats: {},
        error: 'The operation was aborted due to timeout',
      });
    });

    it('should reject a payload that is not an object', async () => {
      mockFetch.mockResolvedValue(jsonResponse([1, 2, 3]));

      const stats = await new DesktopTrackerProvider('http://localhost:8080').getStats();

      expect(stats.available).toBe(false);
      expect(stats.stats).toEqual({});
    });
  });
});
