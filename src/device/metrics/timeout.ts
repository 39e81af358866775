import { ProviderTimeoutError } from '../errors.js';

/**
 * Races a provider call against a timer. The timer is cleared once the race
 * settles, so no handle outlives the call.
 *
 * @throws ProviderTimeoutError when `timeoutMs` elapses first
 */
export async function withTimeout<T>(source: string, timeoutMs: number, task: () => Promise<T>): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const expired = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new ProviderTimeoutError(source, timeoutMs)), timeoutMs);
  });

  try {
    return await Promise.race([task(), expired]);
  } finally {
    clearTimeout(timer);
  }
}
