import { PluginTimeoutError } from './errors.js';

export const DEFAULT_TIMEOUT_MS = 30_000;

/** Race `work` against a timer; the timer is cleared once either side settles. */
export async function withTimeout<T>(
  work: Promise<T>,
  plugin: string,
  step: string,
  timeoutMs: number,
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  try {
    return await Promise.race([
      work,
      new Promise<never>((_, reject) => {
        timer = setTimeout(() => reject(new PluginTimeoutError(plugin, step, timeoutMs)), timeoutMs);
      }),
    ]);
  } finally {
    clearTimeout(timer);
  }
}
