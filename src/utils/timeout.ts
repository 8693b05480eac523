/**
 * Timeout wrapper for promises - prevents a hung external call from stalling a turn
 */

import { TimeoutError } from '../core/errors';

export async function pTimeout<T>(promise: Promise<T>, ms: number, label = 'op'): Promise<T> {
  let timeoutId: NodeJS.Timeout | null = null;
  try {
    return await Promise.race([
      promise,
      new Promise<T>((_, reject) => {
        timeoutId = setTimeout(() => reject(new TimeoutError(label, ms)), ms);
      })
    ]);
  } finally {
    if (timeoutId) clearTimeout(timeoutId);
  }
}
