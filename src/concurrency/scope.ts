/**
 * Scoped acquisition of server-side state.
 * @module concurrency/scope
 */

import type { Logger } from '../observability/index.js';
import { toError } from '../errors/index.js';

/**
 * Something that must be undone after use: a temporarily changed setting, a
 * temporary file, an open change set.
 */
export interface ScopedResource<T> {
  acquire(): Promise<T>;
  release(handle: T): Promise<void>;
}

/**
 * Runs `work` between acquire and release. Release runs on every exit path;
 * when `work` already failed, a release failure is logged so it does not
 * hide the original error.
 */
export async function withScope<T, R>(
  resource: ScopedResource<T>,
  work: (handle: T) => Promise<R>,
  logger: Logger
): Promise<R> {
  const handle = await resource.acquire();
  let result: R;
  try {
    result = await work(handle);
  } catch (error) {
    try {
      await resource.release(handle);
    } catch (releaseError) {
      logger.error('Failed to restore state after an error', { error: toError(releaseError).message });
    }
    throw error;
  }
  await resource.release(handle);
  return result;
}
