import { describe, expect, it, vi } from 'vitest';
import { NoopLogger } from '../../observability/index.js';
import type { ScopedResource } from '../scope.js';
import { withScope } from '../scope.js';

function resource(releaseError?: Error): ScopedResource<string> & { released: string[] } {
  const released: string[] = [];
  return {
    released,
    acquire: async () => 'handle',
    release: async (handle) => {
      released.push(handle);
      if (releaseError) {
        throw releaseError;
      }
    },
  };
}

describe('withScope', () => {
  it('should release after the work succeeds', async () => {
    const scoped = resource();

    const result = await withScope(scoped, async (handle) => `${handle}-used`, new NoopLogger());

    expect(result).toBe('handle-used');
    expect(scoped.released).toEqual(['handle']);
  });

  it('should release and rethrow when the work fails', async () => {
    const scoped = resource();

    await expect(
      withScope(
        scoped,
        async () => {
          throw new Error('work failed');
        },
        new NoopLogger()
      )
    ).rejects.toThrow('work failed');
    expect(scoped.released).toEqual(['handle']);
  });

  it('should keep the work error when release also fails', async () => {
    const scoped = resource(new Error('release failed'));
    const logger = new NoopLogger();
    const error = vi.spyOn(logger, 'error');

    await expect(
      withScope(
        scoped,
        async () => {
          throw new Error('work failed');
        },
        logger
      )
    ).rejects.toThrow('work failed');
    expect(error).toHaveBeenCalledWith('Failed to restore state after an error', { error: 'release failed' });
  });

  it('should surface a release failure after successful work', async () => {
    const scoped = resource(new Error('release failed'));

    await expect(withScope(scoped, async () => 1, new NoopLogger())).rejects.toThrow('release failed');
  });
});
