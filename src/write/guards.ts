/**
 * Server-side state held for the duration of a write.
 * @module write/guards
 */

import type { ScopedResource } from '../concurrency/index.js';
import type { Logger } from '../observability/index.js';
import type { CellService } from '../services/cells.js';
import type { CubeService } from '../services/cubes.js';

/**
 * Turns logging off for a cube and back on afterwards, if it was on.
 * The handle is whether logging was enabled before.
 */
export class TransactionLogSuppression implements ScopedResource<boolean> {
  constructor(
    private readonly cubes: CubeService,
    private readonly cube: string,
    private readonly logger: Logger
  ) {}

  async acquire(): Promise<boolean> {
    const enabled = await this.cubes.getTransactionLogging(this.cube);
    if (enabled) {
      await this.cubes.setTransactionLogging(this.cube, false);
      this.logger.debug('Suspended transaction log', { cube: this.cube });
    }
    return enabled;
  }

  async release(wasEnabled: boolean): Promise<void> {
    if (!wasEnabled) {
      return;
    }
    await this.cubes.setTransactionLogging(this.cube, true);
    this.logger.debug('Restored transaction log', { cube: this.cube });
  }
}

/**
 * Change set that tags every direct write of one call, so the server can
 * undo them together.
 */
export class ChangesetScope implements ScopedResource<string> {
  constructor(private readonly cells: CellService) {}

  acquire(): Promise<string> {
    return this.cells.beginChangeset();
  }

  release(changeset: string): Promise<void> {
    return this.cells.endChangeset(changeset);
  }
}
