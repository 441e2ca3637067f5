/**
 * Security lookups of the session user.
 * @module services/security
 */

import { z } from 'zod';
import type { RequestExecutor } from '../executor/index.js';
import type { GroupSource } from '../session/index.js';
import { collectionValue } from '../utils/index.js';
import { PLAIN_CALL } from './types.js';

const groupSchema = z.object({ Name: z.string() });

/**
 * Service for the active user's security context.
 */
export class SecurityService implements GroupSource {
  constructor(private readonly executor: RequestExecutor) {}

  /**
   * Names of the groups the session user belongs to.
   */
  async activeUserGroups(): Promise<string[]> {
    const response = await this.executor.get('/ActiveUser/Groups?$select=Name', PLAIN_CALL);
    return collectionValue(response.json()).flatMap((entry) => {
      const parsed = groupSchema.safeParse(entry);
      return parsed.success ? [parsed.data.Name] : [];
    });
  }
}
