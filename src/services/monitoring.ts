/**
 * Thread monitoring and cancellation.
 * @module services/monitoring
 */

import { z } from 'zod';
import type { OperationCanceller, RequestExecutor } from '../executor/index.js';
import { InvalidResponseError } from '../errors/index.js';
import { collectionValue } from '../utils/index.js';
import { PLAIN_CALL } from './types.js';

const threadSchema = z
  .object({
    ID: z.union([z.number(), z.string()]),
    Type: z.string().optional(),
    Name: z.string().optional(),
    Context: z.string().optional(),
    State: z.string(),
    Function: z.string(),
    ObjectType: z.string().optional(),
    ObjectName: z.string().optional(),
    ElapsedTime: z.string().optional(),
  })
  .passthrough();

/**
 * A server thread as reported by `/Threads`.
 */
export type Tm1Thread = z.infer<typeof threadSchema>;

/**
 * Filter that hides the thread listing itself.
 */
const SELF_FILTER = "Function ne 'GET /api/v1/ActiveSession/Threads'";

/**
 * Service for server threads.
 */
export class MonitoringService implements OperationCanceller {
  constructor(private readonly executor: RequestExecutor) {}

  /**
   * All threads on the server.
   */
  async getThreads(): Promise<Tm1Thread[]> {
    const response = await this.executor.get('/Threads', PLAIN_CALL);
    return parseThreads(response.json());
  }

  /**
   * Threads of the current session, excluding the listing request itself.
   */
  async getActiveSessionThreads(excludeIdle = true): Promise<Tm1Thread[]> {
    let path = `/ActiveSession/Threads?$filter=${SELF_FILTER}`;
    if (excludeIdle) {
      path += " and State ne 'Idle'";
    }
    const response = await this.executor.get(path, PLAIN_CALL);
    return parseThreads(response.json());
  }

  /**
   * Asks the server to cancel the operation running on a thread.
   */
  async cancelThread(id: number | string): Promise<void> {
    await this.executor.post(`/Threads('${id}')/tm1.CancelOperation`, '', PLAIN_CALL);
  }

  /**
   * Cancels the session's running operation, but only when exactly one
   * non-idle thread is found: with several, the one to cancel is unknown.
   */
  async cancelRunningOperation(): Promise<boolean> {
    const threads = await this.getActiveSessionThreads(true);
    const [thread] = threads;
    if (threads.length !== 1 || !thread) {
      return false;
    }
    await this.cancelThread(thread.ID);
    return true;
  }
}

function parseThreads(body: unknown): Tm1Thread[] {
  const parsed = z.array(threadSchema).safeParse(collectionValue(body));
  if (!parsed.success) {
    throw new InvalidResponseError(`Unexpected thread listing: ${parsed.error.message}`);
  }
  return parsed.data;
}
