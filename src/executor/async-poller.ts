/**
 * Polling of server-side async operations.
 *
 * A request sent with `Prefer: respond-async` is answered with 202 and a
 * `Location` header naming the operation. The operation is polled with a
 * growing interval until it completes or the timeout budget is used up, in
 * which case the operation is cancelled.
 *
 * @module executor/async-poller
 */

import { TimeoutError, TransportError, toError } from '../errors/index.js';
import type { Logger } from '../observability/index.js';
import { isEmbeddedResponse, parseEmbeddedResponse } from '../transport/embedded-response.js';
import type { Tm1Response } from '../transport/response.js';
import { toRestError } from '../transport/response.js';
import { sleep } from '../utils/index.js';

/**
 * Reference to a running server-side operation.
 */
export interface AsyncOperationHandle {
  operationId: string;
  /** Path relative to the service root */
  pollUrl: string;
}

/**
 * Requests the poller needs. Implemented by the request executor.
 */
export interface AsyncStatusClient {
  /** Returns the raw status response without interpreting the status code */
  fetchStatus(handle: AsyncOperationHandle): Promise<Tm1Response>;
  cancel(handle: AsyncOperationHandle): Promise<void>;
}

/**
 * Time source for backoff. Tests substitute a fake.
 */
export interface Clock {
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = { sleep };

/**
 * Seconds to wait between status probes: 0.1, 0.3, 0.6, then 1 second.
 *
 * With a timeout of `t` seconds the schedule ends after `floor(t) - 1`
 * one-second waits, so the waits add up to `t` for whole seconds. Without
 * a timeout it never ends.
 */
export function* waitTimeSchedule(timeout?: number): Generator<number, void, undefined> {
  yield 0.1;
  yield 0.3;
  yield 0.6;
  if (timeout === undefined) {
    while (true) {
      yield 1;
    }
  }
  for (let i = 1; i < Math.floor(timeout); i++) {
    yield 1;
  }
}

/**
 * Reads the operation id from a 202 response's `Location` header, which
 * looks like `/api/v1/_async('abc123')`.
 */
export function extractAsyncId(response: Tm1Response): string | undefined {
  const location = response.header('location');
  if (!location) {
    return undefined;
  }
  const id = location.split("'")[1];
  return id ? id : undefined;
}

/**
 * Builds the handle for an operation id.
 */
export function asyncHandle(operationId: string): AsyncOperationHandle {
  return { operationId, pollUrl: `/_async('${operationId}')` };
}

/**
 * Polls async operations until a terminal state.
 */
export class AsyncOperationPoller {
  constructor(
    private readonly client: AsyncStatusClient,
    private readonly logger: Logger,
    private readonly clock: Clock = systemClock
  ) {}

  /**
   * Probes the operation once.
   *
   * @returns The operation's result, or undefined while it is still running
   * @throws {RestError} If the status endpoint reports an error
   */
  async pollOnce(handle: AsyncOperationHandle): Promise<Tm1Response | undefined> {
    const response = await this.client.fetchStatus(handle);

    if (response.status === 200 || response.status === 201) {
      return isEmbeddedResponse(response.body) ? parseEmbeddedResponse(response.body) : response;
    }
    if (response.status >= 300) {
      throw toRestError(response, 'GET', handle.pollUrl);
    }
    return undefined;
  }

  /**
   * Polls until the operation finishes.
   *
   * @param timeout - Seconds; polls forever when undefined
   * @throws {TimeoutError} After cancelling the operation, once the budget is spent or a
   *   status probe times out
   */
  async waitFor(
    handle: AsyncOperationHandle,
    request: { method: string; url: string; timeout?: number }
  ): Promise<Tm1Response> {
    for (const seconds of waitTimeSchedule(request.timeout)) {
      let result: Tm1Response | undefined;
      try {
        result = await this.pollOnce(handle);
      } catch (error) {
        if (error instanceof TransportError && error.failure === 'timeout') {
          return this.cancelAndTimeOut(handle, request, error);
        }
        throw error;
      }
      if (result) {
        return result;
      }
      await this.clock.sleep(seconds * 1000);
    }

    return this.cancelAndTimeOut(handle, request);
  }

  private async cancelAndTimeOut(
    handle: AsyncOperationHandle,
    request: { method: string; url: string; timeout?: number },
    cause?: Error
  ): Promise<never> {
    await this.cancel(handle);
    throw new TimeoutError(request.method, request.url, request.timeout ?? 0, cause);
  }

  /**
   * Cancels the operation. Failures are logged, not thrown.
   */
  async cancel(handle: AsyncOperationHandle): Promise<void> {
    try {
      await this.client.cancel(handle);
      this.logger.info('Cancelled async operation', { operationId: handle.operationId });
    } catch (error) {
      this.logger.warn('Failed to cancel async operation', {
        operationId: handle.operationId,
        error: toError(error).message,
      });
    }
  }
}
