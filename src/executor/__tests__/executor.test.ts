import { describe, expect, it } from 'vitest';
import { RestError, TimeoutError, TransportError } from '../../errors/index.js';
import { Tm1Response } from '../../transport/response.js';
import type { RequestContext, RequestObserver, RequestState } from '../index.js';
import { TEST_BASE_URL, createServerTransport, createTestStack, json } from '../../__mocks__/index.js';

const VERSION_PATH = '/Configuration/ProductVersion/$value';
const CUBES = `${TEST_BASE_URL}/Cubes`;

function recorder(): RequestObserver & { transitions: string[] } {
  const transitions: string[] = [];
  return {
    transitions,
    onTransition(context: RequestContext, from: RequestState, to: RequestState) {
      transitions.push(`${context.method} ${from}->${to}`);
    },
  };
}

describe('RequestExecutor', () => {
  describe('session expiry', () => {
    it('should reconnect once and retry once after a 401', async () => {
      const transport = createServerTransport()
        .once('GET', CUBES, () => Tm1Response.of(401))
        .on('GET', CUBES, () => json(200, { value: [] }));
      const { session, executor } = createTestStack({}, { transport });
      await session.connect();

      const response = await executor.get('/Cubes');

      expect(response.status).toBe(200);
      expect(transport.sent('GET', VERSION_PATH)).toHaveLength(2);
      const [first, retry] = transport.sent('GET', CUBES);
      expect(first?.headers['Cookie']).toBe('TM1SessionId=session-1');
      expect(retry?.headers['Cookie']).toBe('TM1SessionId=session-2');
    });

    it('should surface a second 401 as RestError', async () => {
      const transport = createServerTransport().on('GET', CUBES, () => Tm1Response.of(401));
      const { session, executor } = createTestStack({}, { transport });
      await session.connect();

      await expect(executor.get('/Cubes')).rejects.toMatchObject({ name: 'RestError', statusCode: 401 });
      expect(transport.sent('GET', CUBES)).toHaveLength(2);
      expect(transport.sent('GET', VERSION_PATH)).toHaveLength(2);
    });

    it('should not reconnect when disabled', async () => {
      const transport = createServerTransport().on('GET', CUBES, () => Tm1Response.of(401));
      const { session, executor } = createTestStack({ reconnectOnSessionTimeout: false }, { transport });
      await session.connect();

      await expect(executor.get('/Cubes')).rejects.toBeInstanceOf(RestError);
      expect(transport.sent('GET', CUBES)).toHaveLength(1);
      expect(transport.sent('GET', VERSION_PATH)).toHaveLength(1);
    });
  });

  describe('remote disconnect', () => {
    const disconnect = (method: 'GET' | 'POST') => () => {
      throw new TransportError('disconnected', method, CUBES, new Error('other side closed'));
    };

    it('should rebuild the pool and retry an idempotent request', async () => {
      const transport = createServerTransport()
        .once('GET', CUBES, disconnect('GET'))
        .on('GET', CUBES, () => json(200, { value: [] }));
      const { session, executor } = createTestStack({}, { transport });
      await session.connect();

      const response = await executor.get('/Cubes');

      expect(response.status).toBe(200);
      expect(transport.reset).toHaveBeenCalledTimes(1);
      expect(transport.sent('GET', CUBES)).toHaveLength(2);
    });

    it('should never resend a non-idempotent request', async () => {
      const transport = createServerTransport().on('POST', CUBES, disconnect('POST'));
      const { session, executor } = createTestStack({}, { transport });
      await session.connect();

      await expect(executor.post('/Cubes', { Name: 'Sales' })).rejects.toMatchObject({ failure: 'disconnected' });
      expect(transport.sent('POST', CUBES)).toHaveLength(1);
      expect(transport.reset).not.toHaveBeenCalled();
    });

    it('should resend a POST the caller marked idempotent', async () => {
      const transport = createServerTransport()
        .once('POST', CUBES, disconnect('POST'))
        .on('POST', CUBES, () => json(201, { Name: 'Sales' }));
      const { session, executor } = createTestStack({}, { transport });
      await session.connect();

      const response = await executor.post('/Cubes', { Name: 'Sales' }, { idempotent: true });

      expect(response.status).toBe(201);
      expect(transport.sent('POST', CUBES)).toHaveLength(2);
    });
  });

  describe('timeouts', () => {
    const timeout = () => {
      throw new TransportError('timeout', 'GET', CUBES, new Error('aborted'));
    };

    it('should cancel the single running thread and raise TimeoutError', async () => {
      const transport = createServerTransport()
        .on('GET', CUBES, timeout)
        .on('GET', '/ActiveSession/Threads', () =>
          json(200, { value: [{ ID: 17, State: 'Run', Function: 'GET /api/v1/Cubes' }] })
        )
        .on('POST', "/Threads('17')/tm1.CancelOperation", () => Tm1Response.of(204));
      const { session, executor } = createTestStack({ timeout: 2, cancelAtTimeout: true }, { transport });
      await session.connect();

      const attempt = executor.get('/Cubes');

      await expect(attempt).rejects.toBeInstanceOf(TimeoutError);
      await expect(attempt).rejects.toMatchObject({ method: 'GET', url: CUBES, timeout: 2 });
      expect(transport.sent('POST', 'tm1.CancelOperation')).toHaveLength(1);
      expect(transport.sent('GET', CUBES)[0]?.timeoutMs).toBe(2000);
    });

    it('should not guess when several threads are running', async () => {
      const transport = createServerTransport()
        .on('GET', CUBES, timeout)
        .on('GET', '/ActiveSession/Threads', () =>
          json(200, {
            value: [
              { ID: 17, State: 'Run', Function: 'GET /api/v1/Cubes' },
              { ID: 18, State: 'Run', Function: 'POST /api/v1/ExecuteMDX' },
            ],
          })
        );
      const { session, executor } = createTestStack({ timeout: 2, cancelAtTimeout: true }, { transport });
      await session.connect();

      await expect(executor.get('/Cubes')).rejects.toBeInstanceOf(TimeoutError);
      expect(transport.sent('POST', 'tm1.CancelOperation')).toHaveLength(0);
    });

    it('should leave server threads alone without cancelAtTimeout', async () => {
      const transport = createServerTransport().on('GET', CUBES, timeout);
      const { session, executor } = createTestStack({ timeout: 2 }, { transport });
      await session.connect();

      await expect(executor.get('/Cubes')).rejects.toBeInstanceOf(TimeoutError);
      expect(transport.sent('GET', '/ActiveSession/Threads')).toHaveLength(0);
    });
  });

  describe('async mode', () => {
    it('should poll the operation until it completes', async () => {
      const embedded = 'HTTP/1.1 201 Created\r\nContent-Type: application/json\r\n\r\n{"ok":true}';
      const transport = createServerTransport()
        .on('POST', '/ExecuteProcessWithReturn', () =>
          Tm1Response.of(202, '', { Location: "/api/v1/_async('op1')" })
        )
        .once('GET', "/_async('op1')", () => Tm1Response.of(202))
        .on('GET', "/_async('op1')", () => Tm1Response.of(200, embedded));
      const { session, executor, clock } = createTestStack({ asyncRequestsMode: true }, { transport });
      await session.connect();

      const response = await executor.post('/ExecuteProcessWithReturn?$expand=*', { Process: {} });

      expect(response.status).toBe(201);
      expect(response.json()).toEqual({ ok: true });
      expect(transport.sent('POST', '/ExecuteProcessWithReturn')[0]?.headers['Prefer']).toBe('respond-async');
      expect(transport.sent('GET', '_async')[0]?.headers['Prefer']).toBeUndefined();
      expect(clock.sleeps).toEqual([100]);
    });

    it('should cancel and raise TimeoutError when the operation outlives the timeout', async () => {
      const transport = createServerTransport()
        .on('POST', '/ExecuteProcessWithReturn', () =>
          Tm1Response.of(202, '', { Location: "/api/v1/_async('op2')" })
        )
        .on('GET', "/_async('op2')", () => Tm1Response.of(202))
        .on('DELETE', "/_async('op2')", () => Tm1Response.of(204));
      const { session, executor, clock } = createTestStack({ asyncRequestsMode: true, timeout: 5 }, { transport });
      await session.connect();

      const attempt = executor.post('/ExecuteProcessWithReturn?$expand=*', { Process: {} });

      await expect(attempt).rejects.toMatchObject({ name: 'TimeoutError', timeout: 5 });
      expect(transport.sent('GET', "/_async('op2')")).toHaveLength(7);
      expect(transport.sent('DELETE', "/_async('op2')")).toHaveLength(1);
      expect(clock.sleeps).toEqual([100, 300, 600, 1000, 1000, 1000, 1000]);
    });

    it('should hand out a handle for manual polling', async () => {
      const transport = createServerTransport()
        .on('POST', '/Cubes', () => Tm1Response.of(202, '', { Location: "/api/v1/_async('op3')" }))
        .on('GET', "/_async('op3')", () => Tm1Response.of(200, 'HTTP/1.1 500 Internal Server Error\r\n\r\nboom'));
      const { session, executor } = createTestStack({}, { transport });
      await session.connect();

      const handle = await executor.startAsync('POST', '/Cubes', { Name: 'Sales' });

      expect(handle).toEqual({ operationId: 'op3', pollUrl: "/_async('op3')" });
      if ('operationId' in handle) {
        await expect(executor.pollAsync(handle)).rejects.toMatchObject({ statusCode: 500 });
      }
    });
  });

  describe('lookup', () => {
    it('should report a missing resource without throwing', async () => {
      const transport = createServerTransport().on('GET', "/Cubes('Sales')", () => json(200, { Name: 'Sales' }));
      const { session, executor } = createTestStack({}, { transport });
      await session.connect();

      const missing = await executor.lookup("/Cubes('Budget')");
      const found = await executor.lookup("/Cubes('Sales')");

      expect(missing).toEqual({ found: false });
      expect(found.found).toBe(true);
    });
  });

  describe('observer', () => {
    it('should report state transitions', async () => {
      const observer = recorder();
      const transport = createServerTransport()
        .once('GET', CUBES, () => Tm1Response.of(401))
        .on('GET', CUBES, () => json(200, { value: [] }))
        .on('GET', '/Dimensions', () => {
          throw new TransportError('network', 'GET', `${TEST_BASE_URL}/Dimensions`, new Error('refused'));
        });
      const { session, executor } = createTestStack({}, { transport, observer });
      await session.connect();

      await executor.get('/Cubes');
      await expect(executor.get('/Dimensions')).rejects.toBeInstanceOf(TransportError);

      expect(observer.transitions).toEqual([
        'GET pending->dispatched',
        'GET dispatched->completed',
        'GET pending->dispatched',
        'GET dispatched->failed_transport',
      ]);
    });

    it('should freeze request contexts', () => {
      const { executor } = createTestStack();
      const context = executor.createContext('GET', "/Cubes('Sales Plan')");

      expect(Object.isFrozen(context)).toBe(true);
      expect(context.url).toBe(`${TEST_BASE_URL}/Cubes('Sales%20Plan')`);
      expect(context.idempotent).toBe(true);
      expect(executor.createContext('POST', '/Cubes').idempotent).toBe(false);
    });
  });
});
