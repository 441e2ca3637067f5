import type { Tm1ConfigOptions } from '../config/index.js';
import { createConfig } from '../config/index.js';
import { resolveCredentials } from '../auth/index.js';
import type { Clock, RequestObserver } from '../executor/index.js';
import { RequestExecutor } from '../executor/index.js';
import { NoopLogger } from '../observability/index.js';
import type { Tm1Services } from '../services/index.js';
import { createServices } from '../services/index.js';
import { SessionManager } from '../session/index.js';
import { FakeClock, FakeTransport, TEST_BASE_URL, createServerTransport } from './fake-transport.js';

export * from './fake-transport.js';

export interface TestStack {
  transport: FakeTransport;
  clock: FakeClock;
  session: SessionManager;
  executor: RequestExecutor;
  services: Tm1Services;
}

/**
 * Session, executor and services over a fake server, not yet connected.
 */
export function createTestStack(
  options: Partial<Tm1ConfigOptions> = {},
  extras: { transport?: FakeTransport; clock?: Clock; observer?: RequestObserver } = {}
): TestStack {
  const config = createConfig({ baseUrl: TEST_BASE_URL, user: 'admin', password: 'test-secret', ...options });
  const transport = extras.transport ?? createServerTransport();
  const clock = new FakeClock();
  const logger = new NoopLogger();
  const session = new SessionManager({ config, credentials: resolveCredentials(config), transport, logger });
  const executor = new RequestExecutor({
    config,
    session,
    transport,
    logger,
    clock: extras.clock ?? clock,
    observer: extras.observer,
  });
  const services = createServices(executor, session);
  executor.setOperationCanceller(services.monitoring);
  return { transport, clock, session, executor, services };
}
