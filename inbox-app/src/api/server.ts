import Fastify from 'fastify';
import type { FastifyServerOptions } from 'fastify';
import type { BulkSelectionService, Clock } from 'bulk-select';
import { registerErrorHandler } from './middleware/error-handler.js';
import { registerSelectionRoutes } from '../features/selections/routes.js';
import { registerBulkActionRoutes } from '../features/bulk-actions/routes.js';
import { registerHealthRoutes } from '../features/health/routes.js';
import { BulkJobRunner } from '../features/bulk-actions/job-runner.js';
import type { ActionRegistry } from '../features/bulk-actions/registry.js';
import type { BulkJobStore } from '../features/bulk-actions/job-store.js';

export interface ServerDeps {
  service: BulkSelectionService;
  registry: ActionRegistry;
  jobs: BulkJobStore;
  clock: Clock;
  /** Throws when the database is unreachable. */
  ping: () => Promise<void>;
}

export interface ServerSettings {
  tokenTtlMs: number;
  tokenSingleUse: boolean;
  syncThreshold: number;
  bulkConcurrency: number;
  bulkTimeoutMs: number;
}

export function buildServer(
  deps: ServerDeps,
  settings: ServerSettings,
  logger: FastifyServerOptions['logger'] = true,
) {
  const app = Fastify({ logger });

  registerErrorHandler(app);

  const runner = new BulkJobRunner({
    service: deps.service,
    jobs: deps.jobs,
    log: app.log,
    clock: deps.clock,
    concurrency: settings.bulkConcurrency,
    timeoutMs: settings.bulkTimeoutMs,
  });
  // Background jobs record an aborted result before the pools close
  app.addHook('onClose', async () => {
    await runner.stop();
  });

  const prefix = '/api/v1';

  app.register(async (instance) => {
    await registerSelectionRoutes(instance, deps.service, settings);
    await registerBulkActionRoutes(instance, {
      service: deps.service,
      registry: deps.registry,
      runner,
      jobs: deps.jobs,
      syncThreshold: settings.syncThreshold,
    });
    await registerHealthRoutes(instance, deps.ping);
  }, { prefix });

  return app;
}
