import { BulkSelectionService, TokenSweeper, systemClock } from 'bulk-select';
import { ConfigError, loadConfig } from './config.js';
import type { InboxConfig } from './config.js';
import { createStores, initializeSchema } from './store.js';
import { MESSAGE_FIELDS } from './domain/messages.js';
import { ActionRegistry } from './features/bulk-actions/registry.js';
import { registerMessageActions } from './features/bulk-actions/message-actions.js';
import { buildServer } from './api/server.js';

let config: InboxConfig;
try {
  config = loadConfig();
} catch (err) {
  if (!(err instanceof ConfigError)) throw err;
  console.error(`Error: ${err.message}`);
  process.exit(1);
}

const stores = createStores(config.databaseUrl, systemClock, config.tokenTtlMs);
await initializeSchema(stores);

const service = new BulkSelectionService({
  tokens: stores.tokens,
  records: stores.records,
  schema: MESSAGE_FIELDS,
  batchSize: config.resolveBatchSize,
  onRetry: (operation, attempt, err, nextDelayMs) => {
    app.log.warn({ err, operation, attempt, nextDelayMs }, 'retrying selection token store');
  },
  onError: (operation, err) => {
    app.log.error({ err, operation }, 'selection service operation failed');
  },
});
const registry = registerMessageActions(new ActionRegistry(), stores.pool);

const app = buildServer(
  {
    service,
    registry,
    jobs: stores.jobs,
    clock: systemClock,
    ping: async () => {
      await stores.pool.query('SELECT 1');
    },
  },
  config,
  { level: config.logLevel },
);

const abandoned = await stores.jobs.abandonRunning(systemClock.now());
if (abandoned > 0) app.log.warn({ abandoned }, 'marked bulk actions left running by a previous process as interrupted');

const sweeper = new TokenSweeper({
  store: stores.tokens,
  intervalMs: config.purgeIntervalMs,
  onPurged: (count) => {
    if (count > 0) app.log.info({ count }, 'purged expired selection tokens');
  },
  onError: (err) => app.log.error({ err }, 'purge of expired selection tokens failed'),
});
sweeper.start();

try {
  await app.listen({ port: config.port, host: config.host });
} catch (err) {
  app.log.error(err);
  await sweeper.stop();
  await stores.pool.end();
  process.exit(1);
}

process.on('SIGTERM', async () => {
  await sweeper.stop();
  await app.close();
  await stores.pool.end();
});
