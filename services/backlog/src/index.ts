import { loadConfig, type AppConfig } from './config';
import { buildApp } from './server';
import { LmdbRecordStore } from './storage/lmdbRecordStore';

/**
 * Main entrypoint for the backlog webhook.
 * Loads config, opens the store, registers health + webhook routes, and listens on configured host/port.
 */
async function main() {
  let config: AppConfig;
  try {
    config = loadConfig();
  } catch (err) {
    console.error(err instanceof Error ? err.message : err);
    process.exit(1);
  }

  const store = await LmdbRecordStore.open(config.db.path, { timeoutMs: config.db.lockTimeoutMs });
  const app = await buildApp({
    store,
    token: config.token,
    webhookPath: config.webhookPath,
    slashCommand: config.slashCommand,
    logger: { level: config.logLevel },
  });
  app.addHook('onClose', async () => {
    await store.close();
  });

  const shutdown = (signal: NodeJS.Signals) => {
    app.log.info({ signal }, 'Shutting down');
    app.close().then(
      () => process.exit(0),
      (err: unknown) => {
        app.log.error({ err }, 'Shutdown failed');
        process.exit(1);
      },
    );
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  // --- Start server ---
  try {
    await app.listen({ port: config.port, host: config.host });
    app.log.info(`Backlog webhook listening on http://${config.host}:${config.port}${config.webhookPath}`);
  } catch (err) {
    app.log.error({ err }, 'Server startup failed');
    await app.close();
    process.exit(1);
  }
}

// run
main().catch((err) => {
  // last-resort catch, e.g. the store file is locked by another process
  console.error('Fatal error starting backlog webhook:', err);
  process.exit(1);
});
