import { buildApp } from './app';
import { loadServiceConfig } from './config/serviceConfig';

async function main(): Promise<void> {
  const config = loadServiceConfig();
  const { app } = await buildApp({ config });

  try {
    await app.ready();
    await app.listen({ host: config.host, port: config.port });
    app.log.info({ provider: config.inference.provider }, `Ingest API listening on http://${config.host}:${config.port}`);
  } catch (err) {
    app.log.error({ err }, 'Failed to start Ingest API');
    process.exit(1);
  }

  const shutdown = (signal: NodeJS.Signals) => {
    app.log.info({ signal }, 'shutting down');
    app
      .close()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        app.log.error({ err }, 'failed to close cleanly');
        process.exit(1);
      });
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

if (require.main === module) {
  main().catch((err) => {
    console.error('[ingest] unexpected error while starting server', err);
    process.exit(1);
  });
}
