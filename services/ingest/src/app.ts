import Fastify from 'fastify';
import { loadServiceConfig, type ServiceConfig } from './config/serviceConfig';
import { closePool, ensureSchemaReady, withConnection } from './db/client';
import { createPostgresStores } from './db/stores';
import { createHttpErrorHandler } from './errors/errorHandler';
import { createEtlEngine } from './etl/engine';
import { createHeuristicMappingProvider } from './inference/heuristicProvider';
import { createOpenAiMappingProvider } from './inference/openAiProvider';
import { createMappingInferenceService } from './inference/service';
import type { MappingInferenceProvider } from './inference/types';
import { createDatasetController } from './lifecycle/controller';
import { createLoggerOptions } from './logger';
import { createLifecycleObserver, metricsPlugin } from './plugins/metrics';
import { registerDatasetRoutes } from './routes/datasets';
import { registerNormalizedRoutes } from './routes/normalized';
import { registerSystemRoutes } from './routes/system';
import type { IngestStores } from './stores/types';

export type BuildAppOptions = {
  config?: ServiceConfig;
  /** Replaces the Postgres-backed stores; the schema is then not touched. */
  stores?: IngestStores;
  inferenceProvider?: MappingInferenceProvider;
  fetchImpl?: typeof fetch;
};

function createInferenceProvider(config: ServiceConfig, fetchImpl?: typeof fetch): MappingInferenceProvider {
  const { inference } = config;
  if (inference.provider === 'openai' && inference.openAi.apiKey) {
    return createOpenAiMappingProvider({
      apiKey: inference.openAi.apiKey,
      baseUrl: inference.openAi.baseUrl,
      model: inference.openAi.model,
      fetchImpl
    });
  }
  return createHeuristicMappingProvider();
}

export async function buildApp(options?: BuildAppOptions) {
  const config = options?.config ?? loadServiceConfig();
  const usesPostgres = !options?.stores;
  const stores = options?.stores ?? createPostgresStores();

  const app = Fastify({
    logger: createLoggerOptions(config.logLevel),
    bodyLimit: config.maxUploadBytes
  });

  app.setErrorHandler(createHttpErrorHandler());
  await app.register(metricsPlugin, { enabled: config.metricsEnabled });

  const inference = createMappingInferenceService({
    provider: options?.inferenceProvider ?? createInferenceProvider(config, options?.fetchImpl),
    timeoutMs: config.inference.timeoutMs,
    sampleRows: config.inference.sampleRows
  });
  const engine = createEtlEngine({
    store: stores.normalized,
    policy: {
      batchSize: config.etl.batchSize,
      maxRowErrors: config.etl.maxRowErrors,
      rejectionThreshold: config.etl.rejectionThreshold,
      timestampFormats: config.etl.timestampFormats
    }
  });
  const controller = createDatasetController({
    stores,
    inference,
    engine,
    batchSize: config.etl.batchSize,
    staleAfterMs: config.lifecycle.staleAfterMs,
    observer: createLifecycleObserver(app.metrics)
  });

  await registerSystemRoutes(app, {
    checkReadiness: async () => {
      if (usesPostgres) {
        await withConnection(async (client) => {
          await client.query('SELECT 1');
        });
      }
    }
  });
  await registerDatasetRoutes(app, { controller, maxUploadBytes: config.maxUploadBytes });
  await registerNormalizedRoutes(app, stores.normalized);

  if (usesPostgres) {
    app.addHook('onReady', async () => {
      await ensureSchemaReady();
    });

    app.addHook('onClose', async () => {
      await closePool();
    });
  }

  return { app, config };
}
