import type { IngestStores, NormalizedWriter } from '../stores/types';
import { withConnection, withTransaction } from './client';
import { fetchDataset, insertDataset, transitionDataset } from './datasetsRepository';
import {
  insertMissingMetrics,
  listMetrics,
  listObjects,
  listReadings,
  upsertObjects,
  upsertReadings
} from './normalizedRepository';
import { fetchRawHeaders, fetchRawPage } from './rawRecordsRepository';

export type PostgresStoreDependencies = {
  withConnection?: typeof withConnection;
  withTransaction?: typeof withTransaction;
};

export function createPostgresStores(deps: PostgresStoreDependencies = {}): IngestStores {
  const connection = deps.withConnection ?? withConnection;
  const transaction = deps.withTransaction ?? withTransaction;

  return {
    datasets: {
      create: (input) => transaction((client) => insertDataset(client, input)),
      get: (datasetId) => connection((client) => fetchDataset(client, datasetId)),
      transition: (datasetId, expected, patch) =>
        connection((client) => transitionDataset(client, datasetId, expected, patch))
    },
    raw: {
      readHeaders: (datasetId) => connection((client) => fetchRawHeaders(client, datasetId)),
      readSample: (datasetId, limit) => connection((client) => fetchRawPage(client, datasetId, 0, limit)),
      async *iterate(datasetId, batchSize) {
        let after = 0;
        while (true) {
          const page = await connection((client) => fetchRawPage(client, datasetId, after, batchSize));
          if (page.length === 0) {
            return;
          }
          yield page;
          after = page[page.length - 1].rowNumber;
          if (page.length < batchSize) {
            return;
          }
        }
      }
    },
    normalized: {
      transaction<T>(fn: (writer: NormalizedWriter) => Promise<T>): Promise<T> {
        return transaction((client) => {
          const writer: NormalizedWriter = {
            upsertObjects: (projectId, objects) => upsertObjects(client, projectId, objects),
            upsertReadings: (projectId, readings) => upsertReadings(client, projectId, readings),
            ensureMetrics: (projectId, metrics) => insertMissingMetrics(client, projectId, metrics)
          };
          return fn(writer);
        });
      },
      listObjects: (projectId, query) => connection((client) => listObjects(client, projectId, query)),
      listReadings: (projectId, query) => connection((client) => listReadings(client, projectId, query)),
      listMetrics: (projectId) => connection((client) => listMetrics(client, projectId))
    }
  };
}
