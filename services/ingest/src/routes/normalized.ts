import type { FastifyInstance } from 'fastify';
import { parseObjectsQuery, parseProjectParams, parseReadingsQuery } from '../schemas/datasets';
import type { NormalizedStore } from '../stores/types';
import { serializeMetric, serializeObject, serializeReading } from './serializers';

/** Read-only views over the normalized store for downstream reporting. */
export async function registerNormalizedRoutes(app: FastifyInstance, store: NormalizedStore): Promise<void> {
  app.get('/projects/:projectId/objects', async (request) => {
    const { projectId } = parseProjectParams(request.params);
    const query = parseObjectsQuery(request.query);
    const objects = await store.listObjects(projectId, query);
    return {
      objects: objects.map(serializeObject),
      pagination: { limit: query.limit, offset: query.offset, count: objects.length }
    };
  });

  app.get('/projects/:projectId/readings', async (request) => {
    const { projectId } = parseProjectParams(request.params);
    const query = parseReadingsQuery(request.query);
    const readings = await store.listReadings(projectId, query);
    return {
      readings: readings.map(serializeReading),
      pagination: { limit: query.limit, offset: query.offset, count: readings.length }
    };
  });

  app.get('/projects/:projectId/metrics', async (request) => {
    const { projectId } = parseProjectParams(request.params);
    const metrics = await store.listMetrics(projectId);
    return { metrics: metrics.map(serializeMetric) };
  });
}
