import { z } from 'zod';
import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import type { DatasetController, OperationContext, UploadInput } from '../lifecycle/controller';
import {
  parseAnalyzePayload,
  parseConfirmPayload,
  parseDatasetParams,
  parseProjectParams,
  parseRetryPayload,
  parseUploadPayload,
  type UploadPayload
} from '../schemas/datasets';
import { ownValue } from '../mapping/columns';
import { parseCsvUpload, rowsFromCells } from '../upload/csv';
import { createOperationSignals } from './operationSignals';
import { serializeDataset, serializeProposal } from './serializers';

const ACTOR_HEADER = 'x-aquifer-actor';

const csvQuerySchema = z.object({
  filename: z.string().trim().min(1).max(512).default('upload.csv')
});

function buildOperationContext(request: FastifyRequest, signal?: AbortSignal): OperationContext {
  const actor = request.headers[ACTOR_HEADER];
  return {
    actor: typeof actor === 'string' && actor.trim().length > 0 ? actor.trim() : null,
    logger: request.log,
    signal
  };
}

function toUploadInput(projectId: string, payload: UploadPayload): UploadInput {
  const storageHandle = payload.storageHandle ?? null;
  if ('csv' in payload) {
    const parsed = parseCsvUpload(payload.csv);
    return { projectId, filename: payload.filename, storageHandle, ...parsed };
  }

  const headers = payload.headers.map((header) => header.trim());
  // Keyed rows are projected onto the header row; keys outside it are dropped.
  const rows = payload.rows.map((row, index) =>
    Array.isArray(row)
      ? rowsFromCells(headers, [row], index + 1)[0]
      : Object.fromEntries(headers.map((header): [string, string | null] => [header, ownValue(row, header) ?? null]))
  );
  return { projectId, filename: payload.filename, storageHandle, headers, rows };
}

export async function registerDatasetRoutes(
  app: FastifyInstance,
  options: { controller: DatasetController; maxUploadBytes: number }
): Promise<void> {
  const { controller } = options;
  const signals = createOperationSignals();

  // preClose runs before the server waits for open requests to drain.
  app.addHook('preClose', async () => {
    const aborted = signals.abortAll('service is shutting down');
    if (aborted > 0) {
      app.log.warn({ aborted }, 'aborted running dataset operations');
    }
  });

  async function withOperation<T>(
    request: FastifyRequest,
    reply: FastifyReply,
    work: (context: OperationContext) => Promise<T>
  ): Promise<T> {
    const operation = signals.track(reply.raw);
    try {
      return await work(buildOperationContext(request, operation.signal));
    } finally {
      operation.release();
    }
  }

  app.addContentTypeParser('text/csv', { parseAs: 'string', bodyLimit: options.maxUploadBytes }, (_request, body, done) => {
    done(null, body);
  });

  app.post('/projects/:projectId/datasets', { bodyLimit: options.maxUploadBytes }, async (request, reply) => {
    const { projectId } = parseProjectParams(request.params);

    let input: UploadInput;
    if (typeof request.body === 'string') {
      const { filename } = csvQuerySchema.parse(request.query ?? {});
      input = { projectId, filename, storageHandle: null, ...parseCsvUpload(request.body) };
    } else {
      input = toUploadInput(projectId, parseUploadPayload(request.body));
    }

    const dataset = await controller.upload(input, buildOperationContext(request));
    reply.code(201).send({ dataset: serializeDataset(dataset) });
  });

  app.get('/datasets/:datasetId', async (request) => {
    const { datasetId } = parseDatasetParams(request.params);
    const dataset = await controller.get(datasetId);
    return { dataset: serializeDataset(dataset) };
  });

  app.post('/datasets/:datasetId/analyze', async (request, reply) => {
    const { datasetId } = parseDatasetParams(request.params);
    const payload = parseAnalyzePayload(request.body);
    const outcome = await withOperation(request, reply, (context) => controller.analyze(datasetId, payload, context));
    return {
      dataset: serializeDataset(outcome.dataset),
      proposal: serializeProposal(outcome.proposal)
    };
  });

  app.post('/datasets/:datasetId/confirm', async (request, reply) => {
    const { datasetId } = parseDatasetParams(request.params);
    const payload = parseConfirmPayload(request.body);
    const outcome = await withOperation(request, reply, (context) =>
      controller.confirm(
        datasetId,
        { mapping: payload.mapping, metricName: payload.metricName, expectedRevision: payload.expectedRevision },
        context
      )
    );
    return { dataset: serializeDataset(outcome.dataset), result: outcome.result };
  });

  app.post('/datasets/:datasetId/retry', async (request, reply) => {
    const { datasetId } = parseDatasetParams(request.params);
    const payload = parseRetryPayload(request.body);
    const outcome = await withOperation(request, reply, (context) => controller.retry(datasetId, payload, context));
    if (outcome.target === 'analyze') {
      return {
        target: outcome.target,
        dataset: serializeDataset(outcome.dataset),
        proposal: serializeProposal(outcome.proposal)
      };
    }
    return { target: outcome.target, dataset: serializeDataset(outcome.dataset), result: outcome.result };
  });
}
