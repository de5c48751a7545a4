import { z } from 'zod';
import { MAX_SAMPLE_ROWS } from '../inference/types';

const cellSchema = z
  .union([z.string(), z.number(), z.boolean(), z.null()])
  .transform((value) => (value === null ? null : String(value)));

const identifierSchema = z
  .string()
  .trim()
  .min(1, 'Identifier must not be empty')
  .max(128, 'Identifier exceeds 128 characters');

const filenameSchema = z.string().trim().min(1).max(512);

const expectedRevisionSchema = z.number().int().min(0).optional();

const tabularUploadSchema = z
  .object({
    filename: filenameSchema,
    storageHandle: z.string().trim().min(1).nullable().optional(),
    headers: z.array(z.string()),
    rows: z.array(z.union([z.array(cellSchema), z.record(z.string(), cellSchema)]))
  })
  .strict();

const csvUploadSchema = z
  .object({
    filename: filenameSchema,
    storageHandle: z.string().trim().min(1).nullable().optional(),
    csv: z.string()
  })
  .strict();

const uploadSchema = z.union([tabularUploadSchema, csvUploadSchema]);

export type UploadPayload = z.infer<typeof uploadSchema>;

export function parseUploadPayload(payload: unknown): UploadPayload {
  return uploadSchema.parse(payload ?? {});
}

const projectParamsSchema = z.object({ projectId: identifierSchema });
const datasetParamsSchema = z.object({ datasetId: identifierSchema });

export function parseProjectParams(params: unknown): z.infer<typeof projectParamsSchema> {
  return projectParamsSchema.parse(params);
}

export function parseDatasetParams(params: unknown): z.infer<typeof datasetParamsSchema> {
  return datasetParamsSchema.parse(params);
}

const analyzeSchema = z
  .object({
    expectedRevision: expectedRevisionSchema,
    rowLimit: z.number().int().min(1).max(MAX_SAMPLE_ROWS).optional()
  })
  .strict();

export type AnalyzePayload = z.infer<typeof analyzeSchema>;

export function parseAnalyzePayload(payload: unknown): AnalyzePayload {
  return analyzeSchema.parse(payload ?? {});
}

const confirmSchema = z
  .object({
    mapping: z.unknown().refine((value) => value !== undefined, 'mapping is required'),
    metricName: z.string().trim().min(1).max(200).nullable().optional(),
    expectedRevision: expectedRevisionSchema
  })
  .strict();

export type ConfirmPayload = z.infer<typeof confirmSchema>;

export function parseConfirmPayload(payload: unknown): ConfirmPayload {
  return confirmSchema.parse(payload ?? {});
}

const retrySchema = z
  .object({
    target: z.enum(['analyze', 'ingest']).optional(),
    expectedRevision: expectedRevisionSchema
  })
  .strict();

export type RetryPayload = z.infer<typeof retrySchema>;

export function parseRetryPayload(payload: unknown): RetryPayload {
  return retrySchema.parse(payload ?? {});
}

const paginationShape = {
  limit: z.coerce.number().int().min(1).max(1000).default(100),
  offset: z.coerce.number().int().min(0).default(0)
};

const objectsQuerySchema = z.object({
  externalId: z.string().trim().min(1).optional(),
  ...paginationShape
});

const readingsQuerySchema = z
  .object({
    externalId: z.string().trim().min(1).optional(),
    metric: z.string().trim().min(1).optional(),
    from: z.string().datetime({ offset: true }).transform((value) => new Date(value)).optional(),
    to: z.string().datetime({ offset: true }).transform((value) => new Date(value)).optional(),
    ...paginationShape
  })
  .refine((query) => !query.from || !query.to || query.from < query.to, {
    message: '`from` must be earlier than `to`',
    path: ['from']
  });

export type ObjectsQuery = z.infer<typeof objectsQuerySchema>;
export type ReadingsQuery = z.infer<typeof readingsQuerySchema>;

export function parseObjectsQuery(query: unknown): ObjectsQuery {
  return objectsQuerySchema.parse(query ?? {});
}

export function parseReadingsQuery(query: unknown): ReadingsQuery {
  return readingsQuerySchema.parse(query ?? {});
}
