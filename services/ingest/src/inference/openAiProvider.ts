import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import { InferenceUnavailableError } from '../errors/ingestErrors';
import { CANONICAL_ROLES, columnCategorySchema, type ColumnMappingInput } from '../mapping/types';
import type { MappingInferenceProvider, ProposalRequest, ProviderCallOptions } from './types';

const DEFAULT_OPENAI_BASE_URL = 'https://api.openai.com/v1';
const DEFAULT_MODEL = 'gpt-4o-mini';
const MAX_CELL_LENGTH = 120;
const MAX_OUTPUT_TOKENS = 2_048;

const nullableColumn = z.string().nullable();
const score = z.number().min(0).max(1);

export const openAiProposalSchema = z.object({
  roles: z.object({
    ENTITY_ID: nullableColumn,
    LATITUDE: nullableColumn,
    LONGITUDE: nullableColumn,
    TIMESTAMP: nullableColumn,
    METRIC_NAME: nullableColumn,
    METRIC_VALUE: nullableColumn
  }),
  confidence: z.object({
    ENTITY_ID: score,
    LATITUDE: score,
    LONGITUDE: score,
    TIMESTAMP: score,
    METRIC_NAME: score,
    METRIC_VALUE: score
  }),
  columns: z.array(
    z.object({
      name: z.string(),
      category: columnCategorySchema
    })
  )
});

export type OpenAiProposal = z.infer<typeof openAiProposalSchema>;

const SYSTEM_PROMPT = [
  'You map the columns of an uploaded tabular dataset onto canonical roles.',
  `Canonical roles: ${CANONICAL_ROLES.join(', ')}.`,
  'ENTITY_ID identifies a monitored site or record. LATITUDE and LONGITUDE are decimal degrees.',
  'TIMESTAMP is the observation time. METRIC_NAME names the measured quantity when it varies per row. METRIC_VALUE is the numeric measurement.',
  'Assign each column to at most one role and set a role to null when no column fits.',
  'Classify every column that has no role as CATEGORICAL, NUMERICAL, TEXT or IGNORED.',
  'Confidence is a number between 0 and 1; use 0 for roles set to null.'
].join('\n');

const responsesPayloadSchema = z
  .object({
    output_text: z.string().optional(),
    output: z
      .array(
        z
          .object({
            content: z.array(z.object({ type: z.string().optional(), text: z.string().optional() }).passthrough()).optional()
          })
          .passthrough()
      )
      .optional()
  })
  .passthrough();

type ResponsesPayload = z.infer<typeof responsesPayloadSchema>;

function truncateCell(value: string | null): string | null {
  if (value === null || value.length <= MAX_CELL_LENGTH) {
    return value;
  }
  return `${value.slice(0, MAX_CELL_LENGTH)}…`;
}

export function buildUserPrompt(request: ProposalRequest): string {
  const sample = request.sampleRows.map((row) =>
    request.headers.map((header) => truncateCell(row[header] ?? null))
  );
  return [
    'Column headers:',
    JSON.stringify(request.headers),
    '',
    `Sample rows (${sample.length}, cells in header order):`,
    sample.map((cells) => JSON.stringify(cells)).join('\n'),
    '',
    'Respond with JSON that satisfies the response schema.'
  ].join('\n');
}

function buildResponseSchema(): Record<string, unknown> {
  const schema: Record<string, unknown> = {
    ...zodToJsonSchema(openAiProposalSchema, { target: 'openAi', $refStrategy: 'none' })
  };
  delete schema.$schema;
  return schema;
}

export function extractOutputText(payload: ResponsesPayload): string | null {
  if (typeof payload.output_text === 'string' && payload.output_text.trim().length > 0) {
    return payload.output_text.trim();
  }
  for (const item of payload.output ?? []) {
    for (const entry of item.content ?? []) {
      if (typeof entry.text === 'string' && entry.text.trim().length > 0) {
        return entry.text.trim();
      }
    }
  }
  return null;
}

/** Converts the model's fixed-shape answer into the mapping wire shape. */
export function toMappingInput(proposal: OpenAiProposal): ColumnMappingInput {
  return {
    roles: proposal.roles,
    columns: Object.fromEntries(proposal.columns.map((column) => [column.name, column.category] as const)),
    confidence: proposal.confidence
  };
}

export type OpenAiProviderOptions = {
  apiKey: string;
  baseUrl?: string;
  model?: string;
  fetchImpl?: typeof fetch;
};

export function createOpenAiMappingProvider(options: OpenAiProviderOptions): MappingInferenceProvider {
  const baseUrl = (options.baseUrl?.trim() || DEFAULT_OPENAI_BASE_URL).replace(/\/$/, '');
  const model = options.model?.trim() || DEFAULT_MODEL;
  const fetchImpl = options.fetchImpl ?? fetch;
  const responseSchema = buildResponseSchema();

  async function propose(request: ProposalRequest, callOptions: ProviderCallOptions): Promise<unknown> {
    let response: Response;
    try {
      response = await fetchImpl(`${baseUrl}/responses`, {
        method: 'POST',
        headers: {
          'content-type': 'application/json',
          accept: 'application/json',
          authorization: `Bearer ${options.apiKey}`
        },
        body: JSON.stringify({
          model,
          input: [
            { role: 'system', content: SYSTEM_PROMPT },
            { role: 'user', content: buildUserPrompt(request) }
          ],
          text: {
            format: {
              type: 'json_schema',
              name: 'ColumnMappingProposal',
              schema: responseSchema,
              strict: true
            }
          },
          temperature: 0,
          max_output_tokens: MAX_OUTPUT_TOKENS
        }),
        signal: callOptions.signal
      });
    } catch (err) {
      throw new InferenceUnavailableError('OpenAI request could not be completed', { cause: err });
    }

    if (!response.ok) {
      let detail: string;
      try {
        detail = await response.text();
      } catch {
        detail = response.statusText;
      }
      throw new InferenceUnavailableError(`OpenAI request failed (${response.status}): ${detail.slice(0, 500)}`);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (err) {
      throw new InferenceUnavailableError('OpenAI response body was not JSON', { cause: err });
    }

    const payload = responsesPayloadSchema.safeParse(body);
    const output = payload.success ? extractOutputText(payload.data) : null;
    if (!output) {
      return null;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(output);
    } catch {
      return null;
    }

    const proposal = openAiProposalSchema.safeParse(parsed);
    return proposal.success ? toMappingInput(proposal.data) : null;
  }

  return { name: 'openai', propose };
}
