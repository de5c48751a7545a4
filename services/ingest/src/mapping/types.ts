import { z } from 'zod';

export const CANONICAL_ROLES = [
  'ENTITY_ID',
  'LATITUDE',
  'LONGITUDE',
  'TIMESTAMP',
  'METRIC_NAME',
  'METRIC_VALUE'
] as const;

export const COLUMN_CATEGORIES = ['CATEGORICAL', 'NUMERICAL', 'TEXT', 'IGNORED'] as const;

export const canonicalRoleSchema = z.enum(CANONICAL_ROLES);
export const columnCategorySchema = z.enum(COLUMN_CATEGORIES);

export type CanonicalRole = z.infer<typeof canonicalRoleSchema>;
export type ColumnCategory = z.infer<typeof columnCategorySchema>;

const columnNameSchema = z.string().min(1, 'Column name must not be empty');

const confidenceSchema = z.number().min(0).max(1);

export const roleAssignmentsSchema = z
  .object({
    ENTITY_ID: columnNameSchema.nullable().optional(),
    LATITUDE: columnNameSchema.nullable().optional(),
    LONGITUDE: columnNameSchema.nullable().optional(),
    TIMESTAMP: columnNameSchema.nullable().optional(),
    METRIC_NAME: columnNameSchema.nullable().optional(),
    METRIC_VALUE: columnNameSchema.nullable().optional()
  })
  .strict();

export type RoleAssignments = Partial<Record<CanonicalRole, string>>;

/**
 * Wire shape of a mapping, as produced by inference or edited by a user.
 * Classification entries may be omitted; the confirmation gate fills them in.
 */
export const columnMappingInputSchema = z
  .object({
    roles: roleAssignmentsSchema.default({}),
    columns: z.record(z.string(), columnCategorySchema).default({}),
    confidence: z.record(canonicalRoleSchema, confidenceSchema).default({}),
    metricName: z.string().trim().min(1).max(200).nullable().optional()
  })
  .strict();

export type ColumnMappingInput = z.input<typeof columnMappingInputSchema>;

export type ColumnMapping = {
  roles: RoleAssignments;
  columns: Record<string, ColumnCategory>;
  confidence: Partial<Record<CanonicalRole, number>>;
  /** Metric name declared out-of-band for datasets without a METRIC_NAME column. */
  metricName: string | null;
};

export type IngestionMode = 'entity' | 'timeseries' | 'both';

export type HeaderColumn = {
  original: string;
  variable: string;
};

export function compactRoles(roles: z.infer<typeof roleAssignmentsSchema>): RoleAssignments {
  const compacted: RoleAssignments = {};
  for (const role of CANONICAL_ROLES) {
    const column = roles[role];
    if (typeof column === 'string' && column.length > 0) {
      compacted[role] = column;
    }
  }
  return compacted;
}

export function supportsEntityMode(roles: RoleAssignments): boolean {
  return Boolean(roles.ENTITY_ID) || Boolean(roles.LATITUDE && roles.LONGITUDE);
}

export function supportsTimeSeriesMode(roles: RoleAssignments): boolean {
  return Boolean(roles.TIMESTAMP && roles.METRIC_VALUE);
}

export function resolveIngestionMode(roles: RoleAssignments): IngestionMode | null {
  const entity = supportsEntityMode(roles);
  const timeseries = supportsTimeSeriesMode(roles);
  if (entity && timeseries) {
    return 'both';
  }
  if (timeseries) {
    return 'timeseries';
  }
  if (entity) {
    return 'entity';
  }
  return null;
}

/** Mapping returned when inference produced nothing usable. */
export function createEmptyMapping(headers: readonly string[]): ColumnMapping {
  const columns: Record<string, ColumnCategory> = Object.fromEntries(
    headers.map((header): [string, ColumnCategory] => [header, 'TEXT'])
  );
  const confidence: Partial<Record<CanonicalRole, number>> = {};
  for (const role of CANONICAL_ROLES) {
    confidence[role] = 0;
  }
  return { roles: {}, columns, confidence, metricName: null };
}
