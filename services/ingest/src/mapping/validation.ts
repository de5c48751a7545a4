import { MappingValidationError, type ValidationIssue } from '../errors/ingestErrors';
import {
  CANONICAL_ROLES,
  columnMappingInputSchema,
  compactRoles,
  resolveIngestionMode,
  type CanonicalRole,
  type ColumnCategory,
  type ColumnMapping,
  type IngestionMode
} from './types';
import { ownValue } from './columns';

export type MappingValidationResult =
  | { ok: true; mapping: ColumnMapping; mode: IngestionMode }
  | { ok: false; error: MappingValidationError };

function fail(issues: ValidationIssue[]): MappingValidationResult {
  const fields = issues.map((issue) => issue.field).join(', ');
  return {
    ok: false,
    error: new MappingValidationError(`Column mapping is invalid (${fields})`, issues)
  };
}

/**
 * Confirmation gate. Checks, in order: referenced columns exist, no column
 * backs two roles, at least one ingestion mode is satisfiable, and every
 * remaining header is classified (TEXT when the caller left it out).
 * Pure: never touches dataset state.
 */
export function validateMapping(proposed: unknown, headers: Iterable<string>): MappingValidationResult {
  const headerSet = new Set(headers);

  const parsed = columnMappingInputSchema.safeParse(proposed);
  if (!parsed.success) {
    return fail(
      parsed.error.issues.map((issue) => ({
        field: issue.path.length > 0 ? issue.path.join('.') : 'mapping',
        code: 'invalid_shape',
        message: issue.message
      }))
    );
  }

  const roles = compactRoles(parsed.data.roles);

  const unknownColumns: ValidationIssue[] = [];
  for (const role of CANONICAL_ROLES) {
    const column = roles[role];
    if (column && !headerSet.has(column)) {
      unknownColumns.push({
        field: `roles.${role}`,
        code: 'unknown_column',
        message: `Column "${column}" is not present in the dataset headers`
      });
    }
  }
  for (const column of Object.keys(parsed.data.columns)) {
    if (!headerSet.has(column)) {
      unknownColumns.push({
        field: `columns.${column}`,
        code: 'unknown_column',
        message: `Column "${column}" is not present in the dataset headers`
      });
    }
  }
  if (unknownColumns.length > 0) {
    return fail(unknownColumns);
  }

  const owners = new Map<string, CanonicalRole>();
  const duplicates: ValidationIssue[] = [];
  for (const role of CANONICAL_ROLES) {
    const column = roles[role];
    if (!column) {
      continue;
    }
    const owner = owners.get(column);
    if (owner) {
      duplicates.push({
        field: `roles.${role}`,
        code: 'duplicate_column',
        message: `Column "${column}" is already assigned to ${owner}`
      });
      continue;
    }
    owners.set(column, role);
  }
  if (duplicates.length > 0) {
    return fail(duplicates);
  }

  const mode = resolveIngestionMode(roles);
  if (!mode) {
    return fail([
      {
        field: 'roles',
        code: 'insufficient_roles',
        message:
          'Assign ENTITY_ID or LATITUDE and LONGITUDE for entity ingestion, ' +
          'or TIMESTAMP and METRIC_VALUE for time-series ingestion'
      }
    ]);
  }

  const columns = new Map<string, ColumnCategory>();
  for (const header of headerSet) {
    if (owners.has(header)) {
      continue;
    }
    columns.set(header, ownValue(parsed.data.columns, header) ?? 'TEXT');
  }

  const confidence: ColumnMapping['confidence'] = {};
  for (const role of CANONICAL_ROLES) {
    const score = parsed.data.confidence[role];
    if (roles[role] && score !== undefined) {
      confidence[role] = score;
    }
  }

  return {
    ok: true,
    mode,
    mapping: {
      roles,
      columns: Object.fromEntries(columns),
      confidence,
      metricName: parsed.data.metricName ?? null
    }
  };
}

export function assertValidMapping(proposed: unknown, headers: Iterable<string>): { mapping: ColumnMapping; mode: IngestionMode } {
  const result = validateMapping(proposed, headers);
  if (!result.ok) {
    throw result.error;
  }
  return { mapping: result.mapping, mode: result.mode };
}
