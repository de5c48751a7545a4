import { parseCoordinate, parseNumericCell, isBlankCell } from '../etl/cellParsers';
import { DEFAULT_TIMESTAMP_FORMATS, parseTimestamp } from '../etl/timestamps';
import { ownValue, slugifyHeader } from '../mapping/columns';
import { CANONICAL_ROLES, type CanonicalRole, type ColumnCategory, type ColumnMapping } from '../mapping/types';
import type { MappingInferenceProvider, ProposalRequest, SampleRow } from './types';

const EXACT_MATCH_CONFIDENCE = 0.6;
const PREFIX_MATCH_CONFIDENCE = 0.4;
const MAX_CATEGORY_LENGTH = 32;

const ROLE_ALIASES: Record<CanonicalRole, readonly string[]> = {
  ENTITY_ID: ['id', 'entity_id', 'object_id', 'site', 'site_id', 'well', 'well_id', 'station', 'station_id', 'location_id'],
  LATITUDE: ['lat', 'latitude', 'y_coord'],
  LONGITUDE: ['lon', 'lng', 'long', 'longitude', 'x_coord'],
  TIMESTAMP: ['date', 'time', 'timestamp', 'datetime', 'date_time', 'observed_at', 'measured_at', 'sample_date'],
  METRIC_NAME: ['metric', 'metric_name', 'parameter', 'variable', 'indicator', 'measure'],
  METRIC_VALUE: ['value', 'metric_value', 'reading', 'measurement', 'result']
};

type Candidate = {
  header: string;
  confidence: number;
};

function sampleValues(rows: readonly SampleRow[], header: string): string[] {
  const values: string[] = [];
  for (const row of rows) {
    const cell = ownValue(row, header);
    if (cell && !isBlankCell(cell)) {
      values.push(cell.trim());
    }
  }
  return values;
}

function samplesFit(role: CanonicalRole, values: string[]): boolean {
  if (values.length === 0) {
    return true;
  }
  switch (role) {
    case 'LATITUDE':
      return values.every((value) => {
        const parsed = parseCoordinate(value, 'latitude');
        return parsed.ok && parsed.value !== null;
      });
    case 'LONGITUDE':
      return values.every((value) => {
        const parsed = parseCoordinate(value, 'longitude');
        return parsed.ok && parsed.value !== null;
      });
    case 'TIMESTAMP':
      return values.every((value) => parseTimestamp(value, DEFAULT_TIMESTAMP_FORMATS).ok);
    case 'METRIC_VALUE':
      return values.every((value) => parseNumericCell(value) !== null);
    case 'ENTITY_ID':
    case 'METRIC_NAME':
      return true;
  }
}

function aliasConfidence(role: CanonicalRole, header: string): number {
  const slug = slugifyHeader(header);
  if (!slug) {
    return 0;
  }
  const aliases = ROLE_ALIASES[role];
  if (aliases.includes(slug)) {
    return EXACT_MATCH_CONFIDENCE;
  }
  // "Lat_N", "Long_E", "Site_Code": the leading token carries the meaning.
  const [head] = slug.split('_');
  if (aliases.includes(head)) {
    return PREFIX_MATCH_CONFIDENCE;
  }
  return 0;
}

export function classifyColumn(values: string[]): ColumnCategory {
  if (values.length === 0) {
    return 'TEXT';
  }
  if (values.every((value) => parseNumericCell(value) !== null)) {
    return 'NUMERICAL';
  }
  const distinct = new Set(values);
  const short = values.every((value) => value.length <= MAX_CATEGORY_LENGTH);
  if (short && distinct.size < values.length) {
    return 'CATEGORICAL';
  }
  return 'TEXT';
}

/**
 * Deterministic proposal from header names and sample shapes. Each role
 * takes the best unclaimed header; ties go to the earlier header.
 */
export function proposeFromHeaders(request: ProposalRequest): ColumnMapping {
  const claimed = new Set<string>();
  const roles: ColumnMapping['roles'] = {};
  const confidence: ColumnMapping['confidence'] = {};

  for (const role of CANONICAL_ROLES) {
    let best: Candidate | null = null;
    for (const header of request.headers) {
      if (claimed.has(header)) {
        continue;
      }
      const score = aliasConfidence(role, header);
      if (score === 0 || !samplesFit(role, sampleValues(request.sampleRows, header))) {
        continue;
      }
      if (!best || score > best.confidence) {
        best = { header, confidence: score };
      }
    }
    if (best) {
      roles[role] = best.header;
      confidence[role] = best.confidence;
      claimed.add(best.header);
    } else {
      confidence[role] = 0;
    }
  }

  const columns = request.headers
    .filter((header) => !claimed.has(header))
    .map((header) => [header, classifyColumn(sampleValues(request.sampleRows, header))] as const);

  return { roles, columns: Object.fromEntries(columns), confidence, metricName: null };
}

export function createHeuristicMappingProvider(): MappingInferenceProvider {
  return {
    name: 'heuristic',
    async propose(request) {
      return proposeFromHeaders(request);
    }
  };
}
