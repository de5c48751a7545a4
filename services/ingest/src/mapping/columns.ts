import type { HeaderColumn } from './types';

export function slugifyHeader(value: string): string {
  return value
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '_')
    .replace(/_+/g, '_')
    .replace(/^_+|_+$/g, '');
}

/**
 * Assigns each header a stable variable name. Blank headers become
 * `column_<n>` (1-based) and collisions get `_2`, `_3`, ... suffixes.
 */
export function describeColumns(headers: readonly string[]): HeaderColumn[] {
  const seen = new Set<string>();
  return headers.map((original, index) => {
    const base = slugifyHeader(original) || `column_${index + 1}`;
    let candidate = base;
    let counter = 1;
    while (seen.has(candidate)) {
      counter += 1;
      candidate = `${base}_${counter}`;
    }
    seen.add(candidate);
    return { original, variable: candidate };
  });
}

/**
 * Reads an entry of a record keyed by header names. Headers are user text,
 * so names such as `constructor` must not resolve to inherited members.
 */
export function ownValue<T>(record: Readonly<Record<string, T>>, header: string): T | undefined {
  return Object.hasOwn(record, header) ? record[header] : undefined;
}

export type HeaderProblem = 'empty' | 'duplicate_header';

export function findHeaderProblems(headers: readonly string[]): { problem: HeaderProblem; header?: string }[] {
  if (headers.length === 0) {
    return [{ problem: 'empty' }];
  }
  const problems: { problem: HeaderProblem; header?: string }[] = [];
  const seen = new Set<string>();
  for (const header of headers) {
    if (seen.has(header)) {
      problems.push({ problem: 'duplicate_header', header });
    }
    seen.add(header);
  }
  return problems;
}
