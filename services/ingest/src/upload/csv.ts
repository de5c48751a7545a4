import Papa from 'papaparse';
import { InvalidUploadError } from '../errors/ingestErrors';

export type ParsedUpload = {
  headers: string[];
  rows: Record<string, string | null>[];
};

/**
 * Zips positional cells onto the header row. Short rows are padded with
 * null; a row with more cells than headers is rejected.
 */
export function rowsFromCells(headers: readonly string[], cells: readonly (string | null)[][], firstRowNumber = 1): Record<string, string | null>[] {
  return cells.map((row, index) => {
    if (row.length > headers.length) {
      throw new InvalidUploadError(
        `Row ${firstRowNumber + index} has ${row.length} cells but the header row has ${headers.length}`
      );
    }
    return Object.fromEntries(
      headers.map((header, column): [string, string | null] => [header, column < row.length ? row[column] : null])
    );
  });
}

/** Parses CSV text; every cell stays a string. */
export function parseCsvUpload(text: string): ParsedUpload {
  const result = Papa.parse<string[]>(text.replace(/^\uFEFF/, ''), {
    header: false,
    dynamicTyping: false,
    skipEmptyLines: 'greedy'
  });

  // Delimiter guessing falls back to a comma, so only quoting errors are fatal.
  const fatal = result.errors.find((error) => error.type === 'Quotes');
  if (fatal) {
    const line = fatal.row === undefined ? '' : ` (row ${fatal.row + 1})`;
    throw new InvalidUploadError(`CSV could not be parsed: ${fatal.message}${line}`);
  }

  if (result.data.length === 0) {
    return { headers: [], rows: [] };
  }

  const [headerRow, ...body] = result.data;
  const headers = headerRow.map((header) => header.trim());
  return { headers, rows: rowsFromCells(headers, body) };
}
