import { parse } from 'csv-parse/sync';
import type { TripRow } from '@ride-pipeline/domain';

/**
 * Parses a header-delimited trip file. The first line names the columns;
 * a row whose column count differs from the header throws, failing the file.
 */
export function parseTripRows(content: string): TripRow[] {
  const records: unknown = parse(content, {
    columns: true,
    bom: true,
    skip_empty_lines: true,
  });
  if (!Array.isArray(records)) {
    throw new Error('CSV parser did not return a list of rows');
  }
  return records.map((record, index) => toTripRow(record, index + 1));
}

function toTripRow(record: unknown, line: number): TripRow {
  if (typeof record !== 'object' || record === null) {
    throw new Error(`Row ${line} did not decode into a mapping`);
  }
  const row: Record<string, string> = {};
  for (const [column, value] of Object.entries(record)) {
    row[column] = String(value);
  }
  return row;
}
