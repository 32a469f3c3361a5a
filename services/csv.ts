/**
 * CSV helpers for the dish and ingredient exports.
 * Handles quoted fields, escaped quotes ("") and CRLF/LF line endings.
 * Quoted fields may span lines. Ragged rows are rejected.
 */

import { InsightDataError } from './errors';

export interface ParsedCsv {
  headers: string[];
  rows: string[][];
}

const splitRecords = (text: string): string[][] => {
  const records: string[][] = [];
  let row: string[] = [];
  let cur = '';
  let inQuotes = false;

  const normalized = text.replace(/^\uFEFF/, '').replace(/\r\n?/g, '\n');

  for (let i = 0; i < normalized.length; i++) {
    const ch = normalized[i];
    if (inQuotes) {
      if (ch === '"') {
        if (normalized[i + 1] === '"') {
          cur += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        cur += ch;
      }
      continue;
    }

    if (ch === '"') {
      inQuotes = true;
    } else if (ch === ',') {
      row.push(cur);
      cur = '';
    } else if (ch === '\n') {
      row.push(cur);
      records.push(row);
      row = [];
      cur = '';
    } else {
      cur += ch;
    }
  }

  if (cur.length > 0 || row.length > 0) {
    row.push(cur);
    records.push(row);
  }

  return records;
};

// Every data row must have exactly one cell per header
export const parseCsv = (text: string, table = 'csv'): ParsedCsv => {
  const records = splitRecords(text);
  const headerRecord = records.shift();
  if (!headerRecord) {
    return { headers: [], rows: [] };
  }

  const headers = headerRecord.map(h => h.trim());
  const rows = records
    .filter(r => r.some(cell => cell.trim().length > 0))
    .map((r, idx) => {
      if (r.length !== headers.length) {
        const row = idx + 1;
        throw new InsightDataError(
          'InvalidRow',
          `${table} row ${row}: expected ${headers.length} cells, got ${r.length}`,
          { table, row },
        );
      }
      return r;
    });

  return { headers, rows };
};

export const toObjects = ({ headers, rows }: ParsedCsv): Record<string, string>[] =>
  rows.map(r => {
    const o: Record<string, string> = {};
    headers.forEach((h, idx) => {
      o[h] = r[idx] ?? '';
    });
    return o;
  });
