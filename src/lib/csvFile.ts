import fs from 'node:fs';
import path from 'node:path';
import { parse } from 'csv-parse/sync';
import type { Cell, ColumnSchema, PollRecord, PollTable } from '../../types/index.js';

function isRowList(value: unknown): value is string[][] {
  return (
    Array.isArray(value) &&
    value.every(row => Array.isArray(row) && row.every(cell => typeof cell === 'string'))
  );
}

/**
 * Splits poll CSV text into its header and one record per data row. Cells past
 * the end of a short row are null; cells past the header are dropped.
 */
export function parsePollCsv(text: string): PollTable {
  const rows: unknown = parse(text, {
    bom: true,
    skip_empty_lines: true,
    relax_column_count: true,
    // quotes inside an unquoted cell (e.g. <a href="...">) are kept as text
    relax_quotes: true,
  });
  if (!isRowList(rows)) throw new Error('CSV parser returned non-text rows');
  const [header = [], ...body] = rows;
  const records = body.map(
    (cells): PollRecord =>
      Object.fromEntries(
        header.map((column, i): [string, Cell] => [column, i < cells.length ? cells[i] : null])
      )
  );
  return { columns: header, records };
}

export function readPollCsv(inPath: string): PollTable {
  // fatal: bytes that are not UTF-8 abort the run instead of turning into U+FFFD
  const text = new TextDecoder('utf-8', { fatal: true }).decode(fs.readFileSync(inPath));
  return parsePollCsv(text);
}

// CRLF, as RFC 4180 writers (and the poll exports themselves) use
export const EOL = '\r\n';

export function csvEscape(v: Cell | undefined): string {
  const s = v == null ? '' : v;
  return /[",\r\n]/.test(s) ? `"${s.replace(/"/g, '""')}"` : s;
}

export function formatPollCsv(columns: ColumnSchema, rows: PollRecord[]): string {
  const lines = [columns.map(csvEscape).join(',')];
  for (const r of rows) lines.push(columns.map(c => csvEscape(r[c])).join(','));
  return lines.join(EOL) + EOL;
}

export function writePollCsv(outPath: string, columns: ColumnSchema, rows: PollRecord[]): void {
  fs.mkdirSync(path.dirname(outPath), { recursive: true });
  // Write beside the target, then rename over it
  const tmp = outPath + '.tmp';
  try {
    fs.writeFileSync(tmp, formatPollCsv(columns, rows), 'utf-8');
    fs.renameSync(tmp, outPath);
  } catch (e) {
    fs.rmSync(tmp, { force: true });
    throw e;
  }
}
