import type { ColumnSchema, PollRecord } from '../../types/index.js';
import { dateOrdinal, parseDateOrMin } from './dates.js';
import { extractDate, extractPollster, extractSponsor } from './extractors.js';
import { DATES, POLLSTER, SPONSOR, getCell, hasCell } from './records.js';

export function enrichRecord(raw: PollRecord, columns: ColumnSchema): PollRecord {
  const row: PollRecord = { ...raw };
  if (hasCell(raw, DATES)) row[DATES] = extractDate(getCell(raw, DATES));
  // Sponsor comes out of the raw Pollster cell, so it has to run before the cleanup below
  row[SPONSOR] = extractSponsor(getCell(raw, POLLSTER));
  if (hasCell(raw, POLLSTER)) row[POLLSTER] = extractPollster(getCell(raw, POLLSTER));
  for (const column of columns) {
    if (!hasCell(row, column)) row[column] = '';
  }
  return row;
}

export function enrichRecords(records: PollRecord[], columns: ColumnSchema): PollRecord[] {
  return records.map(r => enrichRecord(r, columns));
}

/** Newest first; rows whose Dates is not YYYY-MM-DD keep their relative order at the end. */
export function sortByDateDesc(rows: PollRecord[]): PollRecord[] {
  return rows
    .map((row, index) => ({ row, index, key: dateOrdinal(parseDateOrMin(getCell(row, DATES))) }))
    .sort((a, b) => b.key - a.key || a.index - b.index)
    .map(entry => entry.row);
}
