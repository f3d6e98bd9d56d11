import type { ColumnSchema } from '../../types/index.js';
import { APPROVE, POLLSTER, ROLLING_WEIGHTED_APPROVE, SPONSOR } from './records.js';

export const DROPPED_COLUMNS: ColumnSchema = ['Disapprove', 'Net'];

function insertAfter(columns: string[], anchor: string, column: string) {
  if (columns.includes(column)) return;
  const i = columns.indexOf(anchor);
  if (i === -1) columns.push(column);
  else columns.splice(i + 1, 0, column);
}

/**
 * Output columns for a poll export: Disapprove and Net removed, Sponsor placed
 * after Pollster and RollingWeightedApprove after Approve (appended when the
 * anchor column is missing, left where it is when already present).
 */
export function rewriteSchema(input: ColumnSchema): string[] {
  const columns = input.filter(c => !DROPPED_COLUMNS.includes(c));
  insertAfter(columns, POLLSTER, SPONSOR);
  insertAfter(columns, APPROVE, ROLLING_WEIGHTED_APPROVE);
  return columns;
}
