import type { NormalizedPolls, PollTable } from '../../types/index.js';
import { applyRollingWeightedAverage, contributes, globalWeightedAverage } from './aggregate.js';
import { parseIsoDate } from './dates.js';
import { enrichRecords, sortByDateDesc } from './pipeline.js';
import { DATES, getCell } from './records.js';
import { rewriteSchema } from './schema.js';

export function normalizePolls(table: PollTable): NormalizedPolls {
  const columns = rewriteSchema(table.columns);
  const rows = sortByDateDesc(enrichRecords(table.records, columns));
  const weightedApprove = globalWeightedAverage(rows);
  applyRollingWeightedAverage(rows);
  return {
    columns,
    rows,
    weightedApprove,
    summary: {
      totalRows: rows.length,
      undatedRows: rows.filter(r => parseIsoDate(getCell(r, DATES)) === undefined).length,
      weightedRows: rows.filter(contributes).length,
    },
  };
}
