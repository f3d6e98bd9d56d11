/** Cell text as read from the CSV; null when the row ended before this column. */
export type Cell = string | null;

export type PollRecord = Record<string, Cell>;

export type ColumnSchema = readonly string[];

export interface PollTable {
  columns: string[];
  records: PollRecord[];
}

export interface ParsedDate {
  year: number;
  month: number; // 1-12
  day: number;
}

export interface WeightedAccumulator {
  sumWeight: number;
  sumWeightedValue: number;
}

export interface RunSummary {
  totalRows: number;
  undatedRows: number;
  weightedRows: number;
}

export interface NormalizedPolls {
  columns: string[];
  rows: PollRecord[];
  // undefined when no row carries a usable Influence/Approve pair
  weightedApprove: number | undefined;
  summary: RunSummary;
}
