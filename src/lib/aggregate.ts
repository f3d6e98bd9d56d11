import type { Cell, PollRecord, WeightedAccumulator } from '../../types/index.js';
import { APPROVE, INFLUENCE, ROLLING_WEIGHTED_APPROVE, getCell } from './records.js';

// Digit runs may be grouped with single underscores between digits, as in 1_000
const DIGITS = String.raw`\d(?:_?\d)*`;
const DECIMAL = new RegExp(
  `^[+-]?(?:${DIGITS}(?:\\.(?:${DIGITS})?)?|\\.${DIGITS})(?:e[+-]?${DIGITS})?$`,
  'i'
);
const NON_FINITE = /^([+-]?)(inf|infinity|nan)$/i;

export const DECIMALS = 5;

/** Lenient float parse of a cell; undefined when the text is not a number at all. */
export function parseNumber(text: Cell | undefined): number | undefined {
  if (text == null) return undefined;
  const s = text.trim();
  if (DECIMAL.test(s)) return Number(s.replace(/_/g, ''));
  const m = NON_FINITE.exec(s);
  if (!m) return undefined;
  if (m[2].toLowerCase() === 'nan') return NaN;
  return m[1] === '-' ? -Infinity : Infinity;
}

interface Observation {
  weight: number;
  value: number;
}

function observe(row: PollRecord): Observation | undefined {
  const weight = parseNumber(getCell(row, INFLUENCE));
  const value = parseNumber(getCell(row, APPROVE));
  if (weight === undefined || value === undefined) return undefined;
  if (!Number.isFinite(weight) || weight <= 0 || !Number.isFinite(value)) return undefined;
  return { weight, value };
}

export function contributes(row: PollRecord): boolean {
  return observe(row) !== undefined;
}

export function emptyAccumulator(): WeightedAccumulator {
  return { sumWeight: 0, sumWeightedValue: 0 };
}

export function accumulate(acc: WeightedAccumulator, row: PollRecord): WeightedAccumulator {
  const obs = observe(row);
  if (!obs) return acc;
  return {
    sumWeight: acc.sumWeight + obs.weight,
    sumWeightedValue: acc.sumWeightedValue + obs.weight * obs.value,
  };
}

export function weightedMean(acc: WeightedAccumulator): number | undefined {
  return acc.sumWeight > 0 ? acc.sumWeightedValue / acc.sumWeight : undefined;
}

export function formatAverage(value: number): string {
  return value.toFixed(DECIMALS);
}

/** Approve averaged over every row, weighted by Influence. */
export function globalWeightedAverage(rows: PollRecord[]): number | undefined {
  return weightedMean(rows.reduce((acc, row) => accumulate(acc, row), emptyAccumulator()));
}

/**
 * Annotates rows (expected newest first) with the weighted average of
 * everything from the top down to and including that row. Rows that do not
 * qualify repeat the previous figure; rows before the first qualifying one get ''.
 */
export function applyRollingWeightedAverage(rows: PollRecord[]): PollRecord[] {
  let acc = emptyAccumulator();
  for (const row of rows) {
    acc = accumulate(acc, row);
    const mean = weightedMean(acc);
    row[ROLLING_WEIGHTED_APPROVE] = mean === undefined ? '' : formatAverage(mean);
  }
  return rows;
}

export function formatWeightedApprove(average: number | undefined): string {
  const shown = average === undefined ? 'N/A (no valid rows)' : formatAverage(average);
  return `Weighted Approve (by Influence): ${shown}`;
}
