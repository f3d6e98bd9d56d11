import type { Cell, PollRecord } from '../../types/index.js';

export const DATES = 'Dates';
export const POLLSTER = 'Pollster';
export const SPONSOR = 'Sponsor';
export const APPROVE = 'Approve';
export const INFLUENCE = 'Influence';
export const ROLLING_WEIGHTED_APPROVE = 'RollingWeightedApprove';

export function hasCell(record: PollRecord, column: string): boolean {
  return Object.prototype.hasOwnProperty.call(record, column);
}

/**
 * Reads a cell, keeping "column missing from the row" (undefined) apart from
 * "column present but empty" ('') and "row too short" (null).
 */
export function getCell(record: PollRecord, column: string): Cell | undefined {
  return hasCell(record, column) ? record[column] : undefined;
}
