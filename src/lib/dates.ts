import type { Cell, ParsedDate } from '../../types/index.js';

const MS_PER_DAY = 24 * 60 * 60 * 1000;
const MIN_YEAR = 1;
const MAX_YEAR = 9999;

/** Sorts below every real date; stands in for text that is not YYYY-MM-DD. */
export const MIN_DATE: ParsedDate = { year: MIN_YEAR, month: 1, day: 1 };

function isLeapYear(year: number) {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

function daysInMonth(year: number, month: number) {
  if (month === 2) return isLeapYear(year) ? 29 : 28;
  return [4, 6, 9, 11].includes(month) ? 30 : 31;
}

export function makeDate(year: number, month: number, day: number): ParsedDate | undefined {
  if (![year, month, day].every(Number.isInteger)) return undefined;
  if (year < MIN_YEAR || year > MAX_YEAR) return undefined;
  if (month < 1 || month > 12 || day < 1) return undefined;
  if (day > daysInMonth(year, month)) return undefined;
  return { year, month, day };
}

function toUtcMillis(date: ParsedDate) {
  // setUTCFullYear keeps years below 100 literal, unlike Date.UTC
  const d = new Date(0);
  d.setUTCFullYear(date.year, date.month - 1, date.day);
  return d.getTime();
}

export function addDays(date: ParsedDate, days: number): ParsedDate | undefined {
  if (!Number.isSafeInteger(days)) return undefined;
  const shifted = new Date(toUtcMillis(date) + days * MS_PER_DAY);
  if (isNaN(shifted.getTime())) return undefined;
  return makeDate(shifted.getUTCFullYear(), shifted.getUTCMonth() + 1, shifted.getUTCDate());
}

function pad(n: number, width: number) {
  return String(n).padStart(width, '0');
}

export function formatIsoDate(date: ParsedDate): string {
  return `${pad(date.year, 4)}-${pad(date.month, 2)}-${pad(date.day, 2)}`;
}

const DATE_PART = /^\s*\+?\d+\s*$/;

export function parseIsoDate(text: Cell | undefined): ParsedDate | undefined {
  if (text == null) return undefined;
  const parts = text.split('-');
  if (parts.length !== 3 || !parts.every(p => DATE_PART.test(p))) return undefined;
  const [year, month, day] = parts.map(p => Number(p.trim()));
  return makeDate(year, month, day);
}

export function parseDateOrMin(text: Cell | undefined): ParsedDate {
  return parseIsoDate(text) ?? MIN_DATE;
}

/** Orders dates as integers (YYYYMMDD). */
export function dateOrdinal(date: ParsedDate): number {
  return date.year * 10000 + date.month * 100 + date.day;
}
