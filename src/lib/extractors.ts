import type { Cell } from '../../types/index.js';
import { addDays, formatIsoDate, makeDate } from './dates.js';

// Each strategy either returns a value or undefined to hand over to the next one.
type Strategy = (text: string) => string | undefined;

function firstResult(text: string, strategies: readonly Strategy[]): string | undefined {
  for (const attempt of strategies) {
    const result = attempt(text);
    if (result !== undefined) return result;
  }
  return undefined;
}

const ORIGIN = { year: 1960, month: 1, day: 1 };
const TRAILING_DIGITS = /(\d+)$/;
const DATE_RANGE = /(\d{1,2})\/(\d{1,2})\s*-\s*(\d{1,2})\/(\d{1,2}),\s*(\d{4})/;
const SINGLE_DATE = /(\d{1,2})\/(\d{1,2})\/(\d{4})/;

function fromDayOffset(text: string) {
  const at = text.lastIndexOf('@');
  if (at === -1) return undefined;
  const m = TRAILING_DIGITS.exec(text.slice(at + 1).trim());
  if (!m) return undefined;
  const date = addDays(ORIGIN, Number(m[1]));
  return date && formatIsoDate(date);
}

function fromRangeEnd(text: string) {
  const m = DATE_RANGE.exec(text);
  if (!m) return undefined;
  const date = makeDate(Number(m[5]), Number(m[3]), Number(m[4]));
  return date && formatIsoDate(date);
}

function fromSingleDate(text: string) {
  const m = SINGLE_DATE.exec(text);
  if (!m) return undefined;
  const date = makeDate(Number(m[3]), Number(m[1]), Number(m[2]));
  return date && formatIsoDate(date);
}

const DATE_STRATEGIES: readonly Strategy[] = [fromDayOffset, fromRangeEnd, fromSingleDate];

/**
 * Canonicalizes a `Dates` cell to YYYY-MM-DD.
 *
 * Tries, in order: a day offset from 1960-01-01 after the last `@`, the end of
 * an `MM/DD - MM/DD, YYYY` range, a single `MM/DD/YYYY`. Text matching none of
 * them is returned untouched; a missing cell stays null.
 */
export function extractDate(value: Cell | undefined): Cell {
  if (value == null) return null;
  return firstResult(value, DATE_STRATEGIES) ?? value;
}

const ANCHOR = /<a[^>]*>(.*?)<\/a>/is;
const TAG = /<[^>]+>/g;

function fromAnchor(text: string) {
  const m = ANCHOR.exec(text);
  return m ? m[1].trim() : undefined;
}

function beforeCaret(text: string) {
  const caret = text.indexOf('^');
  return caret === -1 ? undefined : text.slice(0, caret).trim();
}

function withoutTags(text: string) {
  return text.replace(TAG, '').trim();
}

const POLLSTER_STRATEGIES: readonly Strategy[] = [fromAnchor, beforeCaret, withoutTags];

/** Bare pollster name: anchor text, else the part before `^`, else the text with tags removed. */
export function extractPollster(value: Cell | undefined): string {
  if (value == null) return '';
  return firstResult(value, POLLSTER_STRATEGIES) ?? '';
}

const SPONSOR_SEGMENT = /\^\s*Sponsor\s*:\s*([^^]+)\^/i;

// e.g. "<a href='...'>Ipsos</a>^Sponsor: Reuters^" -> "Reuters"
export function extractSponsor(value: Cell | undefined): string {
  if (value == null) return '';
  const m = SPONSOR_SEGMENT.exec(value);
  return m ? m[1].trim() : '';
}
