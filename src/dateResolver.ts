import * as chrono from 'chrono-node';
import { DEFAULT_DATE_WINDOW } from './lexicon.js';
import { cleanText, normalizeDashes, stripOrdinals } from './textNormalizer.js';
import type { DateWindow } from './types.js';

export interface DateOptions {
  now?: Date;
  window?: DateWindow;
}

const MONTH =
  '(?:jan(?:uary)?|feb(?:ruary)?|mar(?:ch)?|apr(?:il)?|may|june?|july?|aug(?:ust)?|sep(?:t(?:ember)?)?|oct(?:ober)?|nov(?:ember)?|dec(?:ember)?)\\.?';

const DATE_GRAMMARS = [
  '\\d{4}-\\d{2}-\\d{2}',
  '\\d{1,2}[/.\\-]\\d{1,2}[/.\\-](?:\\d{4}|\\d{2})',
  `\\d{1,2}(?:st|nd|rd|th)?\\s+(?:of\\s+)?${MONTH},?\\s+\\d{4}`,
  `${MONTH}\\s+\\d{1,2}(?:st|nd|rd|th)?,?\\s+\\d{4}`,
];

const DATE_SHAPE = new RegExp(`\\b(?:${DATE_GRAMMARS.join('|')})\\b`, 'gi');

// Day-first parsing; a month with no day ("August 2025") is not a deadline.
const dayFirstParser = chrono.en.GB.clone();
dayFirstParser.refiners.push({
  refine(_context, results) {
    return results.filter(
      (result) => result.start.isCertain('day') && result.start.isCertain('month'),
    );
  },
});

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

export function toIsoDate(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

function addDays(date: Date, days: number): Date {
  return new Date(date.getFullYear(), date.getMonth(), date.getDate() + days);
}

function formatComponents(year: number, month: number, day: number): string | null {
  const check = new Date(Date.UTC(year, month - 1, day));
  if (
    check.getUTCFullYear() !== year ||
    check.getUTCMonth() !== month - 1 ||
    check.getUTCDate() !== day
  ) {
    return null;
  }
  return `${year}-${pad(month)}-${pad(day)}`;
}

/**
 * Parses a loose date expression ("31st August, 2025", "15/08/25") into
 * YYYY-MM-DD. Returns null for anything that does not name a day.
 */
export function parseDate(
  raw: string | null | undefined,
  { referenceDate = new Date() }: { referenceDate?: Date } = {},
): string | null {
  const text = cleanText(normalizeDashes(stripOrdinals(raw ?? '')));
  if (!text) return null;

  const [result] = dayFirstParser.parse(text, referenceDate);
  if (!result) return null;

  const year = result.start.get('year');
  const month = result.start.get('month');
  const day = result.start.get('day');
  if (year === null || month === null || day === null) return null;

  return formatComponents(year, month, day);
}

export function isPlausible(iso: string, { now = new Date(), window = DEFAULT_DATE_WINDOW }: DateOptions = {}): boolean {
  const lower = toIsoDate(addDays(now, -window.pastDays));
  const upper = toIsoDate(addDays(now, window.futureDays));
  return iso >= lower && iso <= upper;
}

/**
 * Parses every candidate, drops dates outside the plausibility window and
 * returns the earliest survivor.
 */
export function pickPlausibleDate(candidates: Iterable<string>, options: DateOptions = {}): string | null {
  const now = options.now ?? new Date();
  let earliest: string | null = null;

  for (const candidate of candidates) {
    const iso = parseDate(candidate, { referenceDate: now });
    if (!iso || !isPlausible(iso, { now, window: options.window })) continue;
    if (earliest === null || iso < earliest) {
      earliest = iso;
    }
  }

  return earliest;
}

export function resolveDate(raw: string | null | undefined, options: DateOptions = {}): string | null {
  return raw ? pickPlausibleDate([raw], options) : null;
}

/** Date-shaped substrings of the text, in reading order. */
export function findDateStrings(text: string): string[] {
  return normalizeDashes(text).match(DATE_SHAPE) ?? [];
}
