import { parseDate } from './dateResolver.js';
import { cleanText } from './textNormalizer.js';
import { DEFAULT_COUNTRY, UNKNOWN, type CallFields, type FundingCall, type PartialCall } from './types.js';

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

/** Fields merged by the fill-empty rule, in output order. */
export const CALL_FIELDS = [
  'title',
  'agency',
  'deadline',
  'extendedDeadline',
  'eligibility',
  'budget',
  'area',
  'url',
  'category',
  'researchCategory',
  'country',
] as const satisfies ReadonlyArray<keyof CallFields>;

export function canonicalDate(value?: string | null): string {
  const cleaned = cleanText(value);
  if (!cleaned) return UNKNOWN;
  if (ISO_DATE.test(cleaned)) return cleaned;
  return parseDate(cleaned) ?? UNKNOWN;
}

/**
 * Builds a complete record from a partial one: every field present,
 * whitespace collapsed, dates canonical, country defaulted.
 */
export function createCall(partial: PartialCall = {}): FundingCall {
  return {
    title: cleanText(partial.title),
    agency: cleanText(partial.agency),
    deadline: canonicalDate(partial.deadline),
    extendedDeadline: canonicalDate(partial.extendedDeadline),
    eligibility: cleanText(partial.eligibility),
    budget: cleanText(partial.budget),
    area: cleanText(partial.area),
    url: cleanText(partial.url),
    category: cleanText(partial.category),
    researchCategory: cleanText(partial.researchCategory),
    country: cleanText(partial.country) || DEFAULT_COUNTRY,
    isRecurring: partial.isRecurring === true,
  };
}

/**
 * Fills the gaps in `base` from `incoming`. A populated field, the deadline
 * and url included, is never replaced; recurrence sticks once seen.
 */
export function mergeCalls(base: FundingCall, incoming: FundingCall): FundingCall {
  const out: FundingCall = { ...base };

  for (const field of CALL_FIELDS) {
    if (!out[field] && incoming[field]) {
      out[field] = incoming[field];
    }
  }
  out.isRecurring = base.isRecurring || incoming.isRecurring;

  return out;
}

/** Applies partial extractions in priority order, each only filling gaps. */
export function mergeAll(base: FundingCall, ...stages: Array<PartialCall | null | undefined>): FundingCall {
  return stages.reduce<FundingCall>(
    (merged, stage) => (stage ? mergeCalls(merged, createCall(stage)) : merged),
    base,
  );
}
