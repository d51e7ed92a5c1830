import type { DateWindow } from './types.js';

export interface AreaRule {
  label: string;
  patterns: RegExp[];
}

/**
 * Keyword sets and taxonomy used by the field extractor. Sources share one
 * extractor and differ only in the lexicon they pass in.
 */
export interface Lexicon {
  deadlineLabels: string[];
  eligibilityLabels: string[];
  budgetLabels: string[];
  /** Labels that end an eligibility or budget segment. */
  stopLabels: string[];
  recurringTerms: string[];
  /** Checked in order, first match wins. */
  areas: AreaRule[];
  deadlineWindowChars: number;
  eligibilityMaxChars: number;
  budgetMaxChars: number;
  dateWindow: DateWindow;
}

export const DEFAULT_DATE_WINDOW: DateWindow = { pastDays: 90, futureDays: 720 };

export const DEFAULT_LEXICON: Lexicon = {
  deadlineLabels: [
    'submission deadline',
    'deadline',
    'last date',
    'last day',
    'apply by',
    'closing date',
  ],
  eligibilityLabels: ['eligibility criteria', 'eligibility', 'who can apply'],
  budgetLabels: ['grant amount', 'budget', 'funding limit', 'funding'],
  stopLabels: [
    'eligibility',
    'who can apply',
    'budget',
    'funding',
    'grant amount',
    'area',
    'research area',
    'thematic area',
    'scope',
    'duration',
    'how to apply',
    'deadline',
    'last date',
    'closing date',
    'apply by',
  ],
  recurringTerms: ['annual', 'annually', 'every year', 'rolling', 'ongoing', 'always open'],
  areas: [
    { label: 'Medical Research', patterns: [/\bmedical\b/i, /\bbiomedical\b/i, /\bmedicine\b/i, /\bhealth\b/i, /\bclinical\b/i] },
    { label: 'Biotechnology', patterns: [/\bbiotech(?:nology)?\b/i] },
    { label: 'Physical Sciences', patterns: [/\bphysics\b/i, /\bphysical sciences?\b/i] },
    { label: 'Chemical Sciences', patterns: [/\bchemistry\b/i, /\bchemical\b/i] },
    { label: 'Advanced Materials', patterns: [/\badvanced materials?\b/i, /\bmaterials? science\b/i, /\bnanomaterials?\b/i] },
    { label: 'Science & Technology', patterns: [/\bengineering\b/i, /\btechnology\b/i] },
    { label: 'Science & Innovation', patterns: [/\binnovation\b/i] },
  ],
  deadlineWindowChars: 120,
  eligibilityMaxChars: 600,
  budgetMaxChars: 250,
  dateWindow: DEFAULT_DATE_WINDOW,
};

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** Matches any of the phrases as whole words, tolerating flexible spacing. */
export function phrasePattern(phrases: string[], flags = 'gi'): RegExp {
  const alternatives = phrases.map((phrase) =>
    phrase.trim().split(/\s+/).map(escapeRegExp).join('\\s+'),
  );
  return new RegExp(`\\b(?:${alternatives.join('|')})\\b`, flags);
}
