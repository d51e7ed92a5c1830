import { findDateStrings, pickPlausibleDate, type DateOptions } from './dateResolver.js';
import { cleanHTML, extractStructuredFields, findPdfLinks, pickTitle } from './htmlPreprocessor.js';
import { DEFAULT_LEXICON, phrasePattern, type Lexicon } from './lexicon.js';
import { cleanText } from './textNormalizer.js';
import { UNKNOWN, type DocumentKind, type ExtractedDocument, type ExtractedFields } from './types.js';

export interface ExtractOptions {
  lexicon?: Lexicon;
  now?: Date;
}

const CURRENCY_AMOUNT =
  /(?:₹|\bRs\.?|\bINR|\bUSD|US\$|\$|\bEUR|€|\bGBP|£)\s?\d[\d,]*(?:\.\d+)?(?:\s?(?:lakhs?|crores?|million|billion)\b)?/i;

const HEADING_LINE = /\n(?=[A-Z][^\n]{2,})/;

const LABEL_SEPARATOR = '[^\\S\\n]*(?:[:\\-–—]|\\n)\\s*';

function labelPattern(labels: string[], flags: string): RegExp {
  return new RegExp(`${phrasePattern(labels).source}${LABEL_SEPARATOR}`, flags);
}

export function emptyFields(): ExtractedFields {
  return {
    deadline: UNKNOWN,
    eligibility: UNKNOWN,
    budget: UNKNOWN,
    area: UNKNOWN,
    recurring: false,
  };
}

function dateOptionsFor(lexicon: Lexicon, now?: Date): DateOptions {
  return { now, window: lexicon.dateWindow };
}

export interface DeadlineScan {
  /** Earliest plausible date found right after a deadline keyword. */
  anchored: string;
  /** Earliest plausible date anywhere in the text, only when nothing is anchored. */
  fallback: string;
}

export function scanDeadline(text: string, options: ExtractOptions = {}): DeadlineScan {
  const lexicon = options.lexicon ?? DEFAULT_LEXICON;
  const dateOptions = dateOptionsFor(lexicon, options.now);
  const candidates: string[] = [];

  for (const match of text.matchAll(phrasePattern(lexicon.deadlineLabels))) {
    const start = (match.index ?? 0) + match[0].length;
    candidates.push(...findDateStrings(text.slice(start, start + lexicon.deadlineWindowChars)));
  }

  const anchored = pickPlausibleDate(candidates, dateOptions) ?? UNKNOWN;
  const fallback = anchored ? UNKNOWN : pickPlausibleDate(findDateStrings(text), dateOptions) ?? UNKNOWN;
  return { anchored, fallback };
}

/**
 * Dates within a short window after each deadline keyword; failing that,
 * any plausible date in the text.
 */
export function extractDeadline(text: string, options: ExtractOptions = {}): string {
  const { anchored, fallback } = scanDeadline(text, options);
  return anchored || fallback;
}

/**
 * Text after a label, up to the next known label, a heading-like line or
 * the end of the text.
 */
export function extractLabeledSegment(
  text: string,
  labels: string[],
  stopLabels: string[],
  maxChars: number,
): string {
  const stop = labelPattern(stopLabels, 'i');

  for (const match of text.matchAll(labelPattern(labels, 'gi'))) {
    const rest = text.slice((match.index ?? 0) + match[0].length);
    let end = rest.length;

    const stopMatch = stop.exec(rest);
    if (stopMatch) end = Math.min(end, stopMatch.index);
    const heading = HEADING_LINE.exec(rest);
    if (heading) end = Math.min(end, heading.index);

    const segment = cleanText(rest.slice(0, end)).slice(0, maxChars).trim();
    if (segment) return segment;
  }

  return UNKNOWN;
}

export function extractBudget(text: string, lexicon: Lexicon = DEFAULT_LEXICON): string {
  const labeled = extractLabeledSegment(text, lexicon.budgetLabels, lexicon.stopLabels, lexicon.budgetMaxChars);
  if (labeled) return labeled;

  const amount = CURRENCY_AMOUNT.exec(text);
  return amount ? cleanText(amount[0]) : UNKNOWN;
}

export function detectArea(text: string, lexicon: Lexicon = DEFAULT_LEXICON): string {
  const rule = lexicon.areas.find((area) => area.patterns.some((pattern) => pattern.test(text)));
  return rule ? rule.label : UNKNOWN;
}

export function isRecurringText(text: string, lexicon: Lexicon = DEFAULT_LEXICON): boolean {
  return phrasePattern(lexicon.recurringTerms, 'i').test(text);
}

function heuristicFields(text: string, options: ExtractOptions): { fields: ExtractedFields; fallbackDeadline: string } {
  const lexicon = options.lexicon ?? DEFAULT_LEXICON;
  if (!text.trim()) return { fields: emptyFields(), fallbackDeadline: UNKNOWN };

  const { anchored, fallback } = scanDeadline(text, options);
  return {
    fields: {
      deadline: anchored,
      eligibility: extractLabeledSegment(
        text,
        lexicon.eligibilityLabels,
        lexicon.stopLabels,
        lexicon.eligibilityMaxChars,
      ),
      budget: extractBudget(text, lexicon),
      area: detectArea(text, lexicon),
      recurring: isRecurringText(text, lexicon),
    },
    fallbackDeadline: fallback,
  };
}

export function extractFields(text: string, options: ExtractOptions = {}): ExtractedFields {
  const { fields, fallbackDeadline } = heuristicFields(text, options);
  if (!fields.deadline) fields.deadline = fallbackDeadline;
  return fields;
}

function firstLine(text: string): string {
  return text.split('\n').map((line) => cleanText(line)).find((line) => line.length > 0) ?? '';
}

/**
 * Full extraction for one document. HTML gets the structural overlay on top
 * of the text heuristics, filling only fields the heuristics left unknown; a
 * date with no deadline keyword near it only counts when markup has none.
 */
export function extractDocument(
  content: string,
  kind: DocumentKind,
  { baseUrl, ...options }: ExtractOptions & { baseUrl?: string } = {},
): ExtractedDocument {
  if (kind === 'text') {
    return {
      title: firstLine(content),
      text: content,
      fields: extractFields(content, options),
      pdfLinks: [],
    };
  }

  const text = cleanHTML(content);
  const { fields, fallbackDeadline } = heuristicFields(text, options);
  const lexicon = options.lexicon ?? DEFAULT_LEXICON;
  const structured = extractStructuredFields(content, dateOptionsFor(lexicon, options.now));

  // Keyword-anchored text, then markup, then any date in the text.
  if (!fields.deadline) fields.deadline = structured.deadline ?? fallbackDeadline;
  if (!fields.eligibility && structured.eligibility) fields.eligibility = structured.eligibility;
  if (!fields.budget && structured.budget) fields.budget = structured.budget;
  if (!fields.area && structured.area) fields.area = structured.area;

  return {
    title: structured.title ?? pickTitle(content),
    text,
    fields,
    pdfLinks: baseUrl ? findPdfLinks(content, baseUrl) : [],
  };
}
