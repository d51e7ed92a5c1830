import * as cheerio from 'cheerio';
import { escapeRegExp } from './lexicon.js';
import { cleanText } from './textNormalizer.js';
import type { CandidateLink, LinkRules } from './types.js';

export const GLOBAL_EXCLUDE_TERMS = [
  'faq',
  'form',
  'guideline',
  'tender',
  'result',
  'award',
  'corrigendum',
];

export const CALL_KEYWORDS = [
  'call',
  'grant',
  'fund',
  'funding',
  'proposal',
  'fellowship',
  'scheme',
  'programme',
  'program',
  'opportunit',
  'apply',
];

export const DEFAULT_MAX_CANDIDATES = 80;
export const MIN_TITLE_LENGTH = 4;

/** Titles of fetched pages that turned out to be navigation or paperwork. */
const NON_CALL_TITLE = /\b(?:faqs?|forms?|formats?|guidelines?|tenders?|corrigendum|results?|awardees?|login|sitemap|contact us|home|page not found)\b/i;

/**
 * Terms match at the start of a word, so "form" rejects "Application Form"
 * and "application-form.pdf" but not "information".
 */
function termPattern(terms: string[]): RegExp | null {
  const cleaned = terms.map((term) => term.trim().toLowerCase()).filter(Boolean);
  if (cleaned.length === 0) return null;
  return new RegExp(`(?:^|[^\\p{L}\\p{N}])(?:${cleaned.map(escapeRegExp).join('|')})`, 'iu');
}

const defaultExcludePattern = termPattern(GLOBAL_EXCLUDE_TERMS);
const defaultKeywordPattern = termPattern(CALL_KEYWORDS);

export function resolveUrl(href: string, baseUrl: string): string | null {
  try {
    const url = new URL(href, baseUrl);
    url.hash = '';
    return url.toString();
  } catch {
    return null;
  }
}

function urlPath(url: string): string {
  try {
    const parsed = new URL(url);
    return decodeURIComponent(parsed.pathname).toLowerCase();
  } catch {
    return url.split(/[?#]/)[0].toLowerCase();
  }
}

function hostOf(url: string): string | null {
  try {
    return new URL(url).hostname.replace(/^www\./, '');
  } catch {
    return null;
  }
}

export function isPdfUrl(url: string): boolean {
  return url.toLowerCase().split(/[?#]/)[0].endsWith('.pdf');
}

export function isCallLink(anchorText: string, url: string, rules: LinkRules = {}): boolean {
  const path = urlPath(url);
  const text = cleanText(anchorText).toLowerCase();

  if (rules.blockPathFragments?.some((fragment) => path.includes(fragment.toLowerCase()))) {
    return false;
  }

  const exclude = rules.excludeTerms?.length
    ? termPattern([...GLOBAL_EXCLUDE_TERMS, ...rules.excludeTerms])
    : defaultExcludePattern;
  if (exclude && (exclude.test(text) || exclude.test(path))) {
    return false;
  }

  // A must-path list replaces the keyword and PDF acceptance.
  if (rules.mustPathFragments && rules.mustPathFragments.length > 0) {
    return rules.mustPathFragments.some((fragment) => path.includes(fragment.toLowerCase()));
  }

  const keywords = rules.keywords?.length
    ? termPattern([...CALL_KEYWORDS, ...rules.keywords])
    : defaultKeywordPattern;
  if (keywords && (keywords.test(text) || keywords.test(path))) {
    return true;
  }

  return isPdfUrl(url);
}

export function looksLikeNonCall(title: string): boolean {
  const cleaned = cleanText(title);
  return cleaned.length < MIN_TITLE_LENGTH || NON_CALL_TITLE.test(cleaned);
}

/**
 * Anchors on a listing page that look like calls, resolved against the page
 * URL, kept on the listing's host and capped per source.
 */
export function collectCandidateLinks(html: string, pageUrl: string, rules: LinkRules = {}): CandidateLink[] {
  const $ = cheerio.load(html);
  const host = hostOf(pageUrl);
  const max = rules.maxCandidates ?? DEFAULT_MAX_CANDIDATES;
  const seen = new Set<string>();
  const links: CandidateLink[] = [];

  $('a[href]').each((_, element) => {
    if (links.length >= max) return false;

    const href = $(element).attr('href');
    const title = cleanText($(element).text() || $(element).attr('title'));
    if (!href || !title) return;

    const url = resolveUrl(href, pageUrl);
    if (!url || !/^https?:/i.test(url) || seen.has(url)) return;
    if (hostOf(url) !== host) return;
    if (!isCallLink(title, url, rules)) return;

    seen.add(url);
    links.push({ title, url });
  });

  return links;
}
