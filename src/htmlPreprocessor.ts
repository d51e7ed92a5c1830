import * as cheerio from 'cheerio';
import { pickPlausibleDate, type DateOptions } from './dateResolver.js';
import { isPdfUrl, resolveUrl } from './linkClassifier.js';
import { cleanText } from './textNormalizer.js';

type CheerioRoot = ReturnType<typeof cheerio.load>;

export interface StructuredFields {
  title?: string;
  deadline?: string;
  eligibility?: string;
  budget?: string;
  area?: string;
}

type LabeledField = 'deadline' | 'eligibility' | 'budget' | 'area';

const LABEL_RULES: Array<{ field: LabeledField; pattern: RegExp }> = [
  { field: 'deadline', pattern: /deadline|last date|last day|closing|apply by/i },
  { field: 'eligibility', pattern: /eligib|who can apply/i },
  { field: 'budget', pattern: /budget|funding|grant amount|amount of support/i },
  { field: 'area', pattern: /\barea\b|thematic|research field/i },
];

const VALUE_LIMITS: Record<Exclude<LabeledField, 'deadline'>, number> = {
  eligibility: 600,
  budget: 250,
  area: 200,
};

const JSON_LD_DEADLINE_KEYS = ['deadline', 'applicationDeadline', 'validThrough', 'dateDue', 'endDate'];
const JSON_LD_TITLE_KEYS = ['name', 'headline'];

// Site-wide blocks such as Organization or WebSite name the publisher, not the call.
const JSON_LD_TITLE_TYPES = new Set([
  'event',
  'webpage',
  'article',
  'newsarticle',
  'grant',
  'monetarygrant',
  'fundingscheme',
  'educationaloccupationalprogram',
]);

const BLOCK_ELEMENTS = 'p, div, section, article, li, tr, dt, dd, h1, h2, h3, h4, h5, h6, table, ul, ol, dl';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function classifyLabel(label: string): LabeledField | null {
  for (const rule of LABEL_RULES) {
    if (rule.pattern.test(label)) return rule.field;
  }
  return null;
}

/**
 * Page text with scripts, styles and navigation chrome removed. Block
 * elements end a line so label/value pairs stay apart.
 */
export function cleanHTML(html: string): string {
  const $ = cheerio.load(html);

  $('script, style, noscript, nav, footer, header, .menu, .navigation, .sidebar').remove();
  $('br').replaceWith('\n');
  $('td, th').append(' ');
  $(BLOCK_ELEMENTS).append('\n');

  const text = $('body').length > 0 ? $('body').text() : $.root().text();

  return text
    .split('\n')
    .map((line) => cleanText(line))
    .filter((line) => line.length > 0)
    .join('\n');
}

function readJsonLd($: CheerioRoot): Array<Record<string, unknown>> {
  const items: Array<Record<string, unknown>> = [];

  $('script[type="application/ld+json"]').each((_, element) => {
    const raw = $(element).contents().text();
    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch {
      return;
    }

    const queue: unknown[] = Array.isArray(data) ? [...data] : [data];
    while (queue.length > 0) {
      const item = queue.shift();
      if (!isRecord(item)) continue;
      items.push(item);
      const graph = item['@graph'];
      if (Array.isArray(graph)) queue.push(...graph);
    }
  });

  return items;
}

function isTitleSource(item: Record<string, unknown>): boolean {
  const type = item['@type'];
  const types: unknown[] = Array.isArray(type) ? type : [type];
  return types.some((value) => typeof value === 'string' && JSON_LD_TITLE_TYPES.has(value.toLowerCase()));
}

function jsonLdTitle(items: Array<Record<string, unknown>>): string | undefined {
  for (const item of items) {
    if (!isTitleSource(item)) continue;
    for (const key of JSON_LD_TITLE_KEYS) {
      const value = item[key];
      if (typeof value === 'string' && cleanText(value)) return cleanText(value);
    }
  }
  return undefined;
}

export function pickTitle(html: string): string {
  const $ = cheerio.load(html);

  const fromJsonLd = jsonLdTitle(readJsonLd($));
  if (fromJsonLd) return fromJsonLd;

  const h1 = cleanText($('h1').first().text());
  if (h1) return h1;

  return cleanText($('title').first().text());
}

function labeledPairs($: CheerioRoot): Array<[string, string]> {
  const pairs: Array<[string, string]> = [];

  $('table tr').each((_, row) => {
    const cells = $(row)
      .find('th, td')
      .map((__, cell) => cleanText($(cell).text()))
      .get();
    if (cells.length < 2) return;
    const value = cleanText(cells.slice(1).join(' '));
    if (value) pairs.push([cells[0], value]);
  });

  $('dl').each((_, list) => {
    const terms = $(list).find('dt').toArray();
    const definitions = $(list).find('dd').toArray();
    terms.forEach((term, index) => {
      const definition = definitions[index];
      if (!definition) return;
      const value = cleanText($(definition).text());
      if (value) pairs.push([cleanText($(term).text()), value]);
    });
  });

  return pairs;
}

/**
 * Reads deadline, eligibility, budget, area and title from tables,
 * definition lists, meta tags, JSON-LD and <time> elements.
 */
export function extractStructuredFields(html: string, dateOptions: DateOptions = {}): StructuredFields {
  const $ = cheerio.load(html);
  const out: StructuredFields = {};
  const labeledDates: string[] = [];

  for (const [label, value] of labeledPairs($)) {
    const field = classifyLabel(label);
    if (!field) continue;
    if (field === 'deadline') {
      labeledDates.push(value);
    } else if (!out[field]) {
      out[field] = value.slice(0, VALUE_LIMITS[field]).trim();
    }
  }

  const metaDates = $('meta[name="deadline"], meta[property="deadline"]')
    .map((_, element) => $(element).attr('content') ?? '')
    .get();

  const jsonLd = readJsonLd($);
  const jsonLdDates: string[] = [];
  for (const item of jsonLd) {
    for (const key of JSON_LD_DEADLINE_KEYS) {
      const value = item[key];
      if (typeof value === 'string') jsonLdDates.push(value);
    }
  }
  const title = jsonLdTitle(jsonLd);
  if (title) out.title = title;

  const timeDates = $('time')
    .map((_, element) => $(element).attr('datetime') ?? $(element).text())
    .get();

  // Stages in order of trust; the first with a plausible date wins.
  for (const stage of [labeledDates, metaDates, jsonLdDates, timeDates]) {
    const deadline = pickPlausibleDate(stage, dateOptions);
    if (deadline) {
      out.deadline = deadline;
      break;
    }
  }

  return out;
}

export function findPdfLinks(html: string, baseUrl: string): string[] {
  const $ = cheerio.load(html);
  const links: string[] = [];

  $('a[href]').each((_, element) => {
    const href = $(element).attr('href');
    if (!href) return;
    const url = resolveUrl(href, baseUrl);
    if (url && isPdfUrl(url) && !links.includes(url)) {
      links.push(url);
    }
  });

  return links;
}
