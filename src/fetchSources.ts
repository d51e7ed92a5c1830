import Parser from 'rss-parser';
import { buildCall, type CrawlDeps } from './callBuilder.js';
import type { AppConfig } from './config.js';
import { delay, fetchBytes, fetchHtml } from './httpClient.js';
import { DEFAULT_LEXICON } from './lexicon.js';
import {
  collectCandidateLinks,
  DEFAULT_MAX_CANDIDATES,
  isCallLink,
  resolveUrl,
} from './linkClassifier.js';
import { extractPdfText } from './pdfText.js';
import { cleanText, errorMessage, truncateTitle } from './textNormalizer.js';
import type { AgencySource, CandidateLink, FundingCall, LinkRules, TextEnricher } from './types.js';

export interface CrawlStats {
  sources: number;
  failedSources: number;
  candidates: number;
  built: number;
  skipped: number;
  errors: number;
}

export function emptyStats(): CrawlStats {
  return { sources: 0, failedSources: 0, candidates: 0, built: 0, skipped: 0, errors: 0 };
}

function rulesFor(source: AgencySource, deps: CrawlDeps): LinkRules {
  return {
    mustPathFragments: source.mustPathFragments,
    blockPathFragments: source.blockPathFragments,
    excludeTerms: source.excludeTerms,
    keywords: source.keywords,
    maxCandidates: source.maxCandidates ?? deps.maxCandidates ?? DEFAULT_MAX_CANDIDATES,
  };
}

/** Feed entries whose title or link looks like a call. */
export async function parseFeedCandidates(xml: string, feedUrl: string, rules: LinkRules = {}): Promise<CandidateLink[]> {
  const parser = new Parser();
  const feed = await parser.parseString(xml);
  const links: CandidateLink[] = [];

  for (const item of feed.items ?? []) {
    const title = cleanText(item.title);
    const url = item.link ? resolveUrl(item.link, feedUrl) : null;
    if (!title || !url) continue;
    if (isCallLink(title, url, rules)) {
      links.push({ title, url });
    }
  }

  return links;
}

/**
 * Candidate links from every listing page and feed of a source, URL-unique
 * and capped. An unreachable listing only loses its own links.
 */
export async function discoverCandidates(source: AgencySource, deps: CrawlDeps): Promise<CandidateLink[]> {
  const rules = rulesFor(source, deps);
  const found: CandidateLink[] = [];

  for (const startUrl of source.startUrls) {
    console.log(`\n[fetchSources] 📄 Listing: ${startUrl}`);
    const html = await deps.fetchHtml(startUrl);
    if (!html) {
      console.error(`   ❌ Listing unavailable, skipping`);
      continue;
    }
    found.push(...collectCandidateLinks(html, startUrl, rules));
  }

  for (const feedUrl of source.feeds ?? []) {
    console.log(`\n[fetchSources] 📡 RSS: ${feedUrl}`);
    const xml = await deps.fetchHtml(feedUrl);
    if (!xml) continue;
    try {
      found.push(...(await parseFeedCandidates(xml, feedUrl, rules)));
    } catch (err) {
      console.error(`   ❌ RSS error: ${errorMessage(err)}`);
    }
  }

  const unique = new Map<string, CandidateLink>();
  for (const link of found) {
    if (!unique.has(link.url)) unique.set(link.url, link);
  }
  return Array.from(unique.values()).slice(0, rules.maxCandidates);
}

export async function crawlSource(
  source: AgencySource,
  deps: CrawlDeps,
  stats: CrawlStats = emptyStats(),
): Promise<FundingCall[]> {
  const candidates = await discoverCandidates(source, deps);
  stats.candidates += candidates.length;
  console.log(`   🔗 ${candidates.length} candidate links for ${source.name}`);

  const calls: FundingCall[] = [];
  for (const candidate of candidates) {
    try {
      const call = await buildCall(candidate, source, deps);
      if (!call) {
        stats.skipped++;
        continue;
      }
      calls.push(call);
      stats.built++;
      console.log(`   ▸ ${source.name}: ${truncateTitle(call.title)} (deadline ${call.deadline || 'n/a'})`);
    } catch (err) {
      stats.errors++;
      console.error(`   ❌ ${candidate.url}: ${errorMessage(err)}`);
    }
  }

  return calls;
}

export async function crawlAll(
  sources: AgencySource[],
  deps: CrawlDeps,
): Promise<{ calls: FundingCall[]; stats: CrawlStats }> {
  const stats = emptyStats();
  const calls: FundingCall[] = [];

  for (const source of sources) {
    console.log('\n' + '═'.repeat(60));
    console.log(`🏛️  Agency: ${source.name}`);
    stats.sources++;
    try {
      calls.push(...(await crawlSource(source, deps, stats)));
    } catch (err) {
      stats.failedSources++;
      console.error(`   ❌ Source failed: ${errorMessage(err)}`);
    }
  }

  return { calls, stats };
}

/** Network-backed dependencies with a fixed pause after every request. */
export function createHttpDeps(config: AppConfig, enricher: TextEnricher | null, now?: Date): CrawlDeps {
  const http = { timeoutMs: config.REQUEST_TIMEOUT_MS };

  return {
    enricher,
    now,
    maxCandidates: config.MAX_CANDIDATES,
    lexicon: {
      ...DEFAULT_LEXICON,
      dateWindow: { pastDays: config.DATE_WINDOW_PAST_DAYS, futureDays: config.DATE_WINDOW_FUTURE_DAYS },
    },
    async fetchHtml(url) {
      const html = await fetchHtml(url, http);
      await delay(config.REQUEST_DELAY_MS);
      return html;
    },
    async fetchPdfText(url) {
      const bytes = await fetchBytes(url, { ...http, maxBytes: config.PDF_MAX_BYTES });
      await delay(config.REQUEST_DELAY_MS);
      return bytes ? extractPdfText(bytes, config.PDF_MAX_CHARS) : '';
    },
  };
}
