import type { DateOptions } from './dateResolver.js';
import { extractDocument } from './fieldExtractor.js';
import type { Lexicon } from './lexicon.js';
import { isPdfUrl, looksLikeNonCall } from './linkClassifier.js';
import { createCall, mergeAll } from './recordMerge.js';
import { errorMessage, truncateTitle } from './textNormalizer.js';
import type {
  AgencySource,
  CandidateLink,
  ExtractedDocument,
  FundingCall,
  PartialCall,
  TextEnricher,
} from './types.js';

/** Everything a crawl needs from the outside world. */
export interface CrawlDeps {
  fetchHtml(url: string): Promise<string | null>;
  fetchPdfText(url: string): Promise<string>;
  enricher: TextEnricher | null;
  lexicon?: Lexicon;
  now?: Date;
  maxCandidates?: number;
}

export function documentToPartial(doc: ExtractedDocument): PartialCall {
  return {
    title: doc.title,
    deadline: doc.fields.deadline,
    eligibility: doc.fields.eligibility,
    budget: doc.fields.budget,
    area: doc.fields.area,
    isRecurring: doc.fields.recurring,
  };
}

export function needsEnrichment(call: FundingCall): boolean {
  return !call.deadline || !call.eligibility || !call.budget || !call.area;
}

export function sourceContext(source: AgencySource, url: string): PartialCall {
  return {
    agency: source.name,
    category: source.category,
    researchCategory: source.researchCategory,
    country: source.country,
    url,
  };
}

export function dateOptionsOf(deps: CrawlDeps): DateOptions {
  return { now: deps.now, window: deps.lexicon?.dateWindow };
}

/** Runs a stage that can only add fields; a failure leaves the record as it was. */
async function optionalStage<T>(label: string, run: () => Promise<T>): Promise<T | null> {
  try {
    return await run();
  } catch (err) {
    console.warn(`   ⚠️  Skipping ${label}: ${errorMessage(err)}`);
    return null;
  }
}

/**
 * Builds one record for a candidate link: page text and structure first,
 * then the first linked PDF, then the AI fallback, each filling only what
 * is still missing. Null when the page is unreachable or not a call.
 */
export async function buildCall(
  candidate: CandidateLink,
  source: AgencySource,
  deps: CrawlDeps,
): Promise<FundingCall | null> {
  const options = { lexicon: deps.lexicon, now: deps.now };
  const base = createCall(sourceContext(source, candidate.url));
  const texts: string[] = [];
  let call: FundingCall;

  if (isPdfUrl(candidate.url)) {
    const pdfText = await deps.fetchPdfText(candidate.url);
    if (!pdfText.trim()) {
      console.warn(`   ⚠️  No text in PDF ${candidate.url}`);
    }
    const pdfDoc = extractDocument(pdfText, 'text', options);
    texts.push(pdfDoc.text);
    call = mergeAll(base, documentToPartial(pdfDoc));
  } else {
    const html = await deps.fetchHtml(candidate.url);
    if (!html) return null;

    const page = extractDocument(html, 'html', { ...options, baseUrl: candidate.url });
    texts.push(page.text);
    call = mergeAll(base, documentToPartial(page));

    const [companionPdf] = page.pdfLinks;
    if (companionPdf) {
      const pdfText = await optionalStage(`companion PDF ${companionPdf}`, () =>
        deps.fetchPdfText(companionPdf),
      );
      if (pdfText?.trim()) {
        const pdfDoc = extractDocument(pdfText, 'text', options);
        texts.push(pdfDoc.text);
        call = mergeAll(call, documentToPartial(pdfDoc));
      }
    }
  }

  const { enricher } = deps;
  if (enricher && needsEnrichment(call)) {
    const enriched = await optionalStage(`AI enrichment for ${candidate.url}`, () =>
      enricher.enrich(texts.filter(Boolean).join('\n\n')),
    );
    call = mergeAll(call, enriched);
  }

  call = mergeAll(call, { title: candidate.title });

  if (looksLikeNonCall(call.title)) {
    console.log(`   ⏭️  Not a call: "${truncateTitle(call.title)}"`);
    return null;
  }

  return call;
}
