import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { buildCall, type CrawlDeps } from './callBuilder.js';
import { reconcile } from './dedupe.js';
import type { AgencySource, PartialCall } from './types.js';

const NOW = new Date(2025, 5, 1);

const source: AgencySource = {
  name: 'Test Agency',
  country: 'India',
  category: 'National',
  researchCategory: 'Research Proposal',
  startUrls: ['https://agency.example/calls'],
};

function fakeDeps(pages: Record<string, string>, pdfs: Record<string, string> = {}, overrides: Partial<CrawlDeps> = {}) {
  return {
    fetchHtml: vi.fn(async (url: string) => pages[url] ?? null),
    fetchPdfText: vi.fn(async (url: string) => pdfs[url] ?? ''),
    enricher: null,
    now: NOW,
    ...overrides,
  } satisfies CrawlDeps;
}

describe('buildCall', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('fills missing fields from the first linked PDF', async () => {
    const url = 'https://agency.example/calls/seed';
    const deps = fakeDeps(
      {
        [url]: `<html><head><title>Agency</title></head><body>
          <h1>Seed Grant 2025</h1>
          <p>Deadline: 30 September 2025</p>
          <p><a href="/docs/seed.pdf">Guidelines</a></p>
        </body></html>`,
      },
      {
        'https://agency.example/docs/seed.pdf':
          'Seed Grant 2025\nEligibility: Assistant professors\nBudget: INR 10 lakh\nArea: Biotechnology',
      },
    );

    const call = await buildCall({ title: 'Seed Grant', url }, source, deps);

    expect(call).toEqual({
      title: 'Seed Grant 2025',
      agency: 'Test Agency',
      deadline: '2025-09-30',
      extendedDeadline: '',
      eligibility: 'Assistant professors',
      budget: 'INR 10 lakh',
      area: 'Biotechnology',
      url,
      category: 'National',
      researchCategory: 'Research Proposal',
      country: 'India',
      isRecurring: false,
    });
    expect(deps.fetchPdfText).toHaveBeenCalledWith('https://agency.example/docs/seed.pdf');
  });

  it('asks the enricher only for what is still missing', async () => {
    const url = 'https://agency.example/calls/young';
    const enrich = vi.fn(
      async (): Promise<PartialCall | null> => ({
        title: 'Something else',
        deadline: '2025-08-01',
        eligibility: 'Under 35',
        budget: 'EUR 5,000',
      }),
    );
    const deps = fakeDeps(
      { [url]: '<h1>Young Scientist Fellowship</h1><p>Deadline: 30 September 2025</p>' },
      {},
      { enricher: { enrich } },
    );

    const call = await buildCall({ title: 'Young Scientist Fellowship', url }, source, deps);

    expect(enrich).toHaveBeenCalledWith('Young Scientist Fellowship\nDeadline: 30 September 2025');
    expect(call).toMatchObject({
      title: 'Young Scientist Fellowship',
      deadline: '2025-09-30',
      eligibility: 'Under 35',
      budget: 'EUR 5,000',
      area: '',
    });
    expect(deps.fetchPdfText).not.toHaveBeenCalled();
  });

  it('keeps the page fields when the enricher fails', async () => {
    const url = 'https://agency.example/calls/young';
    const enrich = vi.fn(async (): Promise<PartialCall | null> => {
      throw new Error('timeout');
    });
    const deps = fakeDeps(
      { [url]: '<h1>Young Scientist Fellowship</h1><p>Deadline: 30 September 2025</p>' },
      {},
      { enricher: { enrich } },
    );

    const call = await buildCall({ title: 'Young Scientist Fellowship', url }, source, deps);

    expect(call).toMatchObject({ title: 'Young Scientist Fellowship', deadline: '2025-09-30', eligibility: '' });
    expect(console.warn).toHaveBeenCalledWith(`   ⚠️  Skipping AI enrichment for ${url}: timeout`);
  });

  it('keeps the page fields when the companion PDF cannot be fetched', async () => {
    const url = 'https://agency.example/calls/seed';
    const deps = fakeDeps(
      { [url]: '<h1>Seed Grant 2025</h1><p>Deadline: 30 September 2025</p><a href="/docs/seed.pdf">Guidelines</a>' },
      {},
      {
        fetchPdfText: async () => {
          throw new Error('pdf reset');
        },
      },
    );

    const call = await buildCall({ title: 'Seed Grant', url }, source, deps);

    expect(call).toMatchObject({ title: 'Seed Grant 2025', deadline: '2025-09-30', budget: '' });
    expect(console.warn).toHaveBeenCalledWith(
      '   ⚠️  Skipping companion PDF https://agency.example/docs/seed.pdf: pdf reset',
    );
  });

  it('keeps calls apart when their pages share a publisher block', async () => {
    const publisher =
      '<script type="application/ld+json">{"@type":"Organization","name":"Department of Science and Technology"}</script>';
    const pages = {
      'https://agency.example/calls/wos': `<head>${publisher}</head><body><h1>Women Scientists Scheme</h1></body>`,
      'https://agency.example/calls/crg': `<head>${publisher}</head><body><h1>Core Research Grant</h1></body>`,
    };
    const deps = fakeDeps(pages);

    const built = await Promise.all(
      Object.keys(pages).map((url) => buildCall({ title: 'Call', url }, source, deps)),
    );
    const calls = reconcile([], built.flatMap((call) => (call ? [call] : [])), { now: NOW });

    expect(calls.map((call) => call.title)).toEqual(['Core Research Grant', 'Women Scientists Scheme']);
  });

  it('reads PDF candidates directly', async () => {
    const url = 'https://agency.example/files/call-2025.pdf';
    const deps = fakeDeps({}, { [url]: 'Call for Research Proposals 2025\nLast date: 15/08/2025' });

    const call = await buildCall({ title: 'Call for Proposals 2025', url }, source, deps);

    expect(deps.fetchHtml).not.toHaveBeenCalled();
    expect(call?.title).toBe('Call for Research Proposals 2025');
    expect(call?.deadline).toBe('2025-08-15');
  });

  it('falls back to the anchor text for untitled pages', async () => {
    const url = 'https://agency.example/calls/neuro';
    const deps = fakeDeps({ [url]: '<p>Apply before the deadline: 30 September 2025</p>' });

    const call = await buildCall({ title: 'Neuro Grants 2025', url }, source, deps);

    expect(call?.title).toBe('Neuro Grants 2025');
    expect(call?.deadline).toBe('2025-09-30');
  });

  it('returns null for unreachable pages and non-call titles', async () => {
    const deps = fakeDeps({ 'https://agency.example/scheme/faq': '<h1>FAQ</h1>' });

    await expect(buildCall({ title: 'Call', url: 'https://agency.example/missing' }, source, deps)).resolves.toBeNull();
    await expect(buildCall({ title: 'Scheme FAQ', url: 'https://agency.example/scheme/faq' }, source, deps)).resolves.toBeNull();
  });
});
