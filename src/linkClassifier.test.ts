import { describe, expect, it } from 'vitest';
import { collectCandidateLinks, isCallLink, isPdfUrl, looksLikeNonCall } from './linkClassifier.js';

describe('isCallLink', () => {
  it('rejects application forms and accepts call PDFs', () => {
    expect(isCallLink('Download Application Form', 'https://agency.example/docs/notice')).toBe(false);
    expect(isCallLink('Call for Research Proposals 2025.pdf', 'https://agency.example/uploads/crp-2025.pdf')).toBe(true);
  });

  it('lets exclusions win over keywords', () => {
    expect(isCallLink('FAQs on the scheme', 'https://agency.example/scheme/faqs')).toBe(false);
    expect(isCallLink('Fellowship awardees 2024', 'https://agency.example/news/list')).toBe(false);
  });

  it('matches terms at word starts only', () => {
    expect(isCallLink('Information for applicants', 'https://agency.example/call-info')).toBe(true);
    expect(isCallLink('Platform overview', 'https://agency.example/platform')).toBe(false);
  });

  it('accepts PDFs without keywords and ignores the query string', () => {
    expect(isCallLink('Notice 12', 'https://agency.example/files/notice-12.pdf?v=2')).toBe(true);
    expect(isCallLink('About us', 'https://agency.example/about')).toBe(false);
  });

  it('does not count the host name as a keyword', () => {
    expect(isCallLink('Contact', 'https://grants.agency.example/contact')).toBe(false);
  });

  it('applies exclusions even under a must-path list', () => {
    const must = { mustPathFragments: ['/programmes/'] };
    expect(isCallLink('Call for proposals', 'https://agency.example/news/call', must)).toBe(false);
    expect(isCallLink('Indo-German projects', 'https://agency.example/programmes/indo-german', must)).toBe(true);

    expect(
      isCallLink('Download Application Form', 'https://agency.example/call/application-form.pdf', {
        mustPathFragments: ['/call'],
      }),
    ).toBe(false);

    const block = { blockPathFragments: ['/archive/'] };
    expect(isCallLink('Call for proposals', 'https://agency.example/archive/call-2019', block)).toBe(false);
  });

  it('extends the exclusion and keyword sets per source', () => {
    expect(isCallLink('Grant writing event', 'https://agency.example/news/1', { excludeTerms: ['event'] })).toBe(false);
    expect(isCallLink('Open competitions', 'https://agency.example/news/2', { keywords: ['competition'] })).toBe(true);
    expect(isCallLink('Open competitions', 'https://agency.example/news/2')).toBe(false);
  });
});

describe('isPdfUrl', () => {
  it('checks the path extension', () => {
    expect(isPdfUrl('https://agency.example/a/B.PDF?x=1')).toBe(true);
    expect(isPdfUrl('https://agency.example/pdf-viewer?file=a')).toBe(false);
  });
});

describe('looksLikeNonCall', () => {
  it('flags short and paperwork titles', () => {
    expect(looksLikeNonCall('FAQ')).toBe(true);
    expect(looksLikeNonCall('abc')).toBe(true);
    expect(looksLikeNonCall('Application Forms')).toBe(true);
    expect(looksLikeNonCall('Call for Proposals 2025')).toBe(false);
  });
});

describe('collectCandidateLinks', () => {
  const listing = `<ul>
    <li><a href="/calls/2025-neuro">Call for Proposals: Neuroscience</a></li>
    <li><a href="/calls/2025-neuro#apply">Call for Proposals: Neuroscience</a></li>
    <li><a href="https://other.example/grants">Partner grants</a></li>
    <li><a href="/downloads/application-form.pdf">Application Form</a></li>
    <li><a href="/docs/notice.pdf">Notice</a></li>
    <li><a href="mailto:grants@agency.example">Email the grants team</a></li>
    <li><a href="/about">About</a></li>
    <li><a href="/fellowships/young">Young Investigator Fellowship</a></li>
  </ul>`;

  it('keeps same-host call links once each', () => {
    expect(collectCandidateLinks(listing, 'https://www.agency.example/funding/')).toEqual([
      { title: 'Call for Proposals: Neuroscience', url: 'https://www.agency.example/calls/2025-neuro' },
      { title: 'Notice', url: 'https://www.agency.example/docs/notice.pdf' },
      { title: 'Young Investigator Fellowship', url: 'https://www.agency.example/fellowships/young' },
    ]);
  });

  it('stops at the candidate cap', () => {
    const links = collectCandidateLinks(listing, 'https://www.agency.example/funding/', { maxCandidates: 2 });
    expect(links.map((link) => link.url)).toEqual([
      'https://www.agency.example/calls/2025-neuro',
      'https://www.agency.example/docs/notice.pdf',
    ]);
  });
});
