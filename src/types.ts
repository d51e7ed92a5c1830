/** Placeholder for a field the extractors have not determined yet. */
export const UNKNOWN = '';

export const DEFAULT_COUNTRY = 'Global';

export interface FundingCall {
  title: string;
  agency: string;

  deadline: string; // YYYY-MM-DD or UNKNOWN
  extendedDeadline: string; // YYYY-MM-DD or UNKNOWN

  eligibility: string;
  budget: string;
  area: string;

  url: string;
  category: string;
  researchCategory: string;
  country: string;

  isRecurring: boolean;
}

export type CallFields = Omit<FundingCall, 'isRecurring'>;

export type PartialCall = Partial<FundingCall>;

export interface ExtractedFields {
  deadline: string;
  eligibility: string;
  budget: string;
  area: string;
  recurring: boolean;
}

export type DocumentKind = 'html' | 'text';

export interface ExtractedDocument {
  title: string;
  text: string;
  fields: ExtractedFields;
  pdfLinks: string[];
}

export interface LinkRules {
  mustPathFragments?: string[];
  blockPathFragments?: string[];
  excludeTerms?: string[];
  keywords?: string[];
  maxCandidates?: number;
}

export interface AgencySource extends LinkRules {
  name: string;
  country: string;
  category: string;
  researchCategory: string;
  startUrls: string[];
  feeds?: string[];
}

export interface CandidateLink {
  title: string;
  url: string;
}

export interface DateWindow {
  pastDays: number;
  futureDays: number;
}

/**
 * Optional AI fill for fields the heuristics left empty. Absent when no
 * backend is configured.
 */
export interface TextEnricher {
  enrich(text: string): Promise<PartialCall | null>;
}
