import fs from 'fs';
import { z } from 'zod';
import type { AgencySource, PartialCall } from './types.js';

const fragmentList = z.array(z.string().min(1)).optional();

const AgencySourceSchema = z.object({
  name: z.string().min(1),
  country: z.string().default('Global'),
  category: z.string().default(''),
  researchCategory: z.string().default('Research Proposal'),
  startUrls: z.array(z.string().url()).min(1),
  feeds: z.array(z.string().url()).optional(),
  mustPathFragments: fragmentList,
  blockPathFragments: fragmentList,
  excludeTerms: fragmentList,
  keywords: fragmentList,
  maxCandidates: z.number().int().positive().optional(),
});

const RecurringCallSchema = z.object({
  title: z.string().min(1),
  agency: z.string().min(1),
  deadline: z.string().optional(),
  extendedDeadline: z.string().optional(),
  eligibility: z.string().optional(),
  budget: z.string().optional(),
  area: z.string().optional(),
  url: z.string().optional(),
  category: z.string().optional(),
  researchCategory: z.string().optional(),
  country: z.string().optional(),
  isRecurring: z.boolean().default(true),
});

const SourceListSchema = z.object({
  agencies: z.array(AgencySourceSchema),
  recurring: z.array(RecurringCallSchema).default([]),
});

export interface SourceList {
  agencies: AgencySource[];
  recurring: PartialCall[];
}

export function parseSourceList(data: unknown): SourceList {
  const parsed = SourceListSchema.safeParse(data);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid source list:\n  ${issues.join('\n  ')}`);
  }
  return parsed.data;
}

export function loadSources(filePath: string): SourceList {
  if (!fs.existsSync(filePath)) {
    throw new Error(`Source list not found: ${filePath}`);
  }
  const data: unknown = JSON.parse(fs.readFileSync(filePath, 'utf8'));
  return parseSourceList(data);
}
