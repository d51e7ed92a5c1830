import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { createCall } from './recordMerge.js';
import { errorMessage } from './textNormalizer.js';
import type { FundingCall } from './types.js';

const text = z
  .union([z.string(), z.number()])
  .nullish()
  .transform((value) => (value === null || value === undefined ? '' : String(value)));

const StoredCallSchema = z.object({
  title: text,
  agency: text,
  deadline: text,
  extendedDeadline: text,
  eligibility: text,
  budget: text,
  area: text,
  url: text,
  category: text,
  researchCategory: text,
  country: text,
  isRecurring: z.boolean().nullish().transform((value) => value === true),
});

interface SnapshotFile {
  updated_utc: string;
  calls: FundingCall[];
}

function recordsOf(data: unknown): unknown[] {
  if (Array.isArray(data)) return data;
  if (typeof data === 'object' && data !== null && 'calls' in data && Array.isArray(data.calls)) {
    return data.calls;
  }
  return [];
}

/**
 * Prior snapshot, as written by saveSnapshot or as a bare array. A missing
 * or unreadable file starts the run from an empty snapshot.
 */
export function loadSnapshot(filePath: string): FundingCall[] {
  if (!fs.existsSync(filePath)) {
    return [];
  }

  let data: unknown;
  try {
    data = JSON.parse(fs.readFileSync(filePath, 'utf8'));
  } catch (err) {
    console.warn(`   ⚠️  Could not read snapshot ${filePath}: ${errorMessage(err)}`);
    return [];
  }

  const calls: FundingCall[] = [];
  let dropped = 0;
  for (const record of recordsOf(data)) {
    const parsed = StoredCallSchema.safeParse(record);
    if (parsed.success) {
      calls.push(createCall(parsed.data));
    } else {
      dropped++;
    }
  }
  if (dropped > 0) {
    console.warn(`   ⚠️  Ignored ${dropped} malformed snapshot records`);
  }

  return calls;
}

export function saveSnapshot(filePath: string, calls: FundingCall[], now: Date = new Date()): void {
  const snapshot: SnapshotFile = {
    updated_utc: now.toISOString().replace(/\.\d{3}Z$/, 'Z'),
    calls,
  };
  const dir = path.dirname(filePath);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
  fs.writeFileSync(filePath, JSON.stringify(snapshot, null, 2) + '\n');
}
