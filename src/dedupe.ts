import { isPlausible, type DateOptions } from './dateResolver.js';
import { createCall, mergeCalls } from './recordMerge.js';
import { identityKey, normalizeKey } from './textNormalizer.js';
import type { FundingCall, PartialCall } from './types.js';

const UNDATED = '9999-12-31';

const SCORED_FIELDS = ['deadline', 'eligibility', 'budget', 'area'] as const;

export function completenessScore(call: FundingCall): number {
  return SCORED_FIELDS.filter((field) => call[field].length > 0).length;
}

/**
 * Merge for two records of the same identity. When both carry a deadline and
 * they disagree, the earliest plausible one wins; if neither is plausible the
 * base keeps its own.
 */
export function mergeSameIdentity(base: FundingCall, incoming: FundingCall, options: DateOptions = {}): FundingCall {
  const merged = mergeCalls(base, incoming);

  if (base.deadline && incoming.deadline && base.deadline !== incoming.deadline) {
    const [earliest] = [base.deadline, incoming.deadline]
      .filter((deadline) => isPlausible(deadline, options))
      .sort();
    if (earliest) merged.deadline = earliest;
  }

  return merged;
}

/**
 * Collapses records sharing an identity key. The most complete record of
 * each group is the merge base; first seen wins ties.
 */
export function collapseDuplicates(calls: Array<FundingCall | PartialCall>, options: DateOptions = {}): FundingCall[] {
  const groups = new Map<string, FundingCall[]>();

  for (const raw of calls) {
    const call = createCall(raw);
    const key = identityKey(call);
    const group = groups.get(key);
    if (group) {
      group.push(call);
    } else {
      groups.set(key, [call]);
    }
  }

  return Array.from(groups.values(), (group) => {
    const [base, ...rest] = [...group].sort((a, b) => completenessScore(b) - completenessScore(a));
    return rest.reduce((merged, call) => mergeSameIdentity(merged, call, options), base);
  });
}

function compareCalls(a: FundingCall, b: FundingCall): number {
  const left = [a.deadline || UNDATED, normalizeKey(a.title), normalizeKey(a.agency)];
  const right = [b.deadline || UNDATED, normalizeKey(b.title), normalizeKey(b.agency)];
  for (let i = 0; i < left.length; i++) {
    if (left[i] < right[i]) return -1;
    if (left[i] > right[i]) return 1;
  }
  return 0;
}

/** Soonest deadline first, undated last, then by title and agency. */
export function rankCalls(calls: FundingCall[]): FundingCall[] {
  return [...calls].sort(compareCalls);
}

/**
 * Folds a fresh crawl into the prior snapshot. Fresh records only fill gaps
 * in the records they match; nothing is dropped.
 */
export function reconcile(
  existing: Array<FundingCall | PartialCall>,
  fresh: Array<FundingCall | PartialCall>,
  options: DateOptions = {},
): FundingCall[] {
  const index = new Map<string, FundingCall>();

  for (const call of collapseDuplicates(existing, options)) {
    index.set(identityKey(call), call);
  }

  for (const call of collapseDuplicates(fresh, options)) {
    const key = identityKey(call);
    const prior = index.get(key);
    index.set(key, prior ? mergeSameIdentity(prior, call, options) : call);
  }

  return rankCalls([...index.values()]);
}
