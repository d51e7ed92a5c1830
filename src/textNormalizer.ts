const DASH_VARIANTS = /[‐-―−﹘﹣－]/g;

export function cleanText(value?: string | null): string {
  if (!value) return '';
  return value.replace(/\s+/g, ' ').trim();
}

export function stripOrdinals(value: string): string {
  return value.replace(/(\d)(?:st|nd|rd|th)\b/gi, '$1');
}

export function normalizeDashes(value: string): string {
  return value.replace(DASH_VARIANTS, '-');
}

/**
 * Lower-cases and reduces every run of non letter/digit characters to a
 * single space, so "Grant X – 2025" and "grant x 2025" share a key.
 */
export function normalizeKey(value?: string | null): string {
  if (!value) return '';
  return value
    .toLowerCase()
    .replace(/[^\p{L}\p{N}]+/gu, ' ')
    .trim();
}

export function identityKey(call: { title: string; agency: string }): string {
  return `${normalizeKey(call.title)}|${normalizeKey(call.agency)}`;
}

export function truncateTitle(title: string, maxLen = 80): string {
  const trimmed = cleanText(title);
  return trimmed.length > maxLen ? `${trimmed.slice(0, maxLen - 1)}…` : trimmed;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
