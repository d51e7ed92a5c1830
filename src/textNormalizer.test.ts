import { describe, expect, it } from 'vitest';
import {
  cleanText,
  identityKey,
  normalizeDashes,
  normalizeKey,
  stripOrdinals,
  truncateTitle,
} from './textNormalizer.js';

describe('textNormalizer', () => {
  it('collapses whitespace and trims', () => {
    expect(cleanText('  Call \n for\t\tProposals  ')).toBe('Call for Proposals');
    expect(cleanText(undefined)).toBe('');
    expect(cleanText(null)).toBe('');
  });

  it('strips ordinal suffixes after digits only', () => {
    expect(stripOrdinals('1st, 2nd, 3rd and 24th')).toBe('1, 2, 3 and 24');
    expect(stripOrdinals('first')).toBe('first');
  });

  it('normalizes dash variants', () => {
    expect(normalizeDashes('15–08—2025 − x')).toBe('15-08-2025 - x');
  });

  it('normalizes keys case- and punctuation-insensitively', () => {
    expect(normalizeKey('  Grant X – 2025! ')).toBe('grant x 2025');
    expect(normalizeKey('Förderung: Programm')).toBe('förderung programm');
  });

  it('builds the same identity key for cosmetic variants', () => {
    const a = identityKey({ title: 'Grant X', agency: 'Agency Y' });
    const b = identityKey({ title: 'grant-x', agency: ' AGENCY  Y.' });
    expect(a).toBe('grant x|agency y');
    expect(b).toBe(a);
  });

  it('truncates long titles for display', () => {
    const title = 'a'.repeat(100);
    const truncated = truncateTitle(title);
    expect(truncated).toHaveLength(80);
    expect(truncated.endsWith('…')).toBe(true);
    expect(truncateTitle('Short title')).toBe('Short title');
  });
});
