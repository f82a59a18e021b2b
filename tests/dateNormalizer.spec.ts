import { expect, test } from '@playwright/test';
import { extractDatePhrase, normalizeDeadline } from '../src/core/dateNormalizer';

test.describe('extractDatePhrase', () => {
  test('returns the earliest date-like phrase in prose', () => {
    expect(extractDatePhrase('Opens 1 Oct 2025, closes 2026-01-15')).toBe('1 Oct 2025');
    expect(extractDatePhrase('Deadline: March 3, 2026 for overseas applicants')).toBe('March 3, 2026');
  });

  test('returns null when there is no date', () => {
    expect(extractDatePhrase('Applications are considered on a rolling basis')).toBeNull();
  });
});

test.describe('normalizeDeadline', () => {
  const cases: [string, string][] = [
    ['Applications close on 15th January 2026 (noon, UK time)', '2026-01-15'],
    ['Deadline: March 3, 2026', '2026-03-03'],
    ['15 Sept 2026', '2026-09-15'],
    ['Round 2: 2026-01-15', '2026-01-15'],
    ['15/01/2026', '2026-01-15'],
    ['Jan. 5th 2026', '2026-01-05'],
  ];

  for (const [input, expected] of cases) {
    test(`reads "${input}"`, () => {
      expect(normalizeDeadline(input)).toBe(expected);
    });
  }

  test('slash dates are day-first', () => {
    expect(normalizeDeadline('03/04/2026')).toBe('2026-04-03');
  });

  test('returns null for text without a valid date', () => {
    expect(normalizeDeadline('Rolling admissions')).toBeNull();
    expect(normalizeDeadline('31 February 2026')).toBeNull();
  });
});
