/**
 * dateNormalizer.ts — Find and normalise deadline / opening-date phrases.
 *
 * University pages bury dates in prose:
 *
 *   "Applications close on 15th January 2026 (noon, UK time)"
 *   "Deadline: March 3, 2026"
 *   "Round 2 — 2026-01-15"
 *
 * `extractDatePhrase()` pulls the first date-looking phrase out of such text
 * and `normalizeDeadline()` turns it into an ISO calendar date with Luxon.
 * Slash dates are read day-first (15/01/2026), as most of the catalogue's
 * sites are outside the US.
 */

import { DateTime } from 'luxon';

const MONTH =
  '(?:Jan(?:uary)?|Feb(?:ruary)?|Mar(?:ch)?|Apr(?:il)?|May|June?|July?|Aug(?:ust)?|Sep(?:t(?:ember)?)?|Oct(?:ober)?|Nov(?:ember)?|Dec(?:ember)?)';

const DATE_PATTERNS: RegExp[] = [
  // 15 January 2026, 15th Jan. 2026
  new RegExp(`\\b\\d{1,2}(?:st|nd|rd|th)?\\s+${MONTH}\\.?,?\\s+\\d{4}\\b`, 'i'),
  // January 15, 2026, Jan 15th 2026
  new RegExp(`\\b${MONTH}\\.?\\s+\\d{1,2}(?:st|nd|rd|th)?,?\\s+\\d{4}\\b`, 'i'),
  // 2026-01-15
  /\b\d{4}-\d{2}-\d{2}\b/,
  // 15/01/2026
  /\b\d{1,2}\/\d{1,2}\/\d{4}\b/,
];

const FORMATS = [
  'd MMMM yyyy',
  'd MMM yyyy',
  'MMMM d yyyy',
  'MMM d yyyy',
  'yyyy-MM-dd',
  'd/M/yyyy',
];

/** The earliest date-like phrase in `text`, or null. */
export function extractDatePhrase(text: string): string | null {
  let best: { index: number; phrase: string } | null = null;

  for (const pattern of DATE_PATTERNS) {
    const match = pattern.exec(text);
    if (match && (best === null || match.index < best.index)) {
      best = { index: match.index, phrase: match[0] };
    }
  }
  return best?.phrase ?? null;
}

/**
 * Parse the first date phrase in `text` into `yyyy-MM-dd`.
 * Returns null for text with no recognisable date ("Rolling admissions").
 */
export function normalizeDeadline(text: string): string | null {
  const phrase = extractDatePhrase(text);
  if (!phrase) return null;

  const cleaned = phrase
    .replace(/(\d)(?:st|nd|rd|th)\b/gi, '$1')
    .replace(/\bSept\b/i, 'Sep')
    .replace(/[.,]/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();

  for (const format of FORMATS) {
    const parsed = DateTime.fromFormat(cleaned, format, { locale: 'en' });
    if (parsed.isValid) {
      return parsed.toISODate();
    }
  }
  return null;
}
