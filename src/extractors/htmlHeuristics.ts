/**
 * htmlHeuristics.ts — Selector-or-heuristic field lookups over detail-page HTML.
 *
 * Each helper first honours an explicit selector from the university
 * catalogue and only then falls back to structural guesses:
 *
 *   • title     — configured selector → first <h1> → <title> minus site suffix
 *   • dates     — configured selector → text next to a heading/label that
 *                 matches the label pattern, reduced to its date phrase
 *   • applyLink — configured selector → first anchor whose text reads like
 *                 an "apply" call to action (instruction pages excluded)
 */

import * as cheerio from 'cheerio';
import { extractDatePhrase } from '../core/dateNormalizer';

export const DEADLINE_LABEL = /deadline|closing date|applications? close/i;
export const OPEN_DATE_LABEL = /opening date|applications? open|open date/i;

const APPLY_KEYWORDS = [
  'apply now',
  'apply online',
  'apply here',
  'start your application',
  'start application',
  'application portal',
  'apply',
];

/** Paths that explain how to apply rather than take the application. */
const NOT_AN_APPLICATION = /how-to-apply|\/applying|\.pdf($|\?)/i;

const LABEL_ELEMENTS = 'h1, h2, h3, h4, h5, h6, th, dt, strong, b, label';

export function loadHtml(html: string): cheerio.CheerioAPI {
  return cheerio.load(html);
}

export function cleanText(text: string | undefined | null): string {
  return (text ?? '').replace(/\s+/g, ' ').trim();
}

/** Text of the first match, or undefined when absent or blank. */
export function selectText($: cheerio.CheerioAPI, selector: string | undefined): string | undefined {
  if (!selector) return undefined;
  const text = cleanText($(selector).first().text());
  return text || undefined;
}

export function extractTitle($: cheerio.CheerioAPI, selector?: string): string | undefined {
  const configured = selectText($, selector);
  if (configured) return configured;

  const heading = cleanText($('h1').first().text());
  if (heading) return heading;

  // "MSc Data Science | Faculty of Engineering | Example University"
  const title = cleanText($('title').text());
  if (title) {
    return title.split(/\s+[|–—-]\s+/)[0].trim() || undefined;
  }
  return undefined;
}

/**
 * Date text for a labelled field.  With a selector, the whole element text
 * is returned (trimmed); without one, the text beside the first matching
 * label is searched for a date phrase.
 */
export function extractLabelledDate(
  $: cheerio.CheerioAPI,
  label: RegExp,
  selector?: string,
): string | undefined {
  const configured = selectText($, selector);
  if (configured) return configured;

  let found: string | undefined;
  $(LABEL_ELEMENTS).each((_, el) => {
    const own = cleanText($(el).text());
    if (!label.test(own) || own.length > 120) return;

    const candidates = [
      own,
      cleanText($(el).next().text()),
      cleanText($(el).parent().text()),
    ];
    for (const candidate of candidates) {
      if (candidate.length > 300) continue;
      const phrase = extractDatePhrase(candidate);
      if (phrase) {
        found = phrase;
        return false; // stop .each()
      }
    }
    return undefined;
  });
  return found;
}

export function extractApplyLink(
  $: cheerio.CheerioAPI,
  pageUrl: string,
  selector?: string,
): string | undefined {
  if (selector) {
    const href = $(selector).first().attr('href');
    const resolved = href ? absoluteUrl(href, pageUrl) : undefined;
    if (resolved) return resolved;
  }

  for (const keyword of APPLY_KEYWORDS) {
    let match: string | undefined;
    $('a[href]').each((_, el) => {
      const text = cleanText($(el).text()).toLowerCase();
      if (!text.includes(keyword)) return undefined;

      const href = $(el).attr('href') ?? '';
      if (/^(mailto:|tel:|javascript:|#)/i.test(href)) return undefined;

      const resolved = absoluteUrl(href, pageUrl);
      if (!resolved || NOT_AN_APPLICATION.test(resolved)) return undefined;

      match = resolved;
      return false;
    });
    if (match) return match;
  }
  return undefined;
}

/** Resolve `href` against `base`; undefined for unparseable or non-http(s) results. */
export function absoluteUrl(href: string, base: string): string | undefined {
  try {
    const url = new URL(href.trim(), base);
    return url.protocol === 'http:' || url.protocol === 'https:' ? url.toString() : undefined;
  } catch {
    return undefined;
  }
}
