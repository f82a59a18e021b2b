/**
 * listScanner.ts — Selector-driven list-page scan.
 *
 * Opens the university's list page, collects every anchor matching
 * `selectors.listLink`, and keeps clicking `selectors.nextPage` while the
 * control exists and the page keeps yielding links nobody has seen yet.
 * Links are de-duplicated by resolved href; hash-only hrefs ("#/prog/42")
 * become hash-route locators against the list page.
 *
 * With `selectors.clickKey` the matches are click targets instead: each one
 * becomes a click locator `:is(<listLink>)[<clickKey>="<value>"]` on the page
 * it was found on.
 */

import { Logger } from '../core/logger';
import { createTask, type DiscoveryTask, type TaskLocator, type UniversityInfo } from '../core/types';
import type { SessionHandle } from '../pool/sessionHandle';
import { absoluteUrl } from './htmlHeuristics';
import type { ListScanner } from './types';

const logger = new Logger('ListScanner');

export interface SelectorListScannerOptions {
  /** Timeout for the list navigation and each wait. */
  timeoutMs: number;
  /** Upper bound on pages followed through `nextPage`. */
  maxPages?: number;
}

export class SelectorListScanner implements ListScanner {
  private readonly university: UniversityInfo;
  private readonly timeoutMs: number;
  private readonly maxPages: number;

  constructor(university: UniversityInfo, options: SelectorListScannerOptions) {
    this.university = university;
    this.timeoutMs = options.timeoutMs;
    this.maxPages = options.maxPages ?? 50;
  }

  async scan(session: SessionHandle, listUrl: string): Promise<DiscoveryTask[]> {
    const { listLink, nextPage, clickKey } = this.university.selectors;
    const tasks: DiscoveryTask[] = [];
    const seen = new Set<string>();

    await session.navigate(listUrl, this.timeoutMs);
    await session.waitFor(listLink, this.timeoutMs);

    for (let page = 1; page <= this.maxPages; page++) {
      const before = tasks.length;

      const pageUrl = session.currentUrl() || listUrl;
      for (const link of await session.links(listLink, clickKey)) {
        const locator = clickKey
          ? toClickLocator(listLink, clickKey, link.href, pageUrl)
          : toLocator(link.href, listUrl, pageUrl);
        if (!locator) continue;

        const key = locator.kind === 'hash' ? `#${locator.fragment}` : describe(locator);
        if (seen.has(key)) continue;
        seen.add(key);

        const id = `${this.university.key}-${tasks.length + 1}`;
        tasks.push(createTask(id, locator, listUrl, link.text || undefined));
      }

      logger.info(
        `${this.university.key} page ${page}: ${tasks.length - before} new program(s) ` +
          `(total ${tasks.length})`,
      );

      if (
        !nextPage ||
        page === this.maxPages ||
        tasks.length === before ||
        !(await session.exists(nextPage))
      ) {
        break;
      }
      await session.clickAndFollow(nextPage, this.timeoutMs);
      await session.waitFor(listLink, this.timeoutMs);
    }

    return tasks;
  }
}

function toLocator(href: string, listUrl: string, currentUrl: string): TaskLocator | undefined {
  const trimmed = href.trim();
  if (!trimmed) return undefined;

  if (trimmed.startsWith('#')) {
    // "#" alone or "#top" style anchors are not routes.
    if (!trimmed.startsWith('#/') && !trimmed.startsWith('#!')) return undefined;
    return { kind: 'hash', base: listUrl, fragment: trimmed.slice(1) };
  }

  const url = absoluteUrl(trimmed, currentUrl || listUrl);
  return url ? { kind: 'url', url } : undefined;
}

function toClickLocator(
  listLink: string,
  clickKey: string,
  value: string,
  pageUrl: string,
): TaskLocator | undefined {
  if (!value.trim()) return undefined;
  const quoted = value.replace(/["\\]/g, '\\$&');
  return { kind: 'click', pageUrl, selector: `:is(${listLink})[${clickKey}="${quoted}"]` };
}

function describe(locator: TaskLocator): string {
  return locator.kind === 'url' ? locator.url : JSON.stringify(locator);
}
