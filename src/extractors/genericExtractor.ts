/**
 * genericExtractor.ts — Catalogue-driven extractor that works for most sites.
 *
 * It snapshots the rendered HTML once and reads every field from the
 * snapshot with cheerio, preferring the university's configured selectors
 * and falling back to the shared heuristics.  A site that defeats both gets
 * a bespoke Extractor registered under its code in `extractors/index.ts`.
 */

import type { DiscoveryTask, ExtractedFields, UniversityInfo } from '../core/types';
import { Logger } from '../core/logger';
import type { SessionHandle } from '../pool/sessionHandle';
import {
  DEADLINE_LABEL,
  OPEN_DATE_LABEL,
  extractApplyLink,
  extractLabelledDate,
  extractTitle,
  loadHtml,
  selectText,
} from './htmlHeuristics';
import type { Extractor } from './types';

const logger = new Logger('GenericExtractor');

export class GenericExtractor implements Extractor {
  readonly readySelector?: string;
  private readonly university: UniversityInfo;

  constructor(university: UniversityInfo) {
    this.university = university;
    this.readySelector = university.selectors.detailReady;
  }

  async extract(session: SessionHandle, task: DiscoveryTask): Promise<ExtractedFields> {
    const html = await session.html();
    const pageUrl = session.currentUrl();
    const $ = loadHtml(html);
    const { selectors } = this.university;

    const fields: ExtractedFields = {
      title: extractTitle($, selectors.title) ?? task.title,
      url: pageUrl,
      deadline: extractLabelledDate($, DEADLINE_LABEL, selectors.deadline),
      openDate: extractLabelledDate($, OPEN_DATE_LABEL, selectors.openDate),
      applyLink: extractApplyLink($, pageUrl, selectors.applyLink) ?? this.university.applyUrl,
      field: selectText($, selectors.field),
    };

    logger.debug(
      `${task.id}: "${fields.title ?? '?'}" deadline=${fields.deadline ?? 'n/a'} ` +
        `open=${fields.openDate ?? 'n/a'}`,
    );
    return fields;
  }
}
