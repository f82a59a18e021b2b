/**
 * extractors/index.ts — Picks the extractor and list scanner for a university.
 *
 * Every university starts on the catalogue-driven GenericExtractor.  A site
 * whose pages the generic heuristics cannot read gets its own Extractor,
 * registered here under the university's code:
 *
 *   registerExtractor('HK004', (uni) => new PolyUExtractor(uni));
 */

import type { UniversityInfo } from '../core/types';
import { GenericExtractor } from './genericExtractor';
import { SelectorListScanner, type SelectorListScannerOptions } from './listScanner';
import type { Extractor, ListScanner } from './types';

export type ExtractorFactory = (university: UniversityInfo) => Extractor;

const registry = new Map<string, ExtractorFactory>();

/** Register (or replace) the extractor used for `code`. */
export function registerExtractor(code: string, factory: ExtractorFactory): void {
  registry.set(code, factory);
}

export function getExtractor(university: UniversityInfo): Extractor {
  const factory = registry.get(university.code);
  return factory ? factory(university) : new GenericExtractor(university);
}

export function getListScanner(
  university: UniversityInfo,
  options: SelectorListScannerOptions,
): ListScanner {
  return new SelectorListScanner(university, options);
}

export { GenericExtractor } from './genericExtractor';
export { SelectorListScanner } from './listScanner';
export type { Extractor, ListScanner } from './types';
