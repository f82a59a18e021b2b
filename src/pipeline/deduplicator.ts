/**
 * deduplicator.ts — Gate that lets at most one record per identity through.
 *
 * Identity is the fingerprint `normalize(title) + "|" + normalize(url)`,
 * where normalize trims, collapses internal whitespace and case-folds.
 * `offer()` checks and inserts in one synchronous step, so of two
 * near-simultaneous duplicates exactly one is accepted.
 */

import type { RawRecord } from '../core/types';

export type OfferResult = 'accepted' | 'duplicate';

export function normalizeKeyPart(value: string): string {
  return value.trim().replace(/\s+/g, ' ').toLowerCase();
}

export function fingerprint(record: Pick<RawRecord, 'title' | 'url'>): string {
  return `${normalizeKeyPart(record.title)}|${normalizeKeyPart(record.url)}`;
}

export class Deduplicator {
  /** Fingerprint → first record seen with it.  Insertion order = acceptance order. */
  private readonly seen = new Map<string, RawRecord>();
  private rejected = 0;
  private closed = false;

  offer(record: RawRecord): OfferResult {
    if (this.closed) {
      throw new Error('Deduplicator input is closed');
    }

    const key = fingerprint(record);
    if (this.seen.has(key)) {
      this.rejected += 1;
      return 'duplicate';
    }
    this.seen.set(key, record);
    return 'accepted';
  }

  /** Stop accepting input; the accepted set is final. */
  close(): void {
    this.closed = true;
  }

  accepted(): RawRecord[] {
    return [...this.seen.values()];
  }

  get duplicates(): number {
    return this.rejected;
  }

  get size(): number {
    return this.seen.size;
  }
}

/** Run a whole sequence through a fresh gate and return the accepted records. */
export function deduplicate(records: Iterable<RawRecord>): RawRecord[] {
  const gate = new Deduplicator();
  for (const record of records) gate.offer(record);
  gate.close();
  return gate.accepted();
}
