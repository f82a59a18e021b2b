import type { RawRecord, UniversityInfo } from '../core/types';

/** Where a finished run's records go.  Resolves with the written location. */
export interface Sink {
  write(records: readonly RawRecord[], university: UniversityInfo): Promise<string>;
}
