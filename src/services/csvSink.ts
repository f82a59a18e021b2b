/**
 * csvSink.ts — Writes one university's records to `<code> <name>.csv`.
 *
 * The file starts with a UTF-8 byte-order mark so spreadsheet software picks
 * the right encoding, and every optional field that is missing is written as
 * `N/A`.  Records are written in the order given; the sink never
 * de-duplicates.
 */

import { mkdir, writeFile } from 'fs/promises';
import path from 'path';
import { normalizeDeadline } from '../core/dateNormalizer';
import { Logger } from '../core/logger';
import type { RawRecord, UniversityInfo } from '../core/types';
import type { Sink } from './sink';

const logger = new Logger('CsvSink');

const BOM = '\uFEFF';
const MISSING = 'N/A';

export const CSV_COLUMNS = [
  'University Code',
  'University Name',
  'Program',
  'Faculty / Field',
  'Program URL',
  'Apply Link',
  'Open Date',
  'Deadline',
  'Deadline (ISO)',
] as const;

export class CsvSink implements Sink {
  private readonly outputDir: string;

  constructor(outputDir: string) {
    this.outputDir = outputDir;
  }

  async write(records: readonly RawRecord[], university: UniversityInfo): Promise<string> {
    await mkdir(this.outputDir, { recursive: true });
    const file = path.join(this.outputDir, csvFileName(university));

    const lines = [
      CSV_COLUMNS.map(csvEscape).join(','),
      ...records.map((record) => toRow(record, university).map(csvEscape).join(',')),
    ];
    await writeFile(file, BOM + lines.join('\r\n') + '\r\n', 'utf8');

    logger.info(`Wrote ${records.length} record(s) to ${file}`);
    return file;
  }
}

/** `HK001 The University of Hong Kong.csv`, with path-hostile characters removed. */
export function csvFileName(university: Pick<UniversityInfo, 'code' | 'name'>): string {
  const name = `${university.code} ${university.name}`.replace(/[\\/:*?"<>|]/g, '').trim();
  return `${name}.csv`;
}

function toRow(record: RawRecord, university: UniversityInfo): string[] {
  const isoDeadline = record.deadline ? normalizeDeadline(record.deadline) : null;
  return [
    record.university,
    university.name,
    record.title,
    record.field ?? MISSING,
    record.url,
    record.applyLink ?? MISSING,
    record.openDate ?? MISSING,
    record.deadline ?? MISSING,
    isoDeadline ?? MISSING,
  ];
}

/** Quote a cell when it contains a comma, quote or line break. */
export function csvEscape(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}
