import { expect, test } from '@playwright/test';
import { mkdtemp, readFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import path from 'path';
import type { RawRecord, UniversityInfo } from '../src/core/types';
import { CsvSink, csvEscape, csvFileName } from '../src/services/csvSink';

const university: UniversityInfo = {
  key: 'exu',
  code: 'EX001',
  name: 'Example University',
  listUrl: 'https://uni.example/list',
  selectors: { listLink: 'a' },
};

test.describe('CsvSink', () => {
  let dir: string;

  test.beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'csv-sink-'));
  });

  test.afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  test('writes a BOM, a header and one row per record with N/A for missing fields', async () => {
    const records: RawRecord[] = [
      {
        university: 'EX001',
        title: 'MSc Finance, Accounting',
        url: 'https://uni.example/p/1',
        applyLink: 'https://apply.uni.example/',
        deadline: '15th January 2026',
        openDate: '1 October 2025',
        field: 'Business "School"',
      },
      { university: 'EX001', title: 'MA History', url: 'https://uni.example/p/2' },
    ];

    const file = await new CsvSink(path.join(dir, 'nested')).write(records, university);

    expect(file).toBe(path.join(dir, 'nested', 'EX001 Example University.csv'));
    const content = await readFile(file, 'utf8');
    expect(content.startsWith('\uFEFF')).toBe(true);
    expect(content.slice(1).split('\r\n')).toEqual([
      'University Code,University Name,Program,Faculty / Field,Program URL,Apply Link,Open Date,Deadline,Deadline (ISO)',
      'EX001,Example University,"MSc Finance, Accounting","Business ""School""",https://uni.example/p/1,' +
        'https://apply.uni.example/,1 October 2025,15th January 2026,2026-01-15',
      'EX001,Example University,MA History,N/A,https://uni.example/p/2,N/A,N/A,N/A,N/A',
      '',
    ]);
  });

  test('an unparseable deadline keeps its text and gets N/A as ISO date', async () => {
    const file = await new CsvSink(dir).write(
      [{ university: 'EX001', title: 'LLM', url: 'https://uni.example/p/3', deadline: 'Rolling' }],
      university,
    );
    const rows = (await readFile(file, 'utf8')).split('\r\n');
    expect(rows[1]).toBe('EX001,Example University,LLM,N/A,https://uni.example/p/3,N/A,N/A,Rolling,N/A');
  });
});

test.describe('csv helpers', () => {
  test('csvEscape quotes only when needed', () => {
    expect(csvEscape('plain')).toBe('plain');
    expect(csvEscape('a,b')).toBe('"a,b"');
    expect(csvEscape('say "hi"')).toBe('"say ""hi"""');
    expect(csvEscape('line\nbreak')).toBe('"line\nbreak"');
  });

  test('file names drop characters that are not allowed in paths', () => {
    expect(csvFileName({ code: 'UK026', name: "Queen's University: Belfast/NI" })).toBe(
      "UK026 Queen's University BelfastNI.csv",
    );
  });
});
