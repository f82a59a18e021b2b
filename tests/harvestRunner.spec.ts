import { expect, test } from '@playwright/test';
import { loadHarvestConfig, type RawRecord, type UniversityInfo } from '../src/core/types';
import { HarvestRunner, parseCliArgs } from '../src/harvestRunner';
import type { Sink } from '../src/services/sink';
import { FakeBrowser, listPage, programPage } from './support/fakeBrowser';

class MemorySink implements Sink {
  readonly writes: { records: readonly RawRecord[]; university: UniversityInfo }[] = [];

  async write(records: readonly RawRecord[], university: UniversityInfo): Promise<string> {
    this.writes.push({ records, university });
    return `memory://${university.code}`;
  }
}

const university: UniversityInfo = {
  key: 'exu',
  code: 'EX001',
  name: 'Example University',
  listUrl: 'https://uni.example/list',
  visibility: 'headful',
  workers: 1,
  selectors: { listLink: 'a.prog' },
};

test.describe('HarvestRunner', () => {
  test('runs a university with its catalogue overrides and hands the records to the sink', async () => {
    const browser = new FakeBrowser({
      'https://uni.example/list': { html: listPage(['/p/1', '/p/2']) },
      'https://uni.example/p/1': { html: programPage('MSc Finance') },
      'https://uni.example/p/2': { html: programPage('MA History') },
    });
    const sink = new MemorySink();
    const runner = new HarvestRunner(loadHarvestConfig({}), browser.factory, sink);

    const { report, output } = await runner.runUniversity(university);

    expect(output).toBe('memory://EX001');
    expect(sink.writes[0].records.map((r) => r.title)).toEqual(['MSc Finance', 'MA History']);
    expect(report.failed).toEqual([]);
    expect(browser.launchOptions.map((o) => o.visibility)).toEqual(['headful']);
    expect(browser.open).toBe(0);
  });

  test('skips the sink when nothing was harvested', async () => {
    const browser = new FakeBrowser({ 'https://uni.example/list': { html: listPage([]) + '<a class="prog" href="#">x</a>' } });
    const sink = new MemorySink();
    const runner = new HarvestRunner(loadHarvestConfig({}), browser.factory, sink);

    const { report, output } = await runner.runUniversity(university, { visibility: 'headless' });

    expect(report.succeeded).toEqual([]);
    expect(output).toBeUndefined();
    expect(sink.writes).toEqual([]);
    expect(browser.launchOptions[0].visibility).toBe('headless');
  });
});

test.describe('parseCliArgs', () => {
  test('reads the key, visibility and worker count', () => {
    expect(parseCliArgs(['hku', '--headful', '--workers', '3'])).toEqual({
      key: 'hku',
      visibility: 'headful',
      workers: 3,
    });
  });

  test('rejects bad worker counts and unknown flags', () => {
    expect(() => parseCliArgs(['hku', '--workers', 'many'])).toThrow('--workers needs a positive integer');
    expect(() => parseCliArgs(['hku', '--fast'])).toThrow('Unknown option --fast');
  });
});
