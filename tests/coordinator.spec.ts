import { expect, test } from '@playwright/test';
import { ListScanError, PoolUnavailableError } from '../src/core/errors';
import {
  createTask,
  loadHarvestConfig,
  type DiscoveryTask,
  type HarvestConfig,
  type HarvestProgress,
  type UniversityInfo,
} from '../src/core/types';
import { GenericExtractor } from '../src/extractors/genericExtractor';
import { SelectorListScanner } from '../src/extractors/listScanner';
import type { ListScanner } from '../src/extractors/types';
import { Coordinator } from '../src/pipeline/coordinator';
import { SessionPool } from '../src/pool/sessionPool';
import { FakeBrowser, listPage, programPage, type FakeSite, type FakeBrowserOptions } from './support/fakeBrowser';

const LIST = 'https://uni.example/list';

const university: UniversityInfo = {
  key: 'exu',
  code: 'EX001',
  name: 'Example University',
  listUrl: LIST,
  selectors: { listLink: 'a.prog', detailReady: 'h1' },
};

function testConfig(overrides: Partial<HarvestConfig> = {}): HarvestConfig {
  return {
    ...loadHarvestConfig({}),
    poolCapacity: 2,
    operationTimeoutMs: 100,
    acquireTimeoutMs: 2_000,
    retryBackoffMs: 10,
    drainGraceMs: 200,
    ...overrides,
  };
}

/** A list page linking /p/1../p/n, each a readable program page. */
function siteWith(count: number, tweak: (n: number) => Partial<FakeSite[string]> = () => ({})): FakeSite {
  const hrefs = Array.from({ length: count }, (_, i) => `/p/${i + 1}`);
  const site: FakeSite = { [LIST]: { html: listPage(hrefs) } };
  hrefs.forEach((href, i) => {
    site[`https://uni.example${href}`] = {
      html: programPage(`MSc Subject ${i + 1}`, '15 January 2026'),
      ...tweak(i + 1),
    };
  });
  return site;
}

function setup(
  site: FakeSite,
  options: {
    config?: Partial<HarvestConfig>;
    browser?: FakeBrowserOptions;
    scanner?: ListScanner;
    onProgress?: (p: HarvestProgress) => void;
  } = {},
) {
  const config = testConfig(options.config);
  const browser = new FakeBrowser(site, options.browser);
  const pool = new SessionPool({
    capacity: config.poolCapacity,
    visibility: config.visibility,
    factory: browser.factory,
    timeoutStrikes: config.timeoutStrikes,
    maxCreateFailures: config.maxCreateFailures,
    drainGraceMs: config.drainGraceMs,
  });
  const coordinator = new Coordinator({
    university,
    config,
    pool,
    scanner: options.scanner ?? new SelectorListScanner(university, { timeoutMs: config.operationTimeoutMs }),
    extractor: new GenericExtractor(university),
    onProgress: options.onProgress,
  });
  return { browser, pool, coordinator };
}

const stubScanner = (tasks: DiscoveryTask[]): ListScanner => ({ scan: async () => tasks });

test.describe('Coordinator', () => {
  test('capacity 2, five tasks, task 3 times out: four succeed, one fails, nothing left alive', async () => {
    const { browser, pool, coordinator } = setup(
      siteWith(5, (n) => (n === 3 ? { delayMs: 300 } : {})),
    );

    const report = await coordinator.run(LIST, 2);

    expect(report.succeeded.map((r) => r.title).sort()).toEqual([
      'MSc Subject 1',
      'MSc Subject 2',
      'MSc Subject 4',
      'MSc Subject 5',
    ]);
    expect(report.failed).toHaveLength(1);
    expect(report.failed[0]).toMatchObject({ kind: 'timeout', attempts: 1 });
    expect(report.failed[0].task.id).toBe('exu-3');
    expect(report.cancelled).toBe(false);
    expect(report.unprocessed).toEqual([]);
    expect(pool.stats().alive).toBe(0);
    expect(browser.open).toBe(0);
    expect(pool.stats().peakInUse).toBeLessThanOrEqual(2);
  });

  test('records carry the university code and the extracted fields', async () => {
    const { coordinator } = setup(siteWith(1));

    const report = await coordinator.run(LIST, 1);

    expect(report.university).toBe('EX001');
    expect(report.succeeded).toEqual([
      {
        university: 'EX001',
        title: 'MSc Subject 1',
        url: 'https://uni.example/p/1',
        deadline: '15 January 2026',
        applyLink: undefined,
        openDate: undefined,
        field: undefined,
      },
    ]);
  });

  test('records differing only in title case and URL whitespace are deduplicated', async () => {
    const site: FakeSite = {
      'https://uni.example/p/1': { html: programPage('MSc Finance') },
      'https://uni.example/p/1 ': { html: programPage('msc FINANCE') },
    };
    const tasks = [
      createTask('a', { kind: 'url', url: 'https://uni.example/p/1' }, LIST),
      createTask('b', { kind: 'url', url: 'https://uni.example/p/1 ' }, LIST),
    ];
    const { coordinator } = setup(site, { scanner: stubScanner(tasks) });

    const report = await coordinator.run(LIST, 1);

    expect(report.succeeded.map((r) => r.title)).toEqual(['MSc Finance']);
    expect(report.duplicates).toBe(1);
    expect(report.failed).toEqual([]);
  });

  test('more harvesters than sessions still finish every task', async () => {
    const { browser, pool, coordinator } = setup(siteWith(8, () => ({ delayMs: 10 })));

    const report = await coordinator.run(LIST, 4);

    expect(report.succeeded).toHaveLength(8);
    expect(pool.stats().peakInUse).toBeLessThanOrEqual(2);
    expect(browser.launched).toBe(2);
  });

  test('concurrency is capped by maxConcurrency', async () => {
    const { browser, coordinator } = setup(siteWith(4), {
      config: { poolCapacity: 8, maxConcurrency: 1 },
    });

    await coordinator.run(LIST, 8);
    expect(browser.launched).toBe(1);
  });

  test('progress is reported after every task', async () => {
    const progress: HarvestProgress[] = [];
    const { coordinator } = setup(siteWith(3), { onProgress: (p) => progress.push(p) });

    await coordinator.run(LIST, 1);

    expect(progress.map((p) => p.completed)).toEqual([1, 2, 3]);
    expect(progress[2]).toMatchObject({ total: 3, succeeded: 3, failed: 0, duplicates: 0 });
  });

  test('a bot-blocked session is retired and the run continues on a fresh one', async () => {
    const { browser, coordinator } = setup(
      siteWith(3, (n) => (n === 2 ? { status: 429 } : {})),
      { config: { poolCapacity: 1 } },
    );

    const report = await coordinator.run(LIST, 1);

    expect(report.succeeded).toHaveLength(2);
    expect(report.failed.map((f) => f.kind)).toEqual(['bot-blocked']);
    expect(browser.launched).toBe(2);
    expect(browser.open).toBe(0);
  });

  test('a crashed session fails only its own task', async () => {
    const { coordinator } = setup(siteWith(3, (n) => (n === 1 ? { crash: true } : {})), {
      config: { poolCapacity: 1 },
    });

    const report = await coordinator.run(LIST, 1);

    expect(report.failed.map((f) => [f.task.id, f.kind])).toEqual([['exu-1', 'crashed']]);
    expect(report.succeeded).toHaveLength(2);
  });

  test('a page without a title fails with field-missing', async () => {
    const site: FakeSite = { 'https://uni.example/p/9': { html: '<html><body><h1></h1><p>tbc</p></body></html>' } };
    const tasks = [createTask('x', { kind: 'url', url: 'https://uni.example/p/9' }, LIST)];
    const { coordinator } = setup(site, { scanner: stubScanner(tasks) });

    const report = await coordinator.run(LIST, 1);

    expect(report.failed).toHaveLength(1);
    expect(report.failed[0]).toMatchObject({
      kind: 'field-missing',
      reason: 'Required field(s) missing: title',
    });
  });

  test('hash-route and click locators are opened before extraction', async () => {
    const site: FakeSite = {
      'https://spa.example/app#/programme/7': { html: programPage('MSc Robotics') },
      'https://uni.example/finder': {
        html: '<button class="open-42">Details</button>',
        clicks: { 'button.open-42': 'https://uni.example/popup/42' },
      },
      'https://uni.example/popup/42': { html: programPage('MA Design') },
    };
    const tasks = [
      createTask('h', { kind: 'hash', base: 'https://spa.example/app#/list', fragment: '/programme/7' }, LIST),
      createTask('c', { kind: 'click', pageUrl: 'https://uni.example/finder', selector: 'button.open-42' }, LIST),
    ];
    const { coordinator } = setup(site, { scanner: stubScanner(tasks) });

    const report = await coordinator.run(LIST, 1);

    expect(report.succeeded.map((r) => [r.title, r.url])).toEqual([
      ['MSc Robotics', 'https://spa.example/app#/programme/7'],
      ['MA Design', 'https://uni.example/popup/42'],
    ]);
  });

  test('a session whose click outlives its timeout is not lent again until the popup lands', async () => {
    const site: FakeSite = {
      'https://uni.example/finder': {
        html: '<button class="open">Details</button>',
        clicks: { 'button.open': 'https://uni.example/popup' },
        clickDelayMs: 150,
      },
      'https://uni.example/popup': { html: programPage('Popup From Task 1') },
      'https://uni.example/p/2': { html: programPage('MSc Task 2') },
    };
    const tasks = [
      createTask('t1', { kind: 'click', pageUrl: 'https://uni.example/finder', selector: 'button.open' }, LIST),
      createTask('t2', { kind: 'url', url: 'https://uni.example/p/2' }, LIST),
    ];
    const { browser, pool, coordinator } = setup(site, {
      scanner: stubScanner(tasks),
      config: { poolCapacity: 1, drainGraceMs: 1_000 },
    });

    const report = await coordinator.run(LIST, 1);

    expect(report.failed.map((f) => `${f.task.id}:${f.kind}`)).toEqual(['t1:timeout']);
    expect(report.succeeded.map((r) => [r.title, r.url])).toEqual([
      ['MSc Task 2', 'https://uni.example/p/2'],
    ]);
    expect(browser.launched).toBe(1);
    expect(pool.stats().alive).toBe(0);
  });

  test('cancellation stops new work, drains the pool and lists unprocessed tasks', async () => {
    const controller = new AbortController();
    const { browser, pool, coordinator } = setup(siteWith(8, () => ({ delayMs: 50 })), {
      onProgress: () => controller.abort(),
    });

    const report = await coordinator.run(LIST, 2, controller.signal);

    expect(report.cancelled).toBe(true);
    expect(report.succeeded.length).toBeGreaterThanOrEqual(1);
    expect(report.unprocessed.length).toBeGreaterThan(0);
    expect(report.succeeded.length + report.failed.length + report.unprocessed.length).toBe(8);
    for (const failure of report.failed) expect(failure.kind).toBe('cancelled');
    expect(pool.stats().alive).toBe(0);
    expect(browser.open).toBe(0);
  });

  test('a run cancelled before it starts returns an empty cancelled report', async () => {
    const controller = new AbortController();
    controller.abort();
    const { browser, coordinator } = setup(siteWith(3));

    const report = await coordinator.run(LIST, 2, controller.signal);

    expect(report).toMatchObject({ cancelled: true, succeeded: [], failed: [] });
    expect(browser.open).toBe(0);
  });

  test('a browser that will not start fails the run with PoolUnavailableError after draining', async () => {
    const { browser, pool, coordinator } = setup(siteWith(3), { browser: { alwaysFail: true } });

    await expect(coordinator.run(LIST, 2)).rejects.toBeInstanceOf(PoolUnavailableError);
    expect(browser.launchAttempts).toBe(3);
    expect(pool.stats().alive).toBe(0);
  });

  test('an unreadable list page fails the run with ListScanError', async () => {
    const site: FakeSite = { [LIST]: { html: '<html><body>Maintenance</body></html>' } };
    const { browser, coordinator } = setup(site);

    await expect(coordinator.run(LIST, 2)).rejects.toBeInstanceOf(ListScanError);
    expect(browser.open).toBe(0);
  });

  test('warm start and a per-host rate limit still produce a full report', async () => {
    const { browser, coordinator } = setup(siteWith(3), {
      config: { warmStart: true, rateLimitMs: 5 },
    });

    const report = await coordinator.run(LIST, 2);

    expect(browser.launched).toBe(2);
    expect(report.succeeded).toHaveLength(3);
  });

  test('run() can only be called once', async () => {
    const { coordinator } = setup(siteWith(1));
    await coordinator.run(LIST, 1);
    await expect(coordinator.run(LIST, 1)).rejects.toThrow('may only be called once');
  });

  test('an invalid concurrency still drains a warmed-up pool', async () => {
    const { browser, pool, coordinator } = setup(siteWith(1));
    await pool.warmUp();
    expect(browser.open).toBe(2);

    await expect(coordinator.run(LIST, 0)).rejects.toBeInstanceOf(RangeError);
    expect(pool.stats().alive).toBe(0);
    expect(browser.open).toBe(0);
  });
});
