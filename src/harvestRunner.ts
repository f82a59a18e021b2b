#!/usr/bin/env node
/**
 * harvestRunner.ts — Wires one university's run together and exposes a CLI.
 *
 *   config (env) → university catalogue entry → SessionPool (puppeteer-core)
 *     → Coordinator (scan + harvesters) → CsvSink
 *
 * The runner owns nothing long-lived: every run builds its own pool and the
 * Coordinator drains it before `run()` settles.
 */

import 'dotenv/config';
import { Logger } from './core/logger';
import { launchPuppeteerDriver } from './core/puppeteerDriver';
import type { DriverFactory } from './core/browserDriver';
import {
  loadHarvestConfig,
  resolveUniversityConfig,
  type HarvestConfig,
  type HarvestProgress,
  type HarvestReport,
  type UniversityInfo,
  type Visibility,
} from './core/types';
import { getUniversity, listUniversities } from './core/universities';
import { getExtractor, getListScanner } from './extractors';
import { Coordinator } from './pipeline';
import { SessionPool } from './pool';
import { CsvSink, type Sink } from './services';

const logger = new Logger('HarvestRunner');

export interface RunOptions {
  /** Harvesters to start; defaults to the pool capacity. */
  workers?: number;
  /** Overrides both the catalogue and HEADLESS. */
  visibility?: Visibility;
  signal?: AbortSignal;
  onProgress?: (progress: HarvestProgress) => void;
}

export interface RunResult {
  report: HarvestReport;
  /** Where the sink wrote the records; undefined when there were none. */
  output?: string;
}

export class HarvestRunner {
  private readonly config: HarvestConfig;
  private readonly factory: DriverFactory;
  private readonly sink: Sink;

  /**
   * @param config  - Defaults to the environment (`loadHarvestConfig()`).
   * @param factory - Browser driver factory; tests pass an in-process fake.
   * @param sink    - Defaults to a CsvSink under `config.outputDir`.
   */
  constructor(config?: HarvestConfig, factory?: DriverFactory, sink?: Sink) {
    this.config = config ?? loadHarvestConfig();
    this.factory = factory ?? launchPuppeteerDriver;
    this.sink = sink ?? new CsvSink(this.config.outputDir);
  }

  /** Harvest one university by catalogue key and write the result. */
  async run(key: string, options: RunOptions = {}): Promise<RunResult> {
    return this.runUniversity(getUniversity(key), options);
  }

  async runUniversity(university: UniversityInfo, options: RunOptions = {}): Promise<RunResult> {
    const resolved = resolveUniversityConfig(this.config, university);
    const config: HarvestConfig = {
      ...resolved,
      poolCapacity: options.workers ?? resolved.poolCapacity,
      visibility: options.visibility ?? resolved.visibility,
    };

    logger.info(
      `Starting ${university.code} ${university.name} ` +
        `(${config.visibility}, ${config.poolCapacity} session(s))`,
    );

    const pool = new SessionPool({
      capacity: config.poolCapacity,
      visibility: config.visibility,
      factory: this.factory,
      timeoutStrikes: config.timeoutStrikes,
      maxCreateFailures: config.maxCreateFailures,
      drainGraceMs: config.drainGraceMs,
      chromePath: config.chromePath,
      userAgent: config.userAgent,
    });

    const coordinator = new Coordinator({
      university,
      config,
      pool,
      scanner: getListScanner(university, { timeoutMs: config.operationTimeoutMs }),
      extractor: getExtractor(university),
      onProgress: options.onProgress,
    });

    const report = await coordinator.run(
      university.listUrl,
      options.workers ?? config.poolCapacity,
      options.signal,
    );

    if (report.succeeded.length === 0) {
      logger.warn(`${university.code}: no records to write`);
      return { report };
    }
    const output = await this.sink.write(report.succeeded, university);
    return { report, output };
  }
}

// ─── CLI entry point ───────────────────────────────────────
// Usage: harvest <university-key> [--headful|--headless] [--workers N]

interface CliArgs {
  key?: string;
  visibility?: Visibility;
  workers?: number;
}

export function parseCliArgs(argv: readonly string[]): CliArgs {
  const args: CliArgs = {};
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--headful') args.visibility = 'headful';
    else if (arg === '--headless') args.visibility = 'headless';
    else if (arg === '--workers') {
      const value = Number(argv[++i]);
      if (!Number.isInteger(value) || value < 1) {
        throw new Error('--workers needs a positive integer');
      }
      args.workers = value;
    } else if (arg.startsWith('--')) {
      throw new Error(`Unknown option ${arg}`);
    } else if (!args.key) {
      args.key = arg;
    }
  }
  return args;
}

function printUsage(): void {
  const keys = listUniversities()
    .map((u) => `  ${u.key.padEnd(12)} ${u.code.padEnd(7)} ${u.name}`)
    .join('\n');
  console.error(
    'Usage: npm run harvest -- <university-key> [--headful|--headless] [--workers N]\n\n' +
      `Universities:\n${keys}`,
  );
}

async function main(): Promise<number> {
  const args = parseCliArgs(process.argv.slice(2));
  if (!args.key) {
    printUsage();
    return 1;
  }

  const controller = new AbortController();
  const onSignal = (signal: NodeJS.Signals) => {
    logger.warn(`${signal} received; finishing in-flight work and closing browsers`);
    controller.abort();
  };
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);

  let lastLogged = 0;
  const { report, output } = await new HarvestRunner().run(args.key, {
    workers: args.workers,
    visibility: args.visibility,
    signal: controller.signal,
    onProgress: (p) => {
      if (p.completed - lastLogged >= 10 || p.completed === p.total) {
        lastLogged = p.completed;
        logger.info(
          `Progress ${p.completed}/${p.total}: ${p.succeeded} ok, ${p.failed} failed, ` +
            `${p.duplicates} duplicate(s), ${p.inUse} session(s) busy`,
        );
      }
    },
  });

  for (const failure of report.failed) {
    logger.warn(`  ✗ ${failure.task.id} [${failure.kind}] ${failure.reason}`);
  }
  logger.info(
    `Done: ${report.succeeded.length} succeeded, ${report.failed.length} failed, ` +
      `${report.duplicates} duplicate(s)` +
      (output ? ` → ${output}` : ''),
  );
  return report.cancelled ? 130 : 0;
}

if (require.main === module) {
  main()
    .then((code) => {
      process.exitCode = code;
    })
    .catch((err: unknown) => {
      logger.error('Harvest failed', err);
      process.exitCode = 1;
    });
}
