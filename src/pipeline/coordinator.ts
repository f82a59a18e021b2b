/**
 * coordinator.ts — Runs one university end to end.
 *
 *   1. SCAN     — borrow one session, turn the list page into DiscoveryTasks
 *   2. FAN OUT  — push every task, close the queue, start N harvesters
 *   3. COLLECT  — harvesters report each task; the deduplicator gates records
 *   4. DRAIN    — on every exit path the pool is drained exactly once
 *
 * A run resolves with a partial-success HarvestReport whatever happens to
 * individual tasks.  It rejects only when the list page cannot be read
 * (ListScanError), the browser cannot be started (PoolUnavailableError) or
 * run() is misused, and in every case only after the pool has drained.
 */

import { abortable } from '../core/async';
import {
  CancelledError,
  ListScanError,
  PoolUnavailableError,
  describeError,
} from '../core/errors';
import { Logger } from '../core/logger';
import type {
  DiscoveryTask,
  HarvestConfig,
  HarvestProgress,
  HarvestReport,
  TaskFailure,
  UniversityInfo,
} from '../core/types';
import type { Extractor, ListScanner } from '../extractors/types';
import { createNavigationThrottle, unthrottled, type NavigationThrottle } from '../middleware';
import type { SessionPool } from '../pool/sessionPool';
import { Deduplicator } from './deduplicator';
import { Harvester, type TaskResult } from './harvester';
import { TaskQueue } from './taskQueue';

const logger = new Logger('Coordinator');

export interface CoordinatorOptions {
  university: UniversityInfo;
  config: HarvestConfig;
  pool: SessionPool;
  scanner: ListScanner;
  extractor: Extractor;
  /** Shared per-host throttle; built from `config.rateLimitMs` when omitted. */
  throttle?: NavigationThrottle;
  onProgress?: (progress: HarvestProgress) => void;
}

export class Coordinator {
  private readonly options: CoordinatorOptions;
  private ran = false;

  constructor(options: CoordinatorOptions) {
    this.options = options;
  }

  /**
   * Harvest every program linked from `listPage` with `concurrency`
   * harvesters (capped at `config.maxConcurrency`).  One Coordinator runs
   * once: the pool is drained at the end.
   */
  async run(listPage: string, concurrency: number, signal?: AbortSignal): Promise<HarvestReport> {
    const { university, config, pool } = this.options;

    const misuse = this.ran
      ? new Error('Coordinator.run() may only be called once')
      : !Number.isInteger(concurrency) || concurrency < 1
        ? new RangeError(`Concurrency must be an integer ≥ 1, got ${concurrency}`)
        : null;
    this.ran = true;
    if (misuse) {
      // The pool may already hold warmed-up browsers.
      await pool.drain();
      throw misuse;
    }

    const startedAt = Date.now();
    const controller = new AbortController();
    const forwardAbort = () => controller.abort();
    if (signal?.aborted) controller.abort();
    signal?.addEventListener('abort', forwardAbort, { once: true });

    const throttle =
      this.options.throttle ??
      (config.rateLimitMs > 0 ? createNavigationThrottle(config.rateLimitMs) : unthrottled);
    const queue = new TaskQueue();
    const deduplicator = new Deduplicator();
    const failed: TaskFailure[] = [];
    const unprocessed: DiscoveryTask[] = [];
    let fatal: PoolUnavailableError | null = null;
    let total = 0;
    let completed = 0;

    const onResult = (result: TaskResult) => {
      switch (result.status) {
        case 'unprocessed':
          unprocessed.push(result.task);
          return;
        case 'failed':
          failed.push(result.failure);
          break;
        case 'accepted':
        case 'duplicate':
          break;
      }
      completed += 1;
      this.options.onProgress?.({
        total,
        completed,
        succeeded: deduplicator.size,
        failed: failed.length,
        duplicates: deduplicator.duplicates,
        inUse: pool.stats().inUse,
      });
    };

    try {
      if (config.warmStart) {
        await pool.warmUp();
      }

      const tasks = await this.scan(listPage, controller.signal);
      total = tasks.length;
      queue.pushAll(tasks);
      queue.close();

      const workers = Math.min(concurrency, config.maxConcurrency, Math.max(total, 1));
      logger.info(
        `${university.name}: ${total} program(s) to harvest with ${workers} harvester(s) ` +
          `over ${pool.capacity} session(s)`,
      );

      const harvesters = Array.from(
        { length: workers },
        (_, i) =>
          new Harvester(`h${i + 1}`, {
            university,
            settings: config,
            pool,
            queue,
            deduplicator,
            extractor: this.options.extractor,
            throttle,
            signal: controller.signal,
            onResult,
          }),
      );

      const settled = await Promise.allSettled(
        harvesters.map((harvester) =>
          harvester.run().catch((err: unknown) => {
            // First fatal error stops every other harvester before its next task.
            if (err instanceof PoolUnavailableError && !fatal) fatal = err;
            controller.abort();
            throw err;
          }),
        ),
      );

      for (const result of settled) {
        if (result.status === 'rejected' && !(result.reason instanceof PoolUnavailableError)) {
          logger.error(`Harvester stopped unexpectedly: ${describeError(result.reason)}`, result.reason);
        }
      }
    } catch (err) {
      if (err instanceof PoolUnavailableError) {
        fatal = err;
      } else if (err instanceof CancelledError) {
        logger.warn(`${university.name}: cancelled before any program was harvested`);
      } else {
        throw err;
      }
    } finally {
      signal?.removeEventListener('abort', forwardAbort);
      unprocessed.push(...queue.drainRemaining());
      await pool.drain();
      await throttle.disconnect();
    }

    deduplicator.close();
    if (fatal) throw fatal;

    const report: HarvestReport = {
      university: university.code,
      succeeded: deduplicator.accepted(),
      failed,
      duplicates: deduplicator.duplicates,
      unprocessed,
      cancelled: controller.signal.aborted,
      durationMs: Date.now() - startedAt,
    };

    logger.info(
      `${university.name}: ${report.succeeded.length} succeeded, ${report.failed.length} failed, ` +
        `${report.duplicates} duplicate(s)` +
        (report.cancelled ? `, cancelled with ${report.unprocessed.length} unprocessed` : '') +
        ` in ${(report.durationMs / 1000).toFixed(1)} s`,
    );
    return report;
  }

  /** Discover tasks with one borrowed session; that session is released `ok` or `dead`. */
  private async scan(listPage: string, signal: AbortSignal): Promise<DiscoveryTask[]> {
    const { pool, config, scanner } = this.options;

    const session = await pool.acquire(config.acquireTimeoutMs, signal).catch((err: unknown) => {
      if (err instanceof PoolUnavailableError || err instanceof CancelledError) throw err;
      throw new ListScanError(listPage, err);
    });

    try {
      const tasks = await abortable(scanner.scan(session, listPage), signal);
      pool.release(session, 'ok');
      logger.info(`List scan of ${listPage} found ${tasks.length} program(s)`);
      return tasks;
    } catch (err) {
      pool.release(session, 'dead');
      if (err instanceof CancelledError) throw err;
      logger.error(`List scan of ${listPage} failed: ${describeError(err)}`);
      throw new ListScanError(listPage, err);
    }
  }
}
