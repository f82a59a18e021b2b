/**
 * harvester.ts — One worker loop: pull a task, borrow a session, extract,
 * hand the record to the deduplicator, give the session back.
 *
 *   ┌─ aborted? ─ yes ──────────────────────────────────────────▶ exit
 *   │  pop task ─ drained ──────────────────────────────────────▶ exit
 *   │  acquire (retry on PoolExhausted, back-off between tries)
 *   │  open locator → wait for ready selector → extract (bounded)
 *   │  build record → deduplicator.offer()
 *   └─ release(session, outcome)  ← always, on every path
 *
 * A timed-out call may still be running when the session is released; the
 * pool holds such a session back until the call settles.
 *
 * Per-task failures are classified and reported, never rethrown.  Only
 * PoolUnavailableError escapes `run()`; the Coordinator turns it into a
 * run-wide abort.
 */

import { abortable, sleep, withTimeout } from '../core/async';
import {
  CancelledError,
  ExtractionFieldMissingError,
  PoolClosedError,
  PoolExhaustedError,
  PoolUnavailableError,
  classifyFailure,
  describeError,
} from '../core/errors';
import { Logger } from '../core/logger';
import {
  describeLocator,
  resolveHashRoute,
  type DiscoveryTask,
  type ExtractedFields,
  type HarvestConfig,
  type RawRecord,
  type ReleaseOutcome,
  type TaskFailure,
  type UniversityInfo,
} from '../core/types';
import type { Extractor } from '../extractors/types';
import type { NavigationThrottle } from '../middleware/compliance';
import type { SessionHandle } from '../pool/sessionHandle';
import type { SessionPool } from '../pool/sessionPool';
import type { Deduplicator } from './deduplicator';
import { QUEUE_DRAINED, type TaskQueue } from './taskQueue';

const parentLogger = new Logger('Harvester');

/** What happened to one task, as reported to the Coordinator. */
export type TaskResult =
  | { status: 'accepted'; task: DiscoveryTask; record: RawRecord }
  | { status: 'duplicate'; task: DiscoveryTask; record: RawRecord }
  | { status: 'failed'; failure: TaskFailure }
  /** Popped but never attempted: the run stopped first. */
  | { status: 'unprocessed'; task: DiscoveryTask };

export type HarvesterSettings = Pick<
  HarvestConfig,
  'operationTimeoutMs' | 'acquireTimeoutMs' | 'acquireRetries' | 'retryBackoffMs'
>;

export interface HarvesterContext {
  university: UniversityInfo;
  settings: HarvesterSettings;
  pool: SessionPool;
  queue: TaskQueue;
  deduplicator: Deduplicator;
  extractor: Extractor;
  throttle: NavigationThrottle;
  signal: AbortSignal;
  onResult: (result: TaskResult) => void;
}

interface Borrowed {
  session: SessionHandle;
  attempts: number;
}

export class Harvester {
  readonly id: string;
  private readonly ctx: HarvesterContext;
  private readonly logger: Logger;
  private processed = 0;

  constructor(id: string, ctx: HarvesterContext) {
    this.id = id;
    this.ctx = ctx;
    this.logger = parentLogger.child(id);
  }

  /** Loop until the queue drains or the run is aborted.  Resolves with the number of tasks handled. */
  async run(): Promise<number> {
    const { queue, signal } = this.ctx;

    while (!signal.aborted) {
      const task = await queue.pop();
      if (task === QUEUE_DRAINED) break;

      if (signal.aborted) {
        this.ctx.onResult({ status: 'unprocessed', task });
        break;
      }

      const keepGoing = await this.handle(task);
      this.processed += 1;
      if (!keepGoing) break;
    }

    this.logger.debug(`Exiting after ${this.processed} task(s)`);
    return this.processed;
  }

  /** Process one task.  Returns false when the harvester should stop. */
  private async handle(task: DiscoveryTask): Promise<boolean> {
    let borrowed: Borrowed;
    try {
      borrowed = await this.borrow();
    } catch (err) {
      return this.onAcquireFailure(task, err);
    }

    const { session, attempts } = borrowed;
    let outcome: ReleaseOutcome = 'ok';
    try {
      const record = await abortable(this.extractOne(session, task), this.ctx.signal);
      const verdict = this.ctx.deduplicator.offer(record);
      this.logger.debug(`${task.id} → ${verdict} (${record.title})`);
      this.ctx.onResult({ status: verdict, task, record });
    } catch (err) {
      const failure = classifyFailure(err);
      outcome = failure.outcome;
      this.logger.warn(`${task.id} failed (${failure.kind}): ${failure.reason}`);
      this.ctx.onResult({
        status: 'failed',
        failure: { task, kind: failure.kind, reason: failure.reason, attempts },
      });
    } finally {
      this.ctx.pool.release(session, outcome);
    }
    return true;
  }

  /** Borrow a session, retrying PoolExhausted with linear back-off. */
  private async borrow(): Promise<Borrowed> {
    const { pool, settings, signal } = this.ctx;
    let attempts = 0;

    for (;;) {
      attempts += 1;
      try {
        const session = await pool.acquire(settings.acquireTimeoutMs, signal);
        return { session, attempts };
      } catch (err) {
        if (!(err instanceof PoolExhaustedError) || attempts >= settings.acquireRetries) {
          throw new AcquireFailure(err, attempts);
        }
        this.logger.debug(
          `No session after attempt ${attempts}/${settings.acquireRetries}; backing off`,
        );
        try {
          await sleep(settings.retryBackoffMs * attempts, signal);
        } catch (sleepErr) {
          throw new AcquireFailure(sleepErr, attempts);
        }
      }
    }
  }

  private onAcquireFailure(task: DiscoveryTask, err: unknown): boolean {
    const attempts = err instanceof AcquireFailure ? err.attempts : 1;
    const cause = err instanceof AcquireFailure ? err.cause : err;

    if (cause instanceof PoolExhaustedError) {
      this.logger.warn(`${task.id}: no session after ${attempts} attempt(s)`);
      this.ctx.onResult({
        status: 'failed',
        failure: { task, kind: 'pool-exhausted', reason: describeError(cause), attempts },
      });
      return true;
    }

    // The run is ending; the task was never attempted.
    this.ctx.onResult({ status: 'unprocessed', task });
    if (cause instanceof PoolUnavailableError) throw cause;
    if (cause instanceof PoolClosedError || cause instanceof CancelledError) return false;
    throw cause;
  }

  // ── Extraction ─────────────────────────────────────────

  private async extractOne(session: SessionHandle, task: DiscoveryTask): Promise<RawRecord> {
    const { extractor, settings, university } = this.ctx;
    const timeoutMs = settings.operationTimeoutMs;

    await this.open(session, task);
    if (extractor.readySelector) {
      await session.waitFor(extractor.readySelector, timeoutMs);
    }

    // Held so that an extraction outliving its timeout keeps the session out of circulation.
    const fields = await withTimeout(
      session.hold(extractor.extract(session, task)),
      timeoutMs,
      `Extracting ${task.id}`,
    );
    return buildRecord(university.code, task, fields, session.currentUrl());
  }

  /** Bring the task's detail content onto the session's page. */
  private async open(session: SessionHandle, task: DiscoveryTask): Promise<void> {
    const { throttle, settings } = this.ctx;
    const timeoutMs = settings.operationTimeoutMs;
    const locator = task.locator;

    this.logger.debug(`${task.id} on ${session.id}: ${describeLocator(locator)}`);

    switch (locator.kind) {
      case 'url':
        await throttle.schedule(locator.url, () => session.navigate(locator.url, timeoutMs));
        return;
      case 'hash': {
        const target = resolveHashRoute(locator.base, locator.fragment);
        await throttle.schedule(target, () => session.navigate(target, timeoutMs));
        return;
      }
      case 'click':
        await throttle.schedule(locator.pageUrl, () =>
          session.navigate(locator.pageUrl, timeoutMs),
        );
        await session.clickAndFollow(locator.selector, timeoutMs);
        return;
    }
  }
}

/** Carries the attempt count out of `borrow()` alongside the real cause. */
class AcquireFailure extends Error {
  readonly attempts: number;

  constructor(cause: unknown, attempts: number) {
    super(describeError(cause), { cause });
    this.attempts = attempts;
  }
}

/**
 * Merge extracted fields with what the task and the session already know.
 * Title and url are required; blank optional fields are dropped.
 */
export function buildRecord(
  universityCode: string,
  task: DiscoveryTask,
  fields: ExtractedFields,
  pageUrl: string,
): RawRecord {
  const title = present(fields.title) ?? task.title;
  const url = present(fields.url) ?? present(pageUrl);

  const missing: string[] = [];
  if (!title) missing.push('title');
  if (!url) missing.push('url');
  if (!title || !url) {
    throw new ExtractionFieldMissingError(missing);
  }

  return Object.freeze({
    university: universityCode,
    title,
    url,
    applyLink: present(fields.applyLink),
    deadline: present(fields.deadline),
    openDate: present(fields.openDate),
    field: present(fields.field),
  });
}

function present(value: string | undefined): string | undefined {
  const trimmed = value?.replace(/\s+/g, ' ').trim();
  return trimmed ? trimmed : undefined;
}
