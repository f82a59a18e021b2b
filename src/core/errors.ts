/**
 * errors.ts — Error taxonomy for the harvesting pipeline.
 *
 * Two families:
 *   • Per-task errors (timeout, missing field, crash, bot-block) stay inside
 *     the harvester iteration that raised them and end up in the report.
 *   • Pool-level errors (PoolUnavailable) end the run after the pool drains.
 *
 * `classifyFailure()` is the single place that decides what a thrown value
 * means for the task and for the session that was running it.
 */

import type { FailureKind, ReleaseOutcome } from './types';

export class HarvestError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

// ─── Pool ──────────────────────────────────────────────────

/** No session became available within the acquire timeout.  Transient. */
export class PoolExhaustedError extends HarvestError {
  constructor(timeoutMs: number) {
    super('POOL_EXHAUSTED', `No session available within ${timeoutMs} ms`);
  }
}

/** Session creation kept failing; the browser cannot be started.  Fatal. */
export class PoolUnavailableError extends HarvestError {
  readonly failures: number;

  constructor(failures: number, cause: unknown) {
    super(
      'POOL_UNAVAILABLE',
      `Session creation failed ${failures} times in a row: ${describeError(cause)}`,
      { cause },
    );
    this.failures = failures;
  }
}

/** acquire() after drain() started. */
export class PoolClosedError extends HarvestError {
  constructor() {
    super('POOL_CLOSED', 'Session pool is draining or drained');
  }
}

// ─── Extraction ────────────────────────────────────────────

export class ExtractionTimeoutError extends HarvestError {
  constructor(what: string, timeoutMs: number) {
    super('EXTRACTION_TIMEOUT', `${what} timed out after ${timeoutMs} ms`);
  }
}

export class ExtractionFieldMissingError extends HarvestError {
  readonly fields: string[];

  constructor(fields: string[]) {
    super('FIELD_MISSING', `Required field(s) missing: ${fields.join(', ')}`);
    this.fields = fields;
  }
}

export class SessionCrashedError extends HarvestError {
  constructor(message: string, cause?: unknown) {
    super('SESSION_CRASHED', message, { cause });
  }
}

export class BotBlockedError extends HarvestError {
  readonly status: number;

  constructor(url: string, status: number) {
    super('BOT_BLOCKED', `HTTP ${status} from ${url} — treating session as blocked`);
    this.status = status;
  }
}

export class CancelledError extends HarvestError {
  constructor(message = 'Run cancelled') {
    super('CANCELLED', message);
  }
}

// ─── Run setup ─────────────────────────────────────────────

export class ListScanError extends HarvestError {
  constructor(listUrl: string, cause: unknown) {
    super('LIST_SCAN_FAILED', `List scan of ${listUrl} failed: ${describeError(cause)}`, {
      cause,
    });
  }
}

export class ConfigError extends HarvestError {
  constructor(message: string) {
    super('CONFIG_INVALID', message);
  }
}

export class UnknownUniversityError extends HarvestError {
  constructor(key: string, available: string[]) {
    super(
      'UNKNOWN_UNIVERSITY',
      `Unknown university "${key}". Available: ${available.join(', ')}`,
    );
  }
}

// ─── Classification ────────────────────────────────────────

export interface FailureClass {
  kind: FailureKind;
  outcome: ReleaseOutcome;
  reason: string;
}

// Messages Puppeteer/CDP produce when the browser or the page is gone.
const CRASH_PATTERNS = [
  /target closed/i,
  /session closed/i,
  /protocol error/i,
  /browser has disconnected/i,
  /connection closed/i,
  /frame was detached/i,
  /execution context was destroyed/i,
];

/** Map any thrown value to a task failure kind and a session release outcome. */
export function classifyFailure(err: unknown): FailureClass {
  const reason = describeError(err);

  if (err instanceof ExtractionTimeoutError || isNamed(err, 'TimeoutError')) {
    return { kind: 'timeout', outcome: 'timeout', reason };
  }
  if (err instanceof ExtractionFieldMissingError) {
    return { kind: 'field-missing', outcome: 'ok', reason };
  }
  if (err instanceof BotBlockedError) {
    return { kind: 'bot-blocked', outcome: 'dead', reason };
  }
  if (err instanceof CancelledError || isNamed(err, 'AbortError')) {
    // Whatever the page was doing was interrupted; don't lend it out again.
    return { kind: 'cancelled', outcome: 'dead', reason };
  }
  if (
    err instanceof SessionCrashedError ||
    CRASH_PATTERNS.some((pattern) => pattern.test(reason))
  ) {
    return { kind: 'crashed', outcome: 'dead', reason };
  }
  return { kind: 'extraction-error', outcome: 'ok', reason };
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

function isNamed(err: unknown, name: string): boolean {
  return err instanceof Error && err.name === name;
}
