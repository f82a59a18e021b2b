/**
 * types.ts — Shared type definitions for the harvesting pipeline.
 *
 * Every layer (pool, queue, harvesters, extractors, sinks) agrees on the
 * shapes below.  Records and tasks are frozen when created and never mutated
 * afterwards; sessions are the only mutable entities and they are owned by
 * the SessionPool.
 */

import { ConfigError } from './errors';

// ─── Discovery ─────────────────────────────────────────────

/**
 * Where a program's detail content lives.
 *
 *   • `url`   — a plain detail-page URL.
 *   • `hash`  — a client-side route fragment resolved against `base`
 *               (single-page listings such as `#/programme/42`).
 *   • `click` — a selector on `pageUrl` that reveals the detail content when
 *               clicked, either in place or in a popup window.
 */
export type TaskLocator =
  | { kind: 'url'; url: string }
  | { kind: 'hash'; base: string; fragment: string }
  | { kind: 'click'; pageUrl: string; selector: string };

/** One program discovered on a list page, awaiting detail extraction. */
export interface DiscoveryTask {
  readonly id: string;
  readonly locator: TaskLocator;
  /** The list page this task was found on. */
  readonly sourcePage: string;
  /** Display title, when the list page already shows it. */
  readonly title?: string;
}

/** Build a frozen DiscoveryTask. */
export function createTask(
  id: string,
  locator: TaskLocator,
  sourcePage: string,
  title?: string,
): DiscoveryTask {
  return Object.freeze({
    id,
    locator: Object.freeze({ ...locator }),
    sourcePage,
    title: title?.trim() || undefined,
  });
}

/** Human-readable form of a locator, for logs and reports. */
export function describeLocator(locator: TaskLocator): string {
  switch (locator.kind) {
    case 'url':
      return locator.url;
    case 'hash':
      return resolveHashRoute(locator.base, locator.fragment);
    case 'click':
      return `${locator.pageUrl} → click(${locator.selector})`;
  }
}

/** `https://a.edu/list#old` + `#/programme/1` → `https://a.edu/list#/programme/1` */
export function resolveHashRoute(base: string, fragment: string): string {
  const hashless = base.split('#')[0];
  const cleaned = fragment.startsWith('#') ? fragment.slice(1) : fragment;
  return `${hashless}#${cleaned}`;
}

// ─── Records ───────────────────────────────────────────────

/** The output of one successful extraction. */
export interface RawRecord {
  /** Source university code (e.g. "HK001"). */
  readonly university: string;
  /** Program name. */
  readonly title: string;
  /** Canonical detail-page URL. */
  readonly url: string;
  readonly applyLink?: string;
  /** Deadline exactly as the site shows it. */
  readonly deadline?: string;
  /** Application opening date exactly as the site shows it. */
  readonly openDate?: string;
  /** Faculty or study area, when the site groups programs that way. */
  readonly field?: string;
}

/** Field values an Extractor can return; title and url fall back to the task and the session. */
export interface ExtractedFields {
  title?: string;
  url?: string;
  applyLink?: string;
  deadline?: string;
  openDate?: string;
  field?: string;
}

// ─── Sessions ──────────────────────────────────────────────

/** Forward-only: Healthy → Degraded → Dead. */
export type SessionHealth = 'healthy' | 'degraded' | 'dead';

export type Visibility = 'headless' | 'headful';

/**
 * What the borrower reports when handing a session back.
 *
 *   • `ok`       — session behaved; health unchanged.
 *   • `timeout`  — an operation timed out; counts as a strike.
 *   • `degraded` — the session misbehaved; advance one health step.
 *   • `dead`     — crash, protocol error or bot-block; destroy it.
 */
export type ReleaseOutcome = 'ok' | 'timeout' | 'degraded' | 'dead';

// ─── Failures and results ──────────────────────────────────

export type FailureKind =
  | 'pool-exhausted'
  | 'timeout'
  | 'field-missing'
  | 'crashed'
  | 'bot-blocked'
  | 'extraction-error'
  | 'cancelled';

export interface TaskFailure {
  task: DiscoveryTask;
  kind: FailureKind;
  reason: string;
  /** Session acquisition attempts spent on this task. */
  attempts: number;
}

/** What Coordinator.run() resolves with. */
export interface HarvestReport {
  university: string;
  /** Deduplicated records, in acceptance order. */
  succeeded: RawRecord[];
  failed: TaskFailure[];
  /** Records rejected by the deduplicator. */
  duplicates: number;
  /** Tasks never attempted because the run was cancelled. */
  unprocessed: DiscoveryTask[];
  cancelled: boolean;
  durationMs: number;
}

export interface HarvestProgress {
  total: number;
  completed: number;
  succeeded: number;
  failed: number;
  duplicates: number;
  inUse: number;
}

// ─── Universities ──────────────────────────────────────────

/** CSS selectors that drive the list scanner and the generic extractor. */
export interface UniversitySelectors {
  /** Anchors on the list page that lead to program details. */
  listLink: string;
  /**
   * Set when list entries are click targets (buttons, script-driven rows)
   * rather than links: the attribute that tells entries apart.  Each entry
   * becomes a click locator on the list page.
   */
  clickKey?: string;
  /** "Next page" control on the list page. */
  nextPage?: string;
  /** Element whose presence means the detail content has rendered. */
  detailReady?: string;
  title?: string;
  deadline?: string;
  openDate?: string;
  applyLink?: string;
  field?: string;
}

export interface UniversityInfo {
  /** Registry key used on the command line (e.g. "hku"). */
  key: string;
  /** Output code (e.g. "HK001"). */
  code: string;
  name: string;
  listUrl: string;
  /** Some sites only pass bot-detection with a visible window. */
  visibility?: Visibility;
  workers?: number;
  timeoutMs?: number;
  /** School-wide application portal, used when a program page has none. */
  applyUrl?: string;
  selectors: UniversitySelectors;
}

// ─── Configuration ─────────────────────────────────────────

/** Everything the core reads from the environment. */
export interface HarvestConfig {
  /** Maximum live sessions per run. */
  poolCapacity: number;
  /** Hard ceiling on concurrent harvesters, whatever the caller asks for. */
  maxConcurrency: number;
  /** Per-operation timeout for navigation, waits and extraction. */
  operationTimeoutMs: number;
  /** How long one acquire() waits before PoolExhausted. */
  acquireTimeoutMs: number;
  /** Acquire attempts per task before the task is recorded as failed. */
  acquireRetries: number;
  retryBackoffMs: number;
  /** Consecutive timeouts before a session loses one health step. */
  timeoutStrikes: number;
  /** Consecutive session-creation failures before PoolUnavailable. */
  maxCreateFailures: number;
  /** Pre-create every session before the first task is dispatched. */
  warmStart: boolean;
  /** How long drain() waits for borrowers before force-closing. */
  drainGraceMs: number;
  /** Minimum spacing between navigations to one host; 0 disables. */
  rateLimitMs: number;
  visibility: Visibility;
  chromePath?: string;
  userAgent?: string;
  outputDir: string;
}

type Env = Record<string, string | undefined>;

/** Build a HarvestConfig from the environment, with defaults. */
export function loadHarvestConfig(env: Env = process.env): HarvestConfig {
  const config: HarvestConfig = {
    poolCapacity: readInt(env, 'POOL_CAPACITY', 4, 1),
    maxConcurrency: readInt(env, 'MAX_CONCURRENCY', 8, 1),
    operationTimeoutMs: readInt(env, 'OPERATION_TIMEOUT_MS', 20_000, 1),
    acquireTimeoutMs: readInt(env, 'ACQUIRE_TIMEOUT_MS', 30_000, 1),
    acquireRetries: readInt(env, 'ACQUIRE_RETRIES', 3, 1),
    retryBackoffMs: readInt(env, 'RETRY_BACKOFF_MS', 500, 0),
    timeoutStrikes: readInt(env, 'TIMEOUT_STRIKES', 2, 1),
    maxCreateFailures: readInt(env, 'MAX_CREATE_FAILURES', 3, 1),
    warmStart: readBool(env, 'WARM_START', false),
    drainGraceMs: readInt(env, 'DRAIN_GRACE_MS', 15_000, 0),
    rateLimitMs: readInt(env, 'RATE_LIMIT_MS', 0, 0),
    visibility: readBool(env, 'HEADLESS', true) ? 'headless' : 'headful',
    chromePath: env.CHROME_PATH || undefined,
    userAgent: env.USER_AGENT || undefined,
    outputDir: env.OUTPUT_DIR || 'output',
  };
  return config;
}

/**
 * Apply a university's catalogue overrides.  Visibility is decided here,
 * per university, and never mutates the shared base config.
 */
export function resolveUniversityConfig(
  base: HarvestConfig,
  university: UniversityInfo,
): HarvestConfig {
  return {
    ...base,
    poolCapacity: university.workers ?? base.poolCapacity,
    operationTimeoutMs: university.timeoutMs ?? base.operationTimeoutMs,
    visibility: university.visibility ?? base.visibility,
  };
}

function readInt(env: Env, name: string, fallback: number, min: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  if (!/^-?\d+$/.test(raw.trim())) {
    throw new ConfigError(`${name} must be an integer, got "${raw}"`);
  }
  const value = parseInt(raw, 10);
  if (value < min) {
    throw new ConfigError(`${name} must be at least ${min}, got ${value}`);
  }
  return value;
}

function readBool(env: Env, name: string, fallback: boolean): boolean {
  const raw = env[name]?.trim().toLowerCase();
  if (!raw) return fallback;
  if (['1', 'true', 'yes', 'on'].includes(raw)) return true;
  if (['0', 'false', 'no', 'off'].includes(raw)) return false;
  throw new ConfigError(`${name} must be a boolean, got "${env[name]}"`);
}
