/**
 * sessionPool.ts — Fixed-capacity pool of browser sessions.
 *
 * LENDING DISCIPLINE
 * ──────────────────
 *   acquire()  → an idle usable session, else a lazily created one while
 *                below capacity, else the caller queues (FIFO) until a
 *                release or the acquire timeout (PoolExhausted).
 *   release()  → applies the borrower's outcome to the session's health;
 *                dead sessions are destroyed and their slot is refilled for
 *                whoever is waiting.  A session still running a call its
 *                borrower gave up on is held back until that call settles
 *                (or closed once `drainGraceMs` passes), never lent twice.
 *   drain()    → refuses new borrowers, waits for current ones (bounded by
 *                the grace period, then force-closes), destroys everything.
 *
 * All bookkeeping (`idle`, `inUse`, `creating`, `waiters`) is mutated only
 * inside synchronous sections of this class, so no two borrowers can ever be
 * handed the same session and `alive + creating` never exceeds capacity.
 */

import type { DriverFactory } from '../core/browserDriver';
import {
  CancelledError,
  PoolClosedError,
  PoolExhaustedError,
  PoolUnavailableError,
  describeError,
} from '../core/errors';
import { Logger } from '../core/logger';
import type { ReleaseOutcome, Visibility } from '../core/types';
import { SessionHandle } from './sessionHandle';

const logger = new Logger('SessionPool');

export interface SessionPoolOptions {
  capacity: number;
  visibility: Visibility;
  factory: DriverFactory;
  /** Consecutive timeouts before a session loses one health step. */
  timeoutStrikes: number;
  /** Consecutive creation failures before the pool gives up. */
  maxCreateFailures: number;
  /**
   * How long drain() waits for borrowers, and how long a released session may
   * keep running abandoned work, before the session is force-closed.
   */
  drainGraceMs: number;
  chromePath?: string;
  userAgent?: string;
}

export interface PoolStats {
  capacity: number;
  alive: number;
  idle: number;
  inUse: number;
  creating: number;
  waiting: number;
  /** Released, but still finishing work a borrower abandoned. */
  settling: number;
  /** Highest `inUse` observed since the pool was created. */
  peakInUse: number;
}

interface Waiter {
  resolve: (session: SessionHandle) => void;
  reject: (err: Error) => void;
  timer: ReturnType<typeof setTimeout>;
  detach: () => void;
}

export class SessionPool {
  private readonly options: SessionPoolOptions;
  /** Every live session, idle or lent. */
  private readonly sessions = new Map<string, SessionHandle>();
  private readonly idle: SessionHandle[] = [];
  private readonly inUse = new Set<SessionHandle>();
  private readonly settling = new Set<SessionHandle>();
  private readonly waiters: Waiter[] = [];
  private readonly creations = new Set<Promise<void>>();
  private readonly teardowns = new Set<Promise<void>>();
  private creating = 0;
  private createFailures = 0;
  private nextId = 1;
  private peakInUse = 0;
  private fatal: PoolUnavailableError | null = null;
  private draining: Promise<void> | null = null;
  private onIdleBorrowers: (() => void)[] = [];

  constructor(options: SessionPoolOptions) {
    if (!Number.isInteger(options.capacity) || options.capacity < 1) {
      throw new RangeError(`Pool capacity must be an integer ≥ 1, got ${options.capacity}`);
    }
    this.options = options;
  }

  get capacity(): number {
    return this.options.capacity;
  }

  // ── Borrowing ──────────────────────────────────────────

  /**
   * Borrow a session for exclusive use until `release()`.
   *
   * Rejects with PoolExhaustedError after `timeoutMs`, PoolUnavailableError
   * once creation has failed too often, PoolClosedError during drain, and
   * CancelledError if `signal` aborts while waiting.
   */
  acquire(timeoutMs: number, signal?: AbortSignal): Promise<SessionHandle> {
    if (this.fatal) return Promise.reject(this.fatal);
    if (this.draining) return Promise.reject(new PoolClosedError());
    if (signal?.aborted) return Promise.reject(new CancelledError());

    return new Promise<SessionHandle>((resolve, reject) => {
      const waiter: Waiter = {
        resolve,
        reject,
        timer: setTimeout(() => {
          this.removeWaiter(waiter);
          reject(new PoolExhaustedError(timeoutMs));
        }, timeoutMs),
        detach: () => undefined,
      };

      if (signal) {
        const onAbort = () => {
          this.removeWaiter(waiter);
          reject(new CancelledError());
        };
        signal.addEventListener('abort', onAbort, { once: true });
        waiter.detach = () => signal.removeEventListener('abort', onAbort);
      }

      this.waiters.push(waiter);
      this.dispatch();
    });
  }

  /**
   * Hand a session back with the borrower's verdict.  Never throws; a
   * session that is not currently lent (already force-closed by drain) is
   * ignored.
   */
  release(session: SessionHandle, outcome: ReleaseOutcome): void {
    if (!this.inUse.delete(session)) {
      logger.debug(`Ignoring release of ${session.id}: not on loan`);
      return;
    }

    const health = session.recordOutcome(outcome, this.options.timeoutStrikes);

    if (health === 'dead' || !session.isUsable) {
      logger.warn(`Session ${session.id} is dead (outcome: ${outcome}); replacing it`);
      this.retire(session);
    } else if (session.busy) {
      this.holdBack(session);
    } else {
      if (health === 'degraded') {
        logger.debug(`Session ${session.id} is degraded`);
      }
      this.idle.push(session);
    }

    this.notifyIfNoBorrowers();
    this.dispatch();
  }

  // ── Warm start ─────────────────────────────────────────

  /** Pre-create sessions up to capacity.  Throws PoolUnavailableError if the browser will not start. */
  async warmUp(): Promise<void> {
    if (this.fatal) throw this.fatal;
    if (this.draining) throw new PoolClosedError();

    const missing = this.capacity - (this.sessions.size + this.creating);
    logger.info(`Warming up ${missing} session(s)`);
    await Promise.all(Array.from({ length: missing }, () => this.spawnCreation()));

    if (this.fatal) throw this.fatal;
  }

  // ── Teardown ───────────────────────────────────────────

  /**
   * Refuse new borrowers, wait for current ones (up to `drainGraceMs`, then
   * force-close what they hold), and destroy every session.  Repeated calls
   * share the first call's promise.
   */
  drain(): Promise<void> {
    if (!this.draining) {
      this.draining = this.runDrain();
    }
    return this.draining;
  }

  stats(): PoolStats {
    return {
      capacity: this.capacity,
      alive: this.sessions.size,
      idle: this.idle.length,
      inUse: this.inUse.size,
      creating: this.creating,
      waiting: this.waiters.length,
      settling: this.settling.size,
      peakInUse: this.peakInUse,
    };
  }

  // ── Internals ──────────────────────────────────────────

  /** Serve queued borrowers from idle sessions, then start creations for the rest. */
  private dispatch(): void {
    while (this.waiters.length > 0) {
      const session = this.takeIdle();
      if (!session) break;
      const waiter = this.waiters.shift();
      if (!waiter) {
        this.idle.unshift(session);
        break;
      }
      this.lend(session, waiter);
    }

    if (this.fatal || this.draining) return;

    const room = this.capacity - (this.sessions.size + this.creating);
    const needed = this.waiters.length - this.creating;
    for (let i = 0; i < Math.min(room, needed); i++) {
      void this.spawnCreation();
    }
  }

  private lend(session: SessionHandle, waiter: Waiter): void {
    clearTimeout(waiter.timer);
    waiter.detach();
    this.inUse.add(session);
    this.peakInUse = Math.max(this.peakInUse, this.inUse.size);
    logger.debug(`Lent ${session.id} (${this.inUse.size}/${this.capacity} in use)`);
    waiter.resolve(session);
  }

  /** Prefer healthy sessions over degraded ones; retire anything that died while idle. */
  private takeIdle(): SessionHandle | undefined {
    for (let i = 0; i < this.idle.length; ) {
      if (!this.idle[i].isUsable) {
        const [gone] = this.idle.splice(i, 1);
        logger.warn(`Idle session ${gone.id} lost its browser; replacing it`);
        this.retire(gone);
        continue;
      }
      i++;
    }

    const healthy = this.idle.findIndex((s) => s.health === 'healthy');
    const index = healthy >= 0 ? healthy : 0;
    if (this.idle.length === 0) return undefined;
    const [session] = this.idle.splice(index, 1);
    return session;
  }

  /** Start one session creation.  The returned promise never rejects. */
  private spawnCreation(): Promise<void> {
    this.creating += 1;
    const id = `s-${this.nextId++}`;

    const creation = this.options
      .factory({
        visibility: this.options.visibility,
        chromePath: this.options.chromePath,
        userAgent: this.options.userAgent,
      })
      .then(
        (driver) => {
          this.creating -= 1;
          this.createFailures = 0;
          const session = new SessionHandle(id, this.options.visibility, driver);
          this.sessions.set(session.id, session);

          if (this.draining || this.fatal) {
            this.retire(session);
            return;
          }
          logger.info(`Created session ${id} (${this.options.visibility})`);
          this.idle.push(session);
          this.dispatch();
        },
        (err: unknown) => {
          this.creating -= 1;
          this.createFailures += 1;
          logger.warn(
            `Creating session ${id} failed (${this.createFailures}/${this.options.maxCreateFailures}): ` +
              describeError(err),
          );

          if (this.createFailures >= this.options.maxCreateFailures) {
            this.failPool(err);
            return;
          }
          this.dispatch();
        },
      );

    this.creations.add(creation);
    return creation.finally(() => {
      this.creations.delete(creation);
    });
  }

  private failPool(cause: unknown): void {
    if (this.fatal) return;
    this.fatal = new PoolUnavailableError(this.createFailures, cause);
    logger.error(this.fatal.message);

    for (const waiter of this.waiters.splice(0)) {
      clearTimeout(waiter.timer);
      waiter.detach();
      waiter.reject(this.fatal);
    }
  }

  /** Drop a session from the pool and close its browser in the background. */
  private retire(session: SessionHandle): void {
    this.sessions.delete(session.id);
    const teardown = session
      .destroy()
      .catch((err: unknown) =>
        logger.warn(`Closing session ${session.id} failed: ${describeError(err)}`),
      )
      .finally(() => {
        this.teardowns.delete(teardown);
      });
    this.teardowns.add(teardown);
  }

  /** Keep a released session out of `idle` until its abandoned calls settle. */
  private holdBack(session: SessionHandle): void {
    logger.debug(`Session ${session.id} still has work in flight; holding it back`);
    this.settling.add(session);

    let timer: ReturnType<typeof setTimeout> | undefined;
    const expired = new Promise<false>((resolve) => {
      timer = setTimeout(() => resolve(false), this.options.drainGraceMs);
    });
    const settled = session.settle().then((): true => true);

    void Promise.race([settled, expired]).then((finished) => {
      clearTimeout(timer);
      // Gone already: drain took it.
      if (!this.settling.delete(session)) return;

      if (!finished) {
        logger.warn(
          `Session ${session.id} still busy ${this.options.drainGraceMs} ms after release; closing it`,
        );
        this.retire(session);
      } else if (this.draining || !session.isUsable) {
        this.retire(session);
      } else {
        this.idle.push(session);
      }
      this.dispatch();
    });
  }

  private removeWaiter(waiter: Waiter): void {
    const index = this.waiters.indexOf(waiter);
    if (index >= 0) this.waiters.splice(index, 1);
    clearTimeout(waiter.timer);
    waiter.detach();
  }

  private notifyIfNoBorrowers(): void {
    if (this.inUse.size > 0) return;
    for (const notify of this.onIdleBorrowers.splice(0)) notify();
  }

  private waitForBorrowers(graceMs: number): Promise<boolean> {
    if (this.inUse.size === 0) return Promise.resolve(true);

    return new Promise<boolean>((resolve) => {
      const timer = setTimeout(() => {
        this.onIdleBorrowers = this.onIdleBorrowers.filter((n) => n !== notify);
        resolve(false);
      }, graceMs);
      const notify = () => {
        clearTimeout(timer);
        resolve(true);
      };
      this.onIdleBorrowers.push(notify);
    });
  }

  private async runDrain(): Promise<void> {
    logger.info(
      `Draining pool: ${this.sessions.size} session(s), ${this.inUse.size} on loan`,
    );

    for (const waiter of this.waiters.splice(0)) {
      clearTimeout(waiter.timer);
      waiter.detach();
      waiter.reject(new PoolClosedError());
    }

    const returned = await this.waitForBorrowers(this.options.drainGraceMs);
    if (!returned) {
      logger.warn(
        `${this.inUse.size} session(s) still on loan after ${this.options.drainGraceMs} ms; force-closing`,
      );
      for (const session of [...this.inUse]) {
        this.inUse.delete(session);
        this.retire(session);
      }
    }

    // Creations that finish now see `draining` and retire themselves.
    await Promise.all([...this.creations]);

    this.settling.clear();
    for (const session of this.idle.splice(0)) {
      this.retire(session);
    }
    for (const session of [...this.sessions.values()]) {
      this.retire(session);
    }

    await Promise.all([...this.teardowns]);
    logger.info('Pool drained; no sessions alive');
  }
}
