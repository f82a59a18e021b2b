/**
 * sessionHandle.ts — One pooled browser session: identity, health, and a
 * timeout-bounded automation surface over a BrowserDriver.
 *
 * Health only moves forward (healthy → degraded → dead).  The pool applies
 * release outcomes through `recordOutcome()`; a borrower never changes
 * health directly.
 *
 * Every driver call is counted as in flight until it settles, including one
 * its caller has already given up on after a timeout.  The pool does not lend
 * a busy session again until `settle()` resolves.
 */

import type { BrowserDriver, PageLink } from '../core/browserDriver';
import { withTimeout } from '../core/async';
import { BotBlockedError, SessionCrashedError } from '../core/errors';
import { Logger } from '../core/logger';
import type { ReleaseOutcome, SessionHealth, Visibility } from '../core/types';
import { isAuthWallResponse, isBotBlockStatus } from '../middleware/compliance';

const logger = new Logger('SessionHandle');

const NEXT_HEALTH: Record<SessionHealth, SessionHealth> = {
  healthy: 'degraded',
  degraded: 'dead',
  dead: 'dead',
};

export class SessionHandle {
  readonly id: string;
  readonly visibility: Visibility;
  readonly createdAt: number;
  private readonly driver: BrowserDriver;
  private currentHealth: SessionHealth = 'healthy';
  /** Consecutive `timeout` outcomes since the last `ok`. */
  private strikes = 0;
  private destroyed = false;
  private readonly inFlight = new Set<Promise<void>>();

  constructor(id: string, visibility: Visibility, driver: BrowserDriver) {
    this.id = id;
    this.visibility = visibility;
    this.driver = driver;
    this.createdAt = Date.now();
  }

  get health(): SessionHealth {
    return this.currentHealth;
  }

  get isUsable(): boolean {
    return this.currentHealth !== 'dead' && !this.destroyed && this.driver.isConnected();
  }

  /** True while a driver call or held work started on this session has not settled. */
  get busy(): boolean {
    return this.inFlight.size > 0;
  }

  /**
   * Count `work` as running on this session until it settles.  Used for
   * driver calls and for whole extractions that drive the session.
   */
  hold<T>(work: Promise<T>): Promise<T> {
    const done: Promise<void> = work.then(
      () => undefined,
      () => undefined,
    );
    this.inFlight.add(done);
    void done.then(() => {
      this.inFlight.delete(done);
    });
    return work;
  }

  /** Run one driver call, counted as in flight; a browser that has gone away is a crash. */
  private drive<T>(call: (driver: BrowserDriver) => Promise<T>): Promise<T> {
    if (this.destroyed || !this.driver.isConnected()) {
      return Promise.reject(new SessionCrashedError(`Session ${this.id} has lost its browser`));
    }
    return this.hold(call(this.driver));
  }

  /** Resolve once nothing is in flight.  Never rejects. */
  async settle(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight]);
    }
  }

  // ── Health ─────────────────────────────────────────────

  /**
   * Apply a release outcome and return the resulting health.
   * `timeoutStrikes` consecutive timeouts cost one health step.
   */
  recordOutcome(outcome: ReleaseOutcome, timeoutStrikes: number): SessionHealth {
    switch (outcome) {
      case 'ok':
        this.strikes = 0;
        break;
      case 'timeout':
        this.strikes += 1;
        if (this.strikes >= timeoutStrikes) {
          this.strikes = 0;
          this.advance();
        }
        break;
      case 'degraded':
        this.advance();
        break;
      case 'dead':
        this.currentHealth = 'dead';
        break;
    }
    if (!this.driver.isConnected()) {
      this.currentHealth = 'dead';
    }
    return this.currentHealth;
  }

  private advance(): void {
    this.currentHealth = NEXT_HEALTH[this.currentHealth];
  }

  // ── Automation (each call bounded by its own timeout) ──

  /**
   * Navigate and check the response status.  A blocking status retires the
   * session via BotBlockedError.
   */
  async navigate(url: string, timeoutMs: number): Promise<number> {
    const status = await withTimeout(
      this.drive((driver) => driver.goto(url, timeoutMs)),
      timeoutMs,
      `Navigation to ${url}`,
    );
    if (isBotBlockStatus(status)) {
      throw new BotBlockedError(url, status);
    }
    if (isAuthWallResponse(status)) {
      logger.warn(`${this.id}: ${url} answered ${status}; the page is behind a login`);
    }
    return status;
  }

  waitFor(selector: string, timeoutMs: number): Promise<void> {
    return withTimeout(
      this.drive((driver) => driver.waitForSelector(selector, timeoutMs)),
      timeoutMs,
      `Waiting for "${selector}"`,
    );
  }

  exists(selector: string): Promise<boolean> {
    return this.drive((driver) => driver.exists(selector));
  }

  readText(selector: string): Promise<string | null> {
    return this.drive((driver) => driver.textOf(selector));
  }

  readAttribute(selector: string, attribute: string): Promise<string | null> {
    return this.drive((driver) => driver.attributeOf(selector, attribute));
  }

  click(selector: string, timeoutMs: number): Promise<void> {
    return withTimeout(
      this.drive((driver) => driver.click(selector, timeoutMs)),
      timeoutMs,
      `Clicking "${selector}"`,
    );
  }

  clickAndFollow(selector: string, timeoutMs: number): Promise<void> {
    return withTimeout(
      this.drive((driver) => driver.clickAndFollow(selector, timeoutMs)),
      timeoutMs,
      `Following "${selector}"`,
    );
  }

  links(selector: string, attribute?: string): Promise<PageLink[]> {
    return this.drive((driver) => driver.links(selector, attribute));
  }

  html(): Promise<string> {
    return this.drive((driver) => driver.html());
  }

  currentUrl(): string {
    return this.driver.url();
  }

  // ── Teardown ───────────────────────────────────────────

  /** Mark dead and close the native resource.  Safe to call twice. */
  async destroy(): Promise<void> {
    this.currentHealth = 'dead';
    if (this.destroyed) return;
    this.destroyed = true;
    await this.driver.close();
  }
}
