/**
 * compliance.ts — Navigation throttling and HTTP status classification.
 *
 * 1. **Status classification** — 402/403/429 on a detail navigation means the
 *    site has started refusing this session; the session is retired.
 * 2. **Per-host throttle** — Bottleneck limiter per hostname, shared by every
 *    harvester in a run, so N workers never hit one university faster than
 *    `RATE_LIMIT_MS` allows.
 */

import Bottleneck from 'bottleneck';
import { Logger } from '../core/logger';

const logger = new Logger('Compliance');

// ─── HTTP status classification ─────────────────────────────

/** HTTP 402 "Payment Required": a pay-to-crawl firewall. */
export function isPaywallResponse(statusCode: number): boolean {
  return statusCode === 402;
}

/** 401 / 403: an auth wall or an outright refusal. */
export function isAuthWallResponse(statusCode: number): boolean {
  return statusCode === 401 || statusCode === 403;
}

/**
 * Statuses that mean the site is blocking this browser rather than failing
 * on one page.  401 is left out: program pages behind a login are a
 * per-page problem, not a reason to throw the session away.
 */
export function isBotBlockStatus(statusCode: number): boolean {
  return isPaywallResponse(statusCode) || statusCode === 403 || statusCode === 429;
}

// ─── Navigation throttle (Bottleneck) ───────────────────────

/** Schedules navigations so that each host sees at most one at a time, `minTime` apart. */
export interface NavigationThrottle {
  schedule<T>(url: string, navigate: () => Promise<T>): Promise<T>;
  /** Drop all limiters; pending jobs are rejected by Bottleneck. */
  disconnect(): Promise<void>;
}

export function createNavigationThrottle(minTimeMs: number): NavigationThrottle {
  const limiters = new Map<string, Bottleneck>();

  const limiterFor = (url: string): Bottleneck => {
    const host = hostnameOf(url);
    let limiter = limiters.get(host);
    if (!limiter) {
      limiter = new Bottleneck({ maxConcurrent: 1, minTime: minTimeMs });
      limiters.set(host, limiter);
      logger.debug(`Throttling ${host} to one navigation every ${minTimeMs} ms`);
    }
    return limiter;
  };

  return {
    schedule: (url, navigate) => limiterFor(url).schedule(navigate),
    async disconnect() {
      const pending = [...limiters.values()].map((limiter) => limiter.disconnect());
      limiters.clear();
      await Promise.all(pending);
    },
  };
}

/** A throttle that runs every navigation immediately (RATE_LIMIT_MS=0). */
export const unthrottled: NavigationThrottle = {
  schedule: (_url, navigate) => navigate(),
  disconnect: async () => undefined,
};

function hostnameOf(url: string): string {
  try {
    return new URL(url).hostname;
  } catch {
    return 'unknown';
  }
}
