/**
 * browserDriver.ts — The native automation surface a SessionHandle wraps.
 *
 * The pool never talks to Puppeteer directly; it asks a `DriverFactory` for
 * a driver and tears it down with `close()`.  Production uses
 * `launchPuppeteerDriver`, tests use an in-process fake.
 */

import type { Visibility } from './types';

/**
 * An element on the current page.  `href` is the raw value of the attribute
 * read: `href` itself unless the caller named another.
 */
export interface PageLink {
  href: string;
  text: string;
}

export interface BrowserDriver {
  /** Navigate the main page; resolves with the HTTP status (0 when unknown). */
  goto(url: string, timeoutMs: number): Promise<number>;
  /** Resolve once `selector` is present; reject with a timeout otherwise. */
  waitForSelector(selector: string, timeoutMs: number): Promise<void>;
  exists(selector: string): Promise<boolean>;
  /** Trimmed text content of the first match, or null. */
  textOf(selector: string): Promise<string | null>;
  attributeOf(selector: string, attribute: string): Promise<string | null>;
  click(selector: string, timeoutMs: number): Promise<void>;
  /**
   * Click and follow whatever the click reveals: a popup window becomes the
   * active page, an in-page navigation is awaited.
   */
  clickAndFollow(selector: string, timeoutMs: number): Promise<void>;
  /** Every match of `selector` with its trimmed text and `attribute` (default `href`). */
  links(selector: string, attribute?: string): Promise<PageLink[]>;
  html(): Promise<string>;
  url(): string;
  isConnected(): boolean;
  /** Release the native resource (the browser process). */
  close(): Promise<void>;
}

export interface DriverLaunchOptions {
  visibility: Visibility;
  chromePath?: string;
  userAgent?: string;
}

export type DriverFactory = (options: DriverLaunchOptions) => Promise<BrowserDriver>;
