/**
 * logger.ts — Timestamped, context-labelled logger for the harvesting pipeline.
 *
 * Every line reads:
 *   `[2026-02-10T18:30:00.000Z] [INFO ] [SessionPool] Created session s-3 (headless)`
 *
 * The threshold comes from `LOG_LEVEL` (debug | info | warn | error | silent)
 * and is read on every call, so tests can silence output through the
 * environment without touching the modules that log.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_RANK: Record<LogLevel | 'silent', number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

/**
 * Usage:
 *   const logger = new Logger('Coordinator');
 *   logger.info('Discovered 42 programs on the list page');
 */
export class Logger {
  /** A label prepended to every message so you can tell *which* module is talking. */
  private readonly context: string;

  constructor(context: string) {
    this.context = context;
  }

  // ── Public API ─────────────────────────────────────────

  /** Per-task chatter: acquisitions, navigations, releases. */
  debug(message: string): void {
    this.emit('debug', message);
  }

  /** Routine progress: sessions created, tasks discovered, run summary. */
  info(message: string): void {
    this.emit('info', message);
  }

  /** Something unexpected but non-fatal: a task failed, a session was replaced. */
  warn(message: string): void {
    this.emit('warn', message);
  }

  /** A hard failure: the browser will not start, the list page cannot be read. */
  error(message: string, err?: unknown): void {
    this.emit('error', message);
    if (err && this.enabled('error')) {
      console.error(err);
    }
  }

  /** A child logger whose context is `Parent:suffix`. */
  child(suffix: string): Logger {
    return new Logger(`${this.context}:${suffix}`);
  }

  // ── Internals ──────────────────────────────────────────

  private enabled(level: LogLevel): boolean {
    return LEVEL_RANK[level] >= LEVEL_RANK[currentThreshold()];
  }

  private emit(level: LogLevel, message: string): void {
    if (!this.enabled(level)) return;

    const timestamp = new Date().toISOString();
    const tag = level.toUpperCase().padEnd(5); // "INFO " / "WARN " / "ERROR"
    const line = `[${timestamp}] [${tag}] [${this.context}] ${message}`;

    switch (level) {
      case 'error':
        console.error(line);
        break;
      case 'warn':
        console.warn(line);
        break;
      default:
        console.log(line);
    }
  }
}

function currentThreshold(): LogLevel | 'silent' {
  const raw = process.env.LOG_LEVEL?.trim().toLowerCase();
  return raw && isThreshold(raw) ? raw : 'info';
}

function isThreshold(value: string): value is LogLevel | 'silent' {
  return Object.prototype.hasOwnProperty.call(LEVEL_RANK, value);
}
