/**
 * logger.ts: Timestamped, context-tagged logger for the console driver.
 *
 * Every module creates its own `Logger` with a context label so interleaved
 * output from the session, the locators and the orchestrator stays readable:
 *
 *   [2026-10-18T09:12:44.120Z] [INFO ] [AgentOrchestrator] Job 42 (monk) is Completed
 *
 * The threshold comes from `LOG_LEVEL` (debug | info | warn | error) and can be
 * overridden per process with `Logger.setLevel()`.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value);
}

function levelFromEnv(): LogLevel {
  const raw = (process.env.LOG_LEVEL ?? '').toLowerCase();
  return isLogLevel(raw) ? raw : 'info';
}

export class Logger {
  private static threshold: LogLevel = levelFromEnv();

  /** A label prepended to every message so you can tell *which* module is talking. */
  private readonly context: string;

  constructor(context: string) {
    this.context = context;
  }

  static setLevel(level: LogLevel): void {
    Logger.threshold = level;
  }

  static getLevel(): LogLevel {
    return Logger.threshold;
  }

  // ── Public API ─────────────────────────────────────────

  /** Wire-level detail: every request, every retry attempt. */
  debug(message: string): void {
    this.emit('debug', message);
  }

  /** Workflow progress: folder resolved, agent started, report written. */
  info(message: string): void {
    this.emit('info', message);
  }

  /** Unexpected but non-fatal: login page returned again, empty job list. */
  warn(message: string): void {
    this.emit('warn', message);
  }

  /** A hard failure, optionally with the raw error for debugging. */
  error(message: string, err?: unknown): void {
    this.emit('error', message);
    if (err && LEVEL_ORDER.error >= LEVEL_ORDER[Logger.threshold]) {
      console.error(err);
    }
  }

  // ── Internals ──────────────────────────────────────────

  private emit(level: LogLevel, message: string): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[Logger.threshold]) return;

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
      case 'debug':
        console.debug(line);
        break;
      default:
        console.log(line);
    }
  }
}
