/**
 * Console diagnostics for the viewer
 *
 * Everything is logged as a named event plus a small payload, e.g.
 * `image_scan_completed { found: 12 }`. Entries below the minimum level are
 * dropped; it starts at SLIDESHOW_LOG_LEVEL (else info) and `--verbose`
 * lowers it to debug through setLogLevel().
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  timestamp: number;
  level: LogLevel;
  event: string;
  payload?: Record<string, unknown>;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export const isLogLevel = (value: unknown): value is LogLevel =>
  typeof value === 'string' && Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);

const envLevel = process.env.SLIDESHOW_LOG_LEVEL;
let minLevel: LogLevel = isLogLevel(envLevel) ? envLevel : 'info';

export const setLogLevel = (level: LogLevel): void => {
  minLevel = level;
};

const shouldLog = (level: LogLevel): boolean => LEVEL_ORDER[level] >= LEVEL_ORDER[minLevel];

// Level names double as console method names
const logToConsole = (entry: LogEntry): void => {
  if (!shouldLog(entry.level)) {
    return;
  }

  const line = `${new Date(entry.timestamp).toISOString()} ${entry.level.toUpperCase().padEnd(5)} ${entry.event}`;
  if (entry.payload) {
    console[entry.level](line, entry.payload);
  } else {
    console[entry.level](line);
  }
};

/**
 * Emits one event and hands the entry back, so callers such as the event
 * log can keep it.
 *
 * @param event - snake_case name, e.g. `state_save_failed`
 */
export const logEvent = (
  event: string,
  payload?: Record<string, unknown>,
  level: LogLevel = 'info'
): LogEntry => {
  const entry: LogEntry = { timestamp: Date.now(), level, event, payload };
  logToConsole(entry);
  return entry;
};

const atLevel = (level: LogLevel) =>
  (event: string, payload?: Record<string, unknown>): LogEntry => logEvent(event, payload, level);

export const logger = {
  debug: atLevel('debug'),
  info: atLevel('info'),
  warn: atLevel('warn'),
  error: atLevel('error'),
  event: logEvent,
};
