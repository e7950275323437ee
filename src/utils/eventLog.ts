/**
 * Bounded In-Memory Event Log
 *
 * Keeps the last MAX_EVENTS failure/lifecycle entries of the session so the
 * diagnostics line can show what went wrong without re-reading the console.
 */

import { logger, type LogEntry, type LogLevel } from './logger.js';

export const MAX_EVENTS = 200;

const events: LogEntry[] = [];

export const addEvent = (entry: LogEntry): void => {
  events.push(entry);
  if (events.length > MAX_EVENTS) {
    events.splice(0, events.length - MAX_EVENTS);
  }
};

/**
 * Log through the structured logger and keep the entry.
 */
export const recordEvent = (
  event: string,
  payload?: Record<string, unknown>,
  level: LogLevel = 'info'
): LogEntry => {
  const entry = logger.event(event, payload, level);
  addEvent(entry);
  return entry;
};

export const getEvents = (level?: LogLevel): LogEntry[] =>
  level ? events.filter(entry => entry.level === level) : [...events];

export const clearEvents = (): void => {
  events.length = 0;
};

export const errorMessageOf = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
