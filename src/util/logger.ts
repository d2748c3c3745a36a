/**
 * Leveled logger for the stdio MCP server.
 *
 * stdout carries the JSON-RPC stream, so every level is written to stderr.
 * Messages and arguments pass through redactForLogging before they are written.
 */

import { redactForLogging } from './security.js';

const LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = (typeof LEVELS)[number];

function isLogLevel(value: string): value is LogLevel {
  return LEVELS.some((level) => level === value);
}

/** Reads a LOG_LEVEL value; anything unrecognised means `info` */
export function parseLogLevel(raw: string | undefined): LogLevel {
  const value = (raw ?? '').trim().toLowerCase();
  return isLogLevel(value) ? value : 'info';
}

const activeLevel = parseLogLevel(process.env.LOG_LEVEL);

export function isLevelEnabled(level: LogLevel, threshold: LogLevel = activeLevel): boolean {
  return LEVELS.indexOf(level) >= LEVELS.indexOf(threshold);
}

/**
 * Errors render as their stack (or name and message), followed by each `cause` in turn.
 * Extraction and provider errors wrap the failure that triggered them.
 */
function describeErrorChain(error: Error): string {
  const lines: string[] = [];
  let current: unknown = error;
  while (current instanceof Error && lines.length < 5) {
    const entry = current.stack ?? `${current.name}: ${current.message}`;
    lines.push(lines.length === 0 ? entry : `Caused by: ${entry}`);
    current = current.cause;
  }
  return lines.join('\n');
}

function stringify(arg: unknown): string {
  if (arg instanceof Error) return describeErrorChain(arg);
  if (typeof arg !== 'object' || arg === null) return String(arg);
  try {
    return JSON.stringify(arg, null, 2);
  } catch {
    return String(arg);
  }
}

export function formatMessage(level: LogLevel, message: string, ...args: unknown[]): string {
  const parts = [`[${new Date().toISOString()}] [${level.toUpperCase()}]`, message, ...args.map(stringify)];
  return redactForLogging(parts.join(' '));
}

function emit(level: LogLevel, message: string, args: unknown[]): void {
  if (isLevelEnabled(level)) {
    console.error(formatMessage(level, message, ...args));
  }
}

export type LogMethod = (message: string, ...args: unknown[]) => void;

export const logger: Record<LogLevel, LogMethod> = {
  debug: (message, ...args) => emit('debug', message, args),
  info: (message, ...args) => emit('info', message, args),
  warn: (message, ...args) => emit('warn', message, args),
  error: (message, ...args) => emit('error', message, args),
};
