/**
 * Lightweight DIY Logger for parley
 *
 * - Text or JSON lines (PARLEY_LOG_JSON=1) for easy parsing with jq
 * - Level via PARLEY_LOG_LEVEL (DEBUG, INFO, WARN, ERROR)
 * - PARLEY_LOG_FILE redirects everything to a file
 * - No external dependencies
 */

import fs from 'node:fs';
import path from 'node:path';

export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

export interface LogEntry {
  ts: string;
  level: LogLevel;
  component: string;
  msg: string;
  [key: string]: unknown;
}

export interface Logger {
  debug(msg: string, extra?: Record<string, unknown>): void;
  info(msg: string, extra?: Record<string, unknown>): void;
  warn(msg: string, extra?: Record<string, unknown>): void;
  error(msg: string, extra?: Record<string, unknown>): void;
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  DEBUG: 0,
  INFO: 1,
  WARN: 2,
  ERROR: 3,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_PRIORITY;
}

// Configuration getters - read env at runtime so the CLI can set them after imports
function getLogFile(): string | undefined {
  return process.env.PARLEY_LOG_FILE;
}

function getLogLevel(): LogLevel {
  const level = (process.env.PARLEY_LOG_LEVEL ?? 'INFO').toUpperCase();
  return isLogLevel(level) ? level : 'INFO';
}

function isLogJson(): boolean {
  return process.env.PARLEY_LOG_JSON === '1';
}

// Track which log directories we've already created
const createdLogDirs = new Set<string>();

function ensureLogDir(logFile: string): void {
  const logDir = path.dirname(logFile);
  if (!createdLogDirs.has(logDir) && !fs.existsSync(logDir)) {
    fs.mkdirSync(logDir, { recursive: true });
    createdLogDirs.add(logDir);
  }
}

function shouldLog(level: LogLevel): boolean {
  return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[getLogLevel()];
}

export function formatLogEntry(entry: LogEntry, json: boolean = isLogJson()): string {
  if (json) {
    return JSON.stringify(entry);
  }
  const { ts, level, component, msg, ...extra } = entry;
  const extraStr = Object.keys(extra).length > 0
    ? ' ' + Object.entries(extra).map(([k, v]) => `${k}=${String(v)}`).join(' ')
    : '';
  return `${ts} [${level}] [${component}] ${msg}${extraStr}`;
}

function log(level: LogLevel, component: string, msg: string, extra?: Record<string, unknown>): void {
  if (!shouldLog(level)) return;

  const entry: LogEntry = {
    ts: new Date().toISOString(),
    level,
    component,
    msg,
    ...extra,
  };

  const formatted = formatLogEntry(entry);

  const logFile = getLogFile();
  if (logFile) {
    ensureLogDir(logFile);
    fs.appendFileSync(logFile, formatted + '\n');
    // Agents share the terminal; never write to the console when a file is configured
    return;
  }

  if (level === 'ERROR' || level === 'WARN') {
    console.error(formatted);
  } else {
    console.log(formatted);
  }
}

/**
 * Create a logger for a specific component.
 * @param component - Component name (e.g., 'session', 'coordinator', 'participant')
 */
export function createLogger(component: string): Logger {
  return {
    debug: (msg, extra) => log('DEBUG', component, msg, extra),
    info: (msg, extra) => log('INFO', component, msg, extra),
    warn: (msg, extra) => log('WARN', component, msg, extra),
    error: (msg, extra) => log('ERROR', component, msg, extra),
  };
}

// Pre-created loggers for common components
export const sessionLog = createLogger('session');
export const coordinatorLog = createLogger('coordinator');
export const participantLog = createLogger('participant');
export const storageLog = createLogger('storage');

export default createLogger;
