import { CONFIG, type LogLevel } from '../config.js';

type Meta = Record<string, unknown>;

const SEVERITY: Record<LogLevel, number> = { info: 0, error: 1, silent: 2 };

export function isEnabled(level: Exclude<LogLevel, 'silent'>, threshold: LogLevel = CONFIG.logLevel): boolean {
  return SEVERITY[level] >= SEVERITY[threshold];
}

// Error instances serialize to {} with JSON.stringify
function plain(meta: Meta): Meta {
  const out: Meta = {};
  for (const [key, value] of Object.entries(meta)) {
    out[key] = value instanceof Error ? { name: value.name, message: value.message } : value;
  }
  return out;
}

export function formatLogLine(level: Exclude<LogLevel, 'silent'>, message: string, meta: Meta = {}): string {
  return JSON.stringify({ level, message, ...plain(meta) });
}

export function logInfo(message: string, meta: Meta = {}) {
  if (!isEnabled('info')) return;
  console.log(formatLogLine('info', message, meta));
}

export function logError(message: string, meta: Meta = {}) {
  if (!isEnabled('error')) return;
  console.error(formatLogLine('error', message, meta));
}
