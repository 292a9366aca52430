import { LogEntry, LogFn } from './types';
import { log as defaultLog } from './logger';

function isRecord(value: unknown): value is LogEntry {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Decode one access-log line. Returns null for blank lines (silently) and for
 * anything that is not a JSON object (with one diagnostic line).
 */
export function parseLine(rawLine: string, log: LogFn = defaultLog): LogEntry | null {
  const line = rawLine.trim();
  if (!line) return null;
  let decoded: unknown;
  try {
    decoded = JSON.parse(line);
  } catch {
    log(`Skipping unparsable log line: ${line}`);
    return null;
  }
  if (!isRecord(decoded)) {
    log(`Skipping unparsable log line: ${line}`);
    return null;
  }
  return decoded;
}
