import type { LogFn } from './types';

export function formatLogLine(message: string, date: Date = new Date()): string {
  const ts = date.toISOString().slice(0, 19).replace('T', ' ');
  return `[alert-watcher] ${ts} ${message}`;
}

export const log: LogFn = (message) => {
  // eslint-disable-next-line no-console
  console.error(formatLogLine(message));
};
