import { describe, it, expect } from 'vitest';
import { formatLogLine } from './logger';

describe('formatLogLine', () => {
  it('prefixes the service name and a UTC timestamp', () => {
    expect(formatLogLine('Tailing log file /tmp/a.log', new Date('2024-03-05T07:08:09.123Z')))
      .toBe('[alert-watcher] 2024-03-05 07:08:09 Tailing log file /tmp/a.log');
  });
});
