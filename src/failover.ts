import { log as defaultLog } from './logger';
import { AlertEvent, LogEntry, LogFn } from './types';

export interface PoolFailoverOptions {
  primaryPool?: string;
  log?: LogFn;
}

function normalizePool(value: unknown): string {
  return typeof value === 'string' ? value.trim().toLowerCase() : '';
}

/**
 * Tracks which pool is serving successful traffic. Only `status: 200` entries
 * carrying a pool move the tracked value; anything else is ignored.
 */
export class PoolFailoverDetector {
  private current?: string;
  private readonly primary: string;
  private readonly log: LogFn;

  constructor(options: PoolFailoverOptions = {}) {
    this.primary = normalizePool(options.primaryPool);
    this.log = options.log ?? defaultLog;
  }

  observe(entry: LogEntry): AlertEvent | null {
    const pool = normalizePool(entry.pool);
    if (!pool || entry.status !== 200) return null;

    const previous = this.current;
    if (previous === pool) return null;

    this.current = pool;
    const release = entry.release === undefined || entry.release === null || entry.release === ''
      ? 'unknown'
      : String(entry.release);

    if (previous === undefined) {
      this.log(`Initial pool observed: ${pool} (release ${release})`);
      return null;
    }

    if (this.primary && pool === this.primary) {
      return {
        type: 'recovery',
        message: `Traffic recovered to primary pool '${pool}' (was '${previous}'). Release ${release} now serving.`,
      };
    }
    return {
      type: 'failover',
      message: `Failover detected: traffic moved from '${previous}' to '${pool}'. Release ${release} now serving.`,
    };
  }

  currentPool(): string | undefined {
    return this.current;
  }

  primaryPool(): string | undefined {
    return this.primary || undefined;
  }
}
