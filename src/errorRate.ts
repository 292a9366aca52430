import { RingBuffer } from './ringBuffer';
import { AlertEvent, LogEntry } from './types';

const INTEGER = /^[+-]?\d+$/;

function toInteger(value: unknown): number | undefined {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? Math.trunc(value) : undefined;
  }
  if (typeof value === 'string') {
    const token = value.trim();
    return INTEGER.test(token) ? Number(token) : undefined;
  }
  return undefined;
}

/**
 * First parseable status code of an `upstream_status` value. nginx writes one
 * code per upstream attempt ("502, 200"), and the first attempt decides.
 */
export function firstStatus(value: unknown): number | undefined {
  if (value === undefined || value === null) return undefined;
  const tokens = Array.isArray(value) ? value.map((item) => String(item)) : String(value).split(',');
  for (const token of tokens) {
    const code = toInteger(token);
    if (code !== undefined) return code;
  }
  return undefined;
}

export function isError(entry: LogEntry): boolean {
  const code = firstStatus(entry.upstream_status) ?? toInteger(entry.status);
  return code !== undefined && code >= 500;
}

export interface ErrorRateOptions {
  windowSize: number;
  threshold: number; // fraction, 0..1
}

export class ErrorRateDetector {
  private window: RingBuffer<0 | 1>;
  private errors = 0;
  private active = false;

  constructor(private options: ErrorRateOptions) {
    this.window = new RingBuffer<0 | 1>(options.windowSize);
  }

  recordAndCheck(entry: LogEntry): AlertEvent | null {
    const observation = isError(entry) ? 1 : 0;
    const evicted = this.window.push(observation);
    this.errors += observation - (evicted ?? 0);

    // Until the window fills nothing is decided, deactivation included.
    if (!this.window.isFull()) return null;

    const rate = this.errors / this.options.windowSize;
    if (rate < this.options.threshold) {
      this.active = false;
      return null;
    }
    if (this.active) return null;
    this.active = true;
    return {
      type: 'error_rate',
      message:
        `High upstream error rate detected: ${(rate * 100).toFixed(2)}% ` +
        `over last ${this.options.windowSize} requests.`,
    };
  }

  /** Current rate, or undefined while the window is still filling. */
  rate(): number | undefined {
    return this.window.isFull() ? this.errors / this.options.windowSize : undefined;
  }

  isActive(): boolean {
    return this.active;
  }

  filled(): number {
    return this.window.length();
  }

  errorCount(): number {
    return this.errors;
  }
}
