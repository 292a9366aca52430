import { EventEmitter } from 'events';
import { parseLine } from './parser';
import { ErrorRateDetector } from './errorRate';
import { PoolFailoverDetector } from './failover';
import { NotificationGate } from './notifier';
import { log as defaultLog } from './logger';
import type { WebhookTransport } from './webhook';
import type { WatcherConfig } from './config';
import { AlertEvent, DispatchResult, LogFn, WatcherSnapshot } from './types';

export interface AlertWatcherDeps {
  transport?: WebhookTransport;
  now?: () => number;
  log?: LogFn;
}

export type DetectionConfig = Pick<
  WatcherConfig,
  'webhookUrl' | 'windowSize' | 'errorThreshold' | 'cooldownSeconds' | 'primaryPool' | 'maintenanceFlag'
>;

export interface AlertWatcher {
  on(event: 'dispatch', listener: (result: DispatchResult) => void): this;
  emit(event: 'dispatch', result: DispatchResult): boolean;
}

/** The detection pipeline: parser, both detectors and the notification gate, fed one line at a time. */
export class AlertWatcher extends (EventEmitter as { new(): EventEmitter }) {
  private readonly errorRate: ErrorRateDetector;
  private readonly failover: PoolFailoverDetector;
  private readonly gate: NotificationGate;
  private readonly log: LogFn;
  private readonly now: () => number;

  constructor(private config: DetectionConfig, deps: AlertWatcherDeps = {}) {
    super();
    this.log = deps.log ?? defaultLog;
    this.now = deps.now ?? Date.now;
    this.errorRate = new ErrorRateDetector({
      windowSize: config.windowSize,
      threshold: config.errorThreshold,
    });
    this.failover = new PoolFailoverDetector({ primaryPool: config.primaryPool, log: this.log });
    this.gate = new NotificationGate({
      webhookUrl: config.webhookUrl,
      cooldownSeconds: config.cooldownSeconds,
      maintenanceFlag: config.maintenanceFlag,
      transport: deps.transport,
      now: this.now,
      log: this.log,
    });
  }

  async processLine(line: string): Promise<DispatchResult[]> {
    const entry = parseLine(line, this.log);
    if (!entry) return [];

    const events: AlertEvent[] = [];
    const rateEvent = this.errorRate.recordAndCheck(entry);
    if (rateEvent) events.push(rateEvent);
    const poolEvent = this.failover.observe(entry);
    if (poolEvent) events.push(poolEvent);

    const results: DispatchResult[] = [];
    for (const event of events) {
      const result = await this.gate.dispatch(event);
      results.push(result);
      this.emit('dispatch', result);
    }
    return results;
  }

  snapshot(): WatcherSnapshot {
    return {
      generatedAt: this.now(),
      window: {
        size: this.config.windowSize,
        filled: this.errorRate.filled(),
        errors: this.errorRate.errorCount(),
        rate: this.errorRate.rate(),
        threshold: this.config.errorThreshold,
        alertActive: this.errorRate.isActive(),
      },
      currentPool: this.failover.currentPool(),
      primaryPool: this.failover.primaryPool(),
      lastSent: this.gate.lastSent(),
      maintenanceFlag: this.config.maintenanceFlag,
    };
  }
}
