import fs from 'fs';
import { log as defaultLog } from './logger';
import { postWebhook, WebhookTransport } from './webhook';
import { AlertEvent, AlertType, DispatchResult, LogFn } from './types';

export const ALERT_MARKER = ':rotating_light:';
export const WEBHOOK_TIMEOUT_MS = 5000;

export interface NotificationGateOptions {
  webhookUrl: string;
  cooldownSeconds: number;
  maintenanceFlag?: string;
  timeoutMs?: number;
  transport?: WebhookTransport;
  now?: () => number;
  log?: LogFn;
}

/**
 * Decides whether an alert goes out: cooldown first, then the maintenance flag
 * file, then the webhook itself. Only a delivered alert starts a cooldown.
 */
export class NotificationGate {
  private lastSentAt = new Map<AlertType, number>();
  private readonly transport: WebhookTransport;
  private readonly now: () => number;
  private readonly log: LogFn;

  constructor(private options: NotificationGateOptions) {
    this.transport = options.transport ?? postWebhook;
    this.now = options.now ?? Date.now;
    this.log = options.log ?? defaultLog;
  }

  async dispatch(event: AlertEvent): Promise<DispatchResult> {
    const { type, message } = event;
    const result = (outcome: DispatchResult['outcome'], extra: Partial<DispatchResult> = {}): DispatchResult => ({
      type,
      message,
      outcome,
      at: this.now(),
      ...extra,
    });

    if (this.inCooldown(type)) return result('cooldown');

    if (this.maintenanceActive()) {
      this.log(`Maintenance mode active; suppressing ${type} alert: ${message}`);
      return result('maintenance');
    }

    if (!this.options.webhookUrl) {
      this.log(`Cannot send ${type} alert (no webhook configured): ${message}`);
      return result('unconfigured');
    }

    const payload = { text: `${ALERT_MARKER} ${message}` };
    try {
      const res = await this.transport(this.options.webhookUrl, payload, this.options.timeoutMs ?? WEBHOOK_TIMEOUT_MS);
      if (res.status >= 400) {
        this.log(`Webhook returned ${res.status}: ${res.body.trim()}`);
        return result('failed', { status: res.status });
      }
      this.log(`Sent ${type} alert: ${message}`);
      const sent = result('sent', { status: res.status });
      this.lastSentAt.set(type, sent.at);
      return sent;
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      this.log(`Failed to send ${type} alert: ${reason}`);
      return result('failed', { error: reason });
    }
  }

  lastSent(): Partial<Record<AlertType, number>> {
    const out: Partial<Record<AlertType, number>> = {};
    for (const [type, at] of this.lastSentAt) out[type] = at;
    return out;
  }

  private inCooldown(type: AlertType): boolean {
    const last = this.lastSentAt.get(type);
    if (last === undefined) return false;
    return this.now() - last < this.options.cooldownSeconds * 1000;
  }

  // Checked on every attempt; a flag removed mid-check reads as absent.
  private maintenanceActive(): boolean {
    const flag = this.options.maintenanceFlag;
    return Boolean(flag && fs.existsSync(flag));
  }
}
