export interface WatcherConfig {
  webhookUrl: string;
  logPath: string;
  windowSize: number;
  errorThreshold: number; // fraction, 0..1
  cooldownSeconds: number;
  primaryPool?: string;
  maintenanceFlag?: string;
  statusPort: number; // 0 disables the status server
  statusHost: string;
  statusToken: string;
  recentLimit: number;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

type Env = Record<string, string | undefined>;

function optional(value: string | undefined): string | undefined {
  const trimmed = (value ?? '').trim();
  return trimmed || undefined;
}

function integer(env: Env, name: string, fallback: number, min: number): number {
  const raw = optional(env[name]);
  if (raw === undefined) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigError(`${name} must be an integer >= ${min}, got '${raw}'`);
  }
  return value;
}

function fraction(env: Env, name: string, fallback: number): number {
  const raw = optional(env[name]);
  if (raw === undefined) return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    throw new ConfigError(`${name} must be a fraction between 0 and 1, got '${raw}'`);
  }
  return value;
}

export function loadConfig(env: Env = process.env): WatcherConfig {
  const webhookUrl = optional(env.WEBHOOK_URL) ?? optional(env.SLACK_WEBHOOK_URL);
  if (!webhookUrl) {
    throw new ConfigError('SLACK_WEBHOOK_URL (or WEBHOOK_URL) is required.');
  }
  return {
    webhookUrl,
    logPath:         optional(env.LOG_PATH) ?? '/var/log/nginx/app_access.log',
    windowSize:      integer(env, 'ALERT_ERROR_WINDOW', 200, 1),
    errorThreshold:  fraction(env, 'ALERT_ERROR_THRESHOLD', 0.02),
    cooldownSeconds: integer(env, 'ALERT_COOLDOWN_SECONDS', 300, 0),
    primaryPool:     optional(env.PRIMARY_POOL),
    maintenanceFlag: optional(env.MAINTENANCE_FLAG_FILE),
    statusPort:      integer(env, 'STATUS_PORT', 0, 0),
    statusHost:      optional(env.STATUS_HOST) ?? '127.0.0.1',
    statusToken:     env.STATUS_TOKEN ?? '',
    recentLimit:     integer(env, 'RECENT_LIMIT', 100, 1),
  };
}
