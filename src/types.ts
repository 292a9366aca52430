/** One decoded access-log line. Only a handful of fields are consumed. */
export interface LogEntry {
  status?: unknown;
  upstream_status?: unknown;
  pool?: unknown;
  release?: unknown;
  [key: string]: unknown;
}

export type AlertType = 'error_rate' | 'failover' | 'recovery';

export interface AlertEvent {
  type: AlertType;
  message: string;
}

export type DispatchOutcome = 'sent' | 'failed' | 'cooldown' | 'maintenance' | 'unconfigured';

export interface DispatchResult {
  type: AlertType;
  message: string;
  outcome: DispatchOutcome;
  at: number; // epoch millis
  status?: number; // webhook HTTP status, when a response arrived
  error?: string;
}

export type LogFn = (message: string) => void;

export interface WatcherSnapshot {
  generatedAt: number;
  window: {
    size: number;
    filled: number;
    errors: number;
    rate?: number; // only once the window is full
    threshold: number;
    alertActive: boolean;
  };
  currentPool?: string;
  primaryPool?: string;
  lastSent: Partial<Record<AlertType, number>>;
  maintenanceFlag?: string;
}
