import { RefreshIntervals, DEFAULT_REFRESH_INTERVALS_MS } from '../coordinator/OrderEntryCoordinator';
import { DEFAULT_STALENESS_THRESHOLDS_MS, StalenessThresholds } from '../safety/StalenessPolicy';
import { DEFAULT_SAFETY_FETCH_TIMEOUTS_MS, SafetyFetchPurpose } from '../safety/SafetyStateTracker';
import type { SubscriptionRetryOptions } from '../subscriptions/SubscriptionCoordinator';

export interface AppConfig {
  port: number;
  host: string;
  production: boolean;
  allowedOrigins: string[];
  apiKeySecret: string;
  bus: {
    url: string;
    ackTimeoutMs: number;
    reconnectMinMs: number;
    reconnectMaxMs: number;
  };
  tradingApi: {
    baseUrl: string;
    apiKey: string;
    timeoutMs: number;
  };
  staleness: StalenessThresholds;
  safetyTimeoutsMs: Record<SafetyFetchPurpose, number>;
  confirmFetchTimeoutMs: number;
  refreshIntervalsMs: RefreshIntervals;
  subscriptionRetry: SubscriptionRetryOptions;
  intentStoreDir: string;
  maxSessions: number;
  ws: {
    heartbeatIntervalMs: number;
    staleConnectionMs: number;
  };
}

type Env = Record<string, string | undefined>;

const DEV_ORIGINS = ['http://localhost:5173', 'http://127.0.0.1:5173'];

function positiveNumber(env: Env, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isFinite(value) || value <= 0) {
    throw new Error(`[config] ${key} must be a positive number, got "${raw}"`);
  }
  return value;
}

function flag(env: Env, key: string, fallback: boolean): boolean {
  const raw = String(env[key] || '').trim().toLowerCase();
  if (!raw) return fallback;
  return raw === '1' || raw === 'true' || raw === 'yes' || raw === 'on';
}

function list(value: string | undefined): string[] {
  return String(value || '')
    .split(',')
    .map((item) => item.trim())
    .filter(Boolean);
}

export function loadConfig(env: Env = process.env): AppConfig {
  const apiKeySecret = String(env.API_KEY_SECRET || '').trim();
  if (!apiKeySecret) {
    throw new Error('[config] Missing API_KEY_SECRET. Set it in .env before starting the server.');
  }

  const production = env.NODE_ENV === 'production';
  const configuredOrigins = list(env.ALLOWED_ORIGINS);

  return {
    port: positiveNumber(env, 'PORT', 8787),
    host: String(env.HOST || '0.0.0.0'),
    production,
    allowedOrigins: production ? configuredOrigins : [...DEV_ORIGINS, ...configuredOrigins],
    apiKeySecret,
    bus: {
      url: String(env.BUS_WS_URL || 'ws://localhost:8790/bus'),
      ackTimeoutMs: positiveNumber(env, 'BUS_ACK_TIMEOUT_MS', 5_000),
      reconnectMinMs: positiveNumber(env, 'BUS_RECONNECT_MIN_MS', 1_000),
      reconnectMaxMs: positiveNumber(env, 'BUS_RECONNECT_MAX_MS', 30_000),
    },
    tradingApi: {
      baseUrl: String(env.TRADING_API_BASE_URL || 'http://localhost:8000'),
      apiKey: String(env.TRADING_API_KEY || apiKeySecret),
      timeoutMs: positiveNumber(env, 'TRADING_API_TIMEOUT_MS', 10_000),
    },
    staleness: {
      position: positiveNumber(env, 'STALE_POSITION_MS', DEFAULT_STALENESS_THRESHOLDS_MS.position),
      price: positiveNumber(env, 'STALE_PRICE_MS', DEFAULT_STALENESS_THRESHOLDS_MS.price),
      buyingPower: positiveNumber(env, 'STALE_BUYING_POWER_MS', DEFAULT_STALENESS_THRESHOLDS_MS.buyingPower),
      riskLimits: positiveNumber(env, 'STALE_RISK_LIMITS_MS', DEFAULT_STALENESS_THRESHOLDS_MS.riskLimits),
    },
    safetyTimeoutsMs: {
      session_init: positiveNumber(env, 'SAFETY_INIT_TIMEOUT_MS', DEFAULT_SAFETY_FETCH_TIMEOUTS_MS.session_init),
      submission: positiveNumber(env, 'SAFETY_SUBMIT_TIMEOUT_MS', DEFAULT_SAFETY_FETCH_TIMEOUTS_MS.submission),
    },
    confirmFetchTimeoutMs: positiveNumber(env, 'CONFIRM_FETCH_TIMEOUT_MS', 2_000),
    refreshIntervalsMs: {
      positions: positiveNumber(env, 'REFRESH_POSITIONS_MS', DEFAULT_REFRESH_INTERVALS_MS.positions),
      buyingPower: positiveNumber(env, 'REFRESH_BUYING_POWER_MS', DEFAULT_REFRESH_INTERVALS_MS.buyingPower),
      riskLimits: positiveNumber(env, 'REFRESH_RISK_LIMITS_MS', DEFAULT_REFRESH_INTERVALS_MS.riskLimits),
    },
    subscriptionRetry: {
      enabled: flag(env, 'SUBSCRIPTION_RETRY_ENABLED', true),
      minBackoffMs: positiveNumber(env, 'SUBSCRIPTION_RETRY_MIN_MS', 1_000),
      maxBackoffMs: positiveNumber(env, 'SUBSCRIPTION_RETRY_MAX_MS', 30_000),
    },
    intentStoreDir: String(env.INTENT_STORE_DIR || './data/intents'),
    maxSessions: positiveNumber(env, 'MAX_SESSIONS', 100),
    ws: {
      heartbeatIntervalMs: positiveNumber(env, 'WS_HEARTBEAT_INTERVAL_MS', 15_000),
      staleConnectionMs: positiveNumber(env, 'WS_STALE_CONNECTION_MS', 60_000),
    },
  };
}
