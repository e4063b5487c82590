// Runtime configuration, read once from the environment with defaults.
// Tests build their own with loadConfig({ ... }).

export type MetricsExporter = 'otlp' | 'prometheus';

export interface MetricsConfig {
  enabled: boolean;
  exporter: MetricsExporter;
  endpoint: string;
  headers: Record<string, string>;
  prometheusPort: number;
  exportIntervalMs: number;
}

export interface Config {
  port: number;
  host: string;
  isProduction: boolean;
  corsOrigin: string;
  trustedProxies: string[];
  ipinfo: {
    baseUrl: string;
    token?: string;
  };
  httpTimeoutMs: number;
  dnsTimeoutMs: number;
  requestTimeoutMs: number;
  batchConcurrency: number;
  metrics: MetricsConfig;
}

/** Largest batch `POST /api/ip/batch` accepts. */
export const MAX_BATCH_IPS = 100;

function envInt(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = env[name];
  if (!raw) return fallback;
  const n = Number(raw);
  return Number.isInteger(n) && n > 0 ? n : fallback;
}

function envList(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

/**
 * Parse `key=value,key2=value2` (the OTEL_EXPORTER_OTLP_HEADERS format).
 */
function envHeaders(value: string | undefined): Record<string, string> {
  const headers: Record<string, string> = {};
  for (const pair of envList(value)) {
    const idx = pair.indexOf('=');
    if (idx <= 0) continue;
    headers[pair.slice(0, idx).trim()] = pair.slice(idx + 1).trim();
  }
  return headers;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  return {
    port: envInt(env, 'PORT', envInt(env, 'SERVER_PORT', 8087)),
    host: env.HOST || '0.0.0.0',
    isProduction: env.NODE_ENV === 'production',
    corsOrigin: env.CORS_ORIGIN || '*',
    trustedProxies: envList(env.TRUSTED_PROXIES),
    ipinfo: {
      baseUrl: (env.IPINFO_BASE_URL || 'https://ipinfo.io').replace(/\/+$/, ''),
      token: env.IPINFO_TOKEN || undefined,
    },
    httpTimeoutMs: envInt(env, 'HTTP_TIMEOUT_MS', 10_000),
    dnsTimeoutMs: envInt(env, 'DNS_TIMEOUT_MS', 5_000),
    requestTimeoutMs: envInt(env, 'REQUEST_TIMEOUT_MS', 30_000),
    batchConcurrency: envInt(env, 'BATCH_CONCURRENCY', 10),
    metrics: {
      enabled: env.OTEL_METRICS_ENABLED === 'true',
      exporter: env.OTEL_METRICS_EXPORTER === 'otlp' ? 'otlp' : 'prometheus',
      endpoint: env.OTEL_EXPORTER_OTLP_METRICS_ENDPOINT || 'http://localhost:4318/v1/metrics',
      headers: envHeaders(env.OTEL_EXPORTER_OTLP_HEADERS),
      prometheusPort: envInt(env, 'PROMETHEUS_PORT', 9464),
      exportIntervalMs: envInt(env, 'OTEL_METRIC_EXPORT_INTERVAL', 60_000),
    },
  };
}

export const config = loadConfig();
