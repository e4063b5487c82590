import type { Counter, Histogram } from '@opentelemetry/api';
import { MeterProvider, PeriodicExportingMetricReader, type MetricReader } from '@opentelemetry/sdk-metrics';
import { resourceFromAttributes } from '@opentelemetry/resources';
import { ATTR_SERVICE_NAME, ATTR_SERVICE_VERSION } from '@opentelemetry/semantic-conventions';
// Using proto exporter for protobuf encoding
import { OTLPMetricExporter } from '@opentelemetry/exporter-metrics-otlp-proto';
import { PrometheusExporter } from '@opentelemetry/exporter-prometheus';
import type { MetricsConfig } from './config.js';
import { logger } from './logger.js';

const SERVICE_NAME = 'dev-toolbox';
const SERVICE_VERSION = '1.0.0';

interface Instruments {
  lookups: Counter;
  lookupDuration: Histogram;
  batches: Counter;
  batchSize: Histogram;
  batchFailures: Counter;
  batchDuration: Histogram;
}

let meterProvider: MeterProvider | null = null;
let instruments: Instruments | null = null;

function maskHeaders(headers: Record<string, string>): Record<string, string> {
  const masked: Record<string, string> = {};
  for (const [key, value] of Object.entries(headers)) {
    masked[key] = key.toLowerCase() === 'authorization' ? `${value.substring(0, 10)}... (length: ${value.length})` : value;
  }
  return masked;
}

function createReader(config: MetricsConfig): MetricReader {
  if (config.exporter === 'prometheus') {
    const port = config.prometheusPort;
    return new PrometheusExporter({ port, endpoint: '/metrics' }, () => {
      logger.info('Prometheus metrics endpoint started', { port, path: '/metrics' });
    });
  }

  logger.info('OpenTelemetry OTLP exporter configuration', {
    endpoint: config.endpoint,
    headers: maskHeaders(config.headers),
  });

  return new PeriodicExportingMetricReader({
    exporter: new OTLPMetricExporter({ url: config.endpoint, headers: config.headers }),
    exportIntervalMillis: config.exportIntervalMs,
  });
}

/**
 * Initialize OpenTelemetry metrics. Until this runs (or when disabled)
 * every record* function is a no-op.
 */
export function initializeOtelMetrics(config: MetricsConfig): void {
  if (!config.enabled) {
    logger.info('OpenTelemetry metrics disabled');
    return;
  }

  try {
    meterProvider = new MeterProvider({
      resource: resourceFromAttributes({
        [ATTR_SERVICE_NAME]: SERVICE_NAME,
        [ATTR_SERVICE_VERSION]: SERVICE_VERSION,
      }),
      readers: [createReader(config)],
    });

    const meter = meterProvider.getMeter(SERVICE_NAME, SERVICE_VERSION);
    instruments = {
      lookups: meter.createCounter('toolbox.lookups.total', {
        description: 'IP and DNS lookups, by kind and outcome',
      }),
      lookupDuration: meter.createHistogram('toolbox.lookup.duration', {
        description: 'Lookup duration in milliseconds',
        unit: 'ms',
      }),
      batches: meter.createCounter('toolbox.batches.total', {
        description: 'Bulk IP analysis requests',
      }),
      batchSize: meter.createHistogram('toolbox.batch.size', {
        description: 'IPs submitted per bulk analysis request',
      }),
      batchFailures: meter.createCounter('toolbox.batch.failed_items', {
        description: 'Bulk analysis items that failed',
      }),
      batchDuration: meter.createHistogram('toolbox.batch.duration', {
        description: 'Bulk analysis duration in milliseconds',
        unit: 'ms',
      }),
    };

    logger.info('OpenTelemetry metrics initialized', { exporter: config.exporter });
  } catch (error) {
    logger.error('Failed to initialize OpenTelemetry metrics', { error });
    meterProvider = null;
    instruments = null;
  }
}

/**
 * Flush and stop the exporters.
 */
export async function shutdownOtelMetrics(): Promise<void> {
  const provider = meterProvider;
  meterProvider = null;
  instruments = null;
  if (!provider) return;

  try {
    await provider.shutdown();
  } catch (error) {
    logger.error('Error shutting down OpenTelemetry metrics', { error });
  }
}

export function recordLookup(attributes: { kind: 'ip' | 'dns'; type?: string; success: boolean; durationMs: number }): void {
  if (!instruments) return;

  const labels: Record<string, string> = {
    'lookup.kind': attributes.kind,
    'lookup.outcome': attributes.success ? 'success' : 'failure',
  };
  if (attributes.type) labels['dns.record.type'] = attributes.type;

  instruments.lookups.add(1, labels);
  instruments.lookupDuration.record(attributes.durationMs, labels);
}

export function recordBatch(attributes: { size: number; failed: number; durationMs: number }): void {
  if (!instruments) return;

  instruments.batches.add(1);
  instruments.batchSize.record(attributes.size);
  instruments.batchFailures.add(attributes.failed);
  instruments.batchDuration.record(attributes.durationMs);
}
