import { Counter, Gauge, Histogram, Registry, collectDefaultMetrics } from 'prom-client';
import type {
  MetricConfig,
  MetricConfigCounter,
  MetricConfigGauge,
  MetricConfigHistogram,
  MetricsConfig,
  MetricsContext,
  MetricsFromConfigs,
} from './types.js';

const defaultHistogramBuckets = [0.001, 0.005, 0.01, 0.05, 0.1, 0.5, 1, 5, 10];

const metricNamePattern = /^[a-zA-Z_:][a-zA-Z0-9_:]*$/;
const labelNamePattern = /^[a-zA-Z_][a-zA-Z0-9_]*$/;

export const normalizeServiceName = (serviceName: string): string =>
  serviceName
    .toLowerCase()
    .replace(/[^a-z0-9_]/g, '_')
    .replace(/_+/g, '_')
    .replace(/^_|_$/g, '');

function validateMetricConfig({ name, labelNames = [] }: MetricConfig): void {
  if (!metricNamePattern.test(name)) {
    throw new Error(
      `Invalid metric name '${name}'. Metric names must match pattern: [a-zA-Z_:][a-zA-Z0-9_:]*`,
    );
  }

  for (const label of labelNames) {
    if (!labelNamePattern.test(label)) {
      throw new Error(
        `Invalid label name '${label}'. Label names must match pattern: [a-zA-Z_][a-zA-Z0-9_]*`,
      );
    }
    if (label.startsWith('__')) {
      throw new Error(`Label name '${label}' is reserved. Label names cannot start with '__'`);
    }
  }
}

export function createMetricsContext<
  TMetricsConfigs extends Record<string, MetricConfig> = Record<never, MetricConfig>,
>(config: MetricsConfig<TMetricsConfigs>): MetricsContext<MetricsFromConfigs<TMetricsConfigs>> {
  const registry = new Registry();

  const serviceName = normalizeServiceName(config.envContext.config.PROCESS_NAME);
  const fullPrefix = config.prefix ? `${serviceName}_${config.prefix}` : `${serviceName}_`;

  if (config.enableDefaultMetrics) {
    collectDefaultMetrics({ register: registry, prefix: fullPrefix });
  }

  function createCounter<T extends string>(metricConfig: MetricConfigCounter<T>): Counter<T> {
    validateMetricConfig(metricConfig);

    return new Counter<T>({
      name: `${fullPrefix}${metricConfig.name}`,
      help: metricConfig.help,
      labelNames: [...(metricConfig.labelNames ?? [])],
      registers: [registry],
    });
  }

  function createGauge<T extends string>(metricConfig: MetricConfigGauge<T>): Gauge<T> {
    validateMetricConfig(metricConfig);

    return new Gauge<T>({
      name: `${fullPrefix}${metricConfig.name}`,
      help: metricConfig.help,
      labelNames: [...(metricConfig.labelNames ?? [])],
      registers: [registry],
    });
  }

  function createHistogram<T extends string>(metricConfig: MetricConfigHistogram<T>): Histogram<T> {
    validateMetricConfig(metricConfig);

    return new Histogram<T>({
      name: `${fullPrefix}${metricConfig.name}`,
      help: metricConfig.help,
      labelNames: [...(metricConfig.labelNames ?? [])],
      buckets: metricConfig.buckets ?? defaultHistogramBuckets,
      registers: [registry],
    });
  }

  function createMetricFromConfig(metricConfig: MetricConfig) {
    switch (metricConfig.type) {
      case 'counter':
        return createCounter(metricConfig);
      case 'gauge':
        return createGauge(metricConfig);
      case 'histogram':
        return createHistogram(metricConfig);
    }
  }

  const metricConfigs: Record<string, MetricConfig> = config.metrics ?? {};
  const metrics = Object.fromEntries(
    Object.entries(metricConfigs).map(([key, metricConfig]) => [
      key,
      createMetricFromConfig(metricConfig),
    ]),
  ) as MetricsFromConfigs<TMetricsConfigs>;

  return {
    getRegistry: () => registry,
    createCounter,
    createGauge,
    createHistogram,
    getMetricsAsString: () => registry.metrics(),
    getMetrics: () => registry.getMetricsAsArray(),
    clearMetrics: () => registry.clear(),
    metrics,
  };
}
