import type { Counter, Gauge, Histogram, Registry } from 'prom-client';
import type { DefaultEnvContext } from '../environment/types.js';

interface MetricConfigBase<T extends string> {
  name: string;
  help: string;
  labelNames?: readonly T[];
}

export interface MetricConfigCounter<T extends string = string> extends MetricConfigBase<T> {
  type: 'counter';
}

export interface MetricConfigGauge<T extends string = string> extends MetricConfigBase<T> {
  type: 'gauge';
}

export interface MetricConfigHistogram<T extends string = string> extends MetricConfigBase<T> {
  type: 'histogram';
  buckets?: number[];
}

export type MetricConfig<T extends string = string> =
  | MetricConfigCounter<T>
  | MetricConfigGauge<T>
  | MetricConfigHistogram<T>;

export type MetricFromConfig<T> =
  T extends MetricConfigCounter<infer L>
    ? Counter<L>
    : T extends MetricConfigGauge<infer L>
      ? Gauge<L>
      : T extends MetricConfigHistogram<infer L>
        ? Histogram<L>
        : never;

export type MetricsFromConfigs<T extends Record<string, MetricConfig>> = {
  [K in keyof T]: MetricFromConfig<T[K]>;
};

export interface MetricsConfig<TMetricsConfigs extends Record<string, MetricConfig>> {
  envContext: DefaultEnvContext;
  enableDefaultMetrics?: boolean;
  prefix?: string;
  metrics?: TMetricsConfigs;
}

export interface MetricsContext<TMetrics = Record<string, never>> {
  getRegistry: () => Registry;
  createCounter: <T extends string>(config: MetricConfigCounter<T>) => Counter<T>;
  createGauge: <T extends string>(config: MetricConfigGauge<T>) => Gauge<T>;
  createHistogram: <T extends string>(config: MetricConfigHistogram<T>) => Histogram<T>;
  getMetricsAsString: () => Promise<string>;
  getMetrics: () => ReturnType<Registry['getMetricsAsArray']>;
  clearMetrics: () => void;
  metrics: TMetrics;
}

export type RegisteredMetrics<Ctx extends { metricsContext: MetricsContext<unknown> }> =
  Ctx['metricsContext']['metrics'];
