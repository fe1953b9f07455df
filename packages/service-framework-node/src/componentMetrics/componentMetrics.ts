import type {
  MetricConfigCounter,
  MetricConfigGauge,
  MetricConfigHistogram,
} from '../metrics/types.js';

const httpRequestsTotal: MetricConfigCounter<'method' | 'route' | 'status_code'> = {
  type: 'counter',
  name: 'http_requests_total',
  help: 'Total number of HTTP requests',
  labelNames: ['method', 'route', 'status_code'] as const,
};

const httpRequestDuration: MetricConfigHistogram<'method' | 'route'> = {
  type: 'histogram',
  name: 'http_request_duration_seconds',
  help: 'Duration of HTTP requests in seconds',
  labelNames: ['method', 'route'] as const,
  buckets: [0.001, 0.005, 0.01, 0.05, 0.1, 0.5, 1, 5],
};

export const httpServerMetrics = {
  httpRequestsTotal,
  httpRequestDuration,
};

const consulRegistrationsTotal: MetricConfigCounter<'outcome'> = {
  type: 'counter',
  name: 'consul_registrations_total',
  help: 'Consul service registrations by outcome',
  labelNames: ['outcome'] as const,
};

const startupDuration: MetricConfigHistogram<'runner'> = {
  type: 'histogram',
  name: 'launcher_startup_duration_seconds',
  help: 'Time from launcher creation until the port is handed to the runner',
  labelNames: ['runner'] as const,
  buckets: [0.05, 0.1, 0.5, 1, 2, 5, 10, 30],
};

const reservedPort: MetricConfigGauge = {
  type: 'gauge',
  name: 'launcher_reserved_port',
  help: 'Port reserved for the service',
};

export const launcherMetrics = {
  consulRegistrationsTotal,
  startupDuration,
  reservedPort,
};
