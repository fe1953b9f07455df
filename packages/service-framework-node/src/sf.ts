export * from './diagnostics/diagnostics.js';
export type * from './diagnostics/types.js';
export { createEnvContext, createEnvParser } from './environment/environment.js';
export { DefaultEnvSchemaType } from './environment/types.js';
export type {
  DefaultEnv,
  DefaultEnvContext,
  DefaultEnvSchema,
  EnvContext,
  EnvParserConfig,
} from './environment/types.js';
export { createHealthHandler, createHttpServer } from './httpServer/httpServer.js';
export type {
  HealthCheck,
  HealthCheckResult,
  HealthReport,
  HttpServerConfig,
  ServerListenTarget,
  ServiceContext,
} from './httpServer/types.js';
export { httpServerMetrics, launcherMetrics } from './componentMetrics/componentMetrics.js';
export { createMetricsContext } from './metrics/metrics.js';
export type {
  MetricConfigCounter,
  MetricConfigGauge,
  MetricConfigHistogram,
  MetricsConfig,
  MetricsContext,
  RegisteredMetrics,
} from './metrics/types.js';
export { startProcessLifecycle } from './processLifecycle/processLifecycle.js';
export type {
  ProcessLifecycleConfig,
  ProcessLifecycleContext,
  ProcessStartFn,
  ShutdownCallback,
  ShutdownConfiguration,
} from './processLifecycle/types.js';
