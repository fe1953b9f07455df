export { createAppLauncher, FOOTER_TITLE, HEADER_TITLE } from './appLauncher.js';
export { launcherEnvSchema, logLevelSchema } from './environment.js';
export type { LauncherEnv } from './environment.js';
export {
  createFastifyAppLauncher,
  createValidationErrorHandler,
  DEFAULT_HEALTH_PATH,
} from './fastifyAppLauncher.js';
export type {
  FastifyAppLauncher,
  FastifyAppLauncherConfig,
  RouterOptions,
  TokenProvider,
  TracingOptions,
  ValidationErrorHandler,
} from './fastifyAppLauncher.js';
export { LauncherConfigurationError, LauncherError } from './launcherErrors.js';
export { reservePort } from './port.js';
export type { PortReservation } from './port.js';
export { buildSubprocessArgs, createFastifyRunner, createSubprocessRunner } from './runners.js';
export type {
  ServerRunner,
  ServerTarget,
  SpawnedProcess,
  SpawnProcess,
  SubprocessRunnerConfig,
} from './runners.js';
export { createOpenTelemetryTracingProvider } from './tracing.js';
export type {
  OpenTelemetryTracingConfig,
  RequestSpan,
  SpanAttributes,
  SpanAttributeValue,
  SpanTracer,
  TracerSpan,
  TracingProvider,
} from './tracing.js';
export type {
  AppLauncher,
  AppLauncherConfig,
  ConsoleConfig,
  ConsulRegistrationOptions,
  LauncherContext,
} from './types.js';
