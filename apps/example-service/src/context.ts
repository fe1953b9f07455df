import { SF } from '@service-launcher/service-framework-node';
import { exampleEnvSchema, type ExampleEnv } from './environment.js';

export function createExampleContext(
  processContext: SF.ProcessLifecycleContext,
  customEnv?: Record<string, string | undefined>,
) {
  const envContext = SF.createEnvContext(exampleEnvSchema, { source: customEnv });

  const diagnosticContext = SF.createDiagnosticContext(envContext, {
    minimumSeverity: envContext.config.LOG_LEVEL,
    outputFormat: envContext.nodeEnv === 'production' ? 'json' : 'human',
  });

  const metricsContext = SF.createMetricsContext({
    envContext,
    enableDefaultMetrics: true,
    metrics: {},
  });

  return {
    envContext,
    diagnosticContext,
    metricsContext,
    processContext,
  };
}

export type ExampleContext = ReturnType<typeof createExampleContext>;

export type ExampleServiceContext = SF.ServiceContext<ExampleEnv, SF.RegisteredMetrics<ExampleContext>>;
