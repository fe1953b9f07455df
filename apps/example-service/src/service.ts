import { trace } from '@opentelemetry/api';
import {
  createFastifyAppLauncher,
  createOpenTelemetryTracingProvider,
  type ConsoleConfig,
  type FastifyAppLauncher,
} from '@service-launcher/app-launcher-node';
import type { ConsulClient } from '@service-launcher/consul-client-node';
import { TB } from '@service-launcher/service-framework-node/typebox';
import { Value } from '@sinclair/typebox/value';
import type { ExampleServiceContext } from './context.js';

const helloQuerySchema = TB.Object({
  name: TB.Optional(TB.String({ minLength: 1, maxLength: 64 })),
});

export interface ExampleServiceOptions {
  consulClient?: ConsulClient;
  console?: ConsoleConfig;
}

export async function createExampleService(
  context: ExampleServiceContext,
  options: ExampleServiceOptions = {},
): Promise<FastifyAppLauncher> {
  const env = context.envContext.config;

  const launcher = await createFastifyAppLauncher(context, {
    consulClient: options.consulClient,
    console: options.console,
  });

  if (env.TRACING_ENABLED) {
    launcher.addTracing(
      createOpenTelemetryTracingProvider({ tracer: trace.getTracer(env.PROCESS_NAME) }),
    );
  }

  const apiToken = env.API_TOKEN;
  if (apiToken) {
    launcher.addTokenMiddleware(() => apiToken, [launcher.app.healthPath, '/metrics']);
  }

  launcher.addRoute({
    method: 'GET',
    url: '/hello',
    schema: { querystring: helloQuerySchema },
    handler: async (request) => {
      const name = Value.Check(helloQuerySchema, request.query) ? request.query.name : undefined;
      return { message: `${env.GREETING}, ${name ?? 'world'}!` };
    },
  });
  launcher.addConsulHealthPath();
  await launcher.includeRouter();

  if (env.CONSUL_ENABLED) {
    await launcher.registerInConsul();
  }

  return launcher;
}
