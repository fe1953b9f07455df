import { launcherEnvSchema } from '@service-launcher/app-launcher-node';
import { TB } from '@service-launcher/service-framework-node/typebox';

export const exampleEnvSchema = TB.Object({
  ...launcherEnvSchema.properties,
  PROCESS_NAME: TB.String({ minLength: 1, default: 'example-service' }),

  GREETING: TB.String({ default: 'Hello' }),
  API_TOKEN: TB.Optional(TB.String({ minLength: 1 })),
  TRACING_ENABLED: TB.Boolean({ default: false }),
});

export type ExampleEnv = TB.Static<typeof exampleEnvSchema>;
