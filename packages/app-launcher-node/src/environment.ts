import { TB } from '@service-launcher/service-framework-node/typebox';

const durationPattern = '^[0-9]+(ms|s|m|h)$';

export const logLevelSchema = TB.Union(
  [TB.Literal('debug'), TB.Literal('info'), TB.Literal('warn'), TB.Literal('error'), TB.Literal('fatal')],
  { default: 'info' },
);

export const launcherEnvSchema = TB.Object({
  PROCESS_NAME: TB.String({ minLength: 1 }),
  NODE_ENV: TB.String({ default: 'development' }),
  HOST: TB.String({ default: '127.0.0.1' }),
  // 0 lets the OS pick a free port
  PORT: TB.Integer({ default: 0, minimum: 0, maximum: 65535 }),
  LOG_LEVEL: logLevelSchema,

  CONSUL_ENABLED: TB.Boolean({ default: false }),
  CONSUL_ADDRESS: TB.String({ default: 'http://localhost:8500' }),
  CONSUL_CHECK_INTERVAL: TB.String({ default: '30s', pattern: durationPattern }),
  CONSUL_CHECK_TIMEOUT: TB.String({ default: '3s', pattern: durationPattern }),
});

export type LauncherEnv = TB.Static<typeof launcherEnvSchema>;
