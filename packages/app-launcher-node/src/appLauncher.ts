import { createBlock } from '@service-launcher/console-blocks-node';
import {
  buildServiceRegistration,
  createConsulClient,
  createServiceId,
} from '@service-launcher/consul-client-node';
import { SF } from '@service-launcher/service-framework-node';
import { LauncherConfigurationError, LauncherError } from './launcherErrors.js';
import { reservePort } from './port.js';
import type { AppLauncher, AppLauncherConfig, LauncherContext } from './types.js';

export const HEADER_TITLE = 'App Launcher: Start setting up';
export const FOOTER_TITLE = 'App Launcher: The setup is completed successfully';

/**
 * Reserves the service port, draws the setup header and returns a launcher whose
 * `run()` hands the port over to the configured runner.
 */
export async function createAppLauncher(
  context: LauncherContext,
  config: AppLauncherConfig,
): Promise<AppLauncher> {
  const { envContext, diagnosticContext, metricsContext, processContext } = context;
  const env = envContext.config;
  const logger = diagnosticContext.logger;
  const startedAt = Date.now();

  const consulRegistrationsTotal = metricsContext.createCounter(
    SF.launcherMetrics.consulRegistrationsTotal,
  );
  const startupDuration = metricsContext.createHistogram(SF.launcherMetrics.startupDuration);
  const reservedPort = metricsContext.createGauge(SF.launcherMetrics.reservedPort);

  const serviceName = config.serviceName ?? env.PROCESS_NAME;
  const host = config.host ?? env.HOST;
  const reservation = await reservePort(config.port ?? env.PORT, host);
  const port = reservation.port;
  const serviceId = createServiceId(serviceName, port);
  const consulClient = config.consulClient ?? createConsulClient({ baseUrl: env.CONSUL_ADDRESS });
  const blockOptions = { output: config.console?.output, width: config.console?.width };

  reservedPort.set(port);
  processContext.onShutdown(async () => {
    await reservation.release();
  });

  let healthPath = config.healthPath;
  let running = false;

  createBlock({
    ...blockOptions,
    variant: 'header',
    lines: [HEADER_TITLE, `${host}:${port}/${serviceName}`],
  }).render();

  logger.info('Port reserved', { serviceName, host, port });

  return {
    serviceName,
    host,
    port,
    serviceId,

    get healthPath() {
      return healthPath;
    },

    setHealthPath(path) {
      healthPath = path;
    },

    async registerInConsul(options = {}) {
      const checkPath = options.checkPath ?? healthPath;
      if (!checkPath) {
        throw new LauncherConfigurationError(
          'Consul registration needs a health check path: add a health path or pass checkPath',
        );
      }

      const registration = buildServiceRegistration({
        serviceName,
        host,
        port,
        checkPath,
        checkInterval: options.checkInterval ?? env.CONSUL_CHECK_INTERVAL,
        checkTimeout: options.checkTimeout ?? env.CONSUL_CHECK_TIMEOUT,
      });

      try {
        await createBlock({
          ...blockOptions,
          lines: [
            'Register in Consul',
            `${registration.ID} at ${consulClient.baseUrl}`,
            `check ${registration.Check.HTTP} every ${registration.Check.Interval}`,
          ],
          action: () => consulClient.registerService(registration),
        }).renderAsync();
      } catch (error) {
        consulRegistrationsTotal.inc({ outcome: 'failure' });
        logger.error(error, 'Consul registration failed', { serviceId: registration.ID });
        throw error;
      }

      consulRegistrationsTotal.inc({ outcome: 'success' });
      logger.info('Service registered in Consul', {
        serviceId: registration.ID,
        check: registration.Check.HTTP,
      });

      const checkId = `service:${registration.ID}`;
      try {
        await consulClient.passCheck(checkId);
      } catch (error) {
        logger.warn('Could not mark Consul check as passing', {
          checkId,
          reason: error instanceof Error ? error.message : String(error),
        });
      }

      processContext.onShutdown(async () => {
        await consulClient.deregisterService(registration.ID);
        logger.info('Service deregistered from Consul', { serviceId: registration.ID });
      });

      return registration;
    },

    async run() {
      if (running) {
        throw new LauncherError(`Launcher for ${serviceId} is already running`);
      }
      running = true;

      await createBlock({
        ...blockOptions,
        variant: 'footer',
        lines: [FOOTER_TITLE, `${config.runner.name} run`],
        action: async () => {
          await reservation.release();
          startupDuration.observe({ runner: config.runner.name }, (Date.now() - startedAt) / 1000);
          logger.info('Handing port over to runner', { runner: config.runner.name, host, port });
          await config.runner.start({ host, port });
        },
      }).renderAsync();
    },
  };
}
