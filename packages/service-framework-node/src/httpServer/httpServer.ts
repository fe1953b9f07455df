import Fastify, { type FastifyInstance } from 'fastify';
import { httpServerMetrics } from '../componentMetrics/componentMetrics.js';
import type {
  HealthCheckResult,
  HealthHandler,
  HealthReport,
  HttpServerConfig,
  ServerListenTarget,
  ServiceContext,
} from './types.js';

interface HttpServerEnv {
  PORT?: number;
  NODE_ENV?: string;
}

const defaultHealthPath = '/health';
const defaultHost = '0.0.0.0';

export function createHealthHandler(
  context: ServiceContext<unknown, unknown>,
  config: HttpServerConfig = {},
): HealthHandler {
  const healthChecks = config.healthChecks ?? [];

  return async (request, reply) => {
    const report: HealthReport = {
      status: 'healthy',
      uptime: process.uptime(),
      timestamp: new Date().toISOString(),
      components: [],
    };

    if (context.processContext.isShuttingDown()) {
      reply.code(503);
      return { ...report, status: 'unhealthy' };
    }

    let results: HealthCheckResult[];
    try {
      results = await Promise.all(healthChecks.map((check) => check()));
    } catch (error) {
      request.logger.error(error, 'Health check error');
      reply.code(503);
      return { ...report, status: 'unhealthy' };
    }

    const unhealthyComponents = results
      .filter((result) => !result.isHealthy)
      .map((result) => result.component);

    if (unhealthyComponents.length > 0) {
      request.logger.warn('Health check failed', { unhealthyComponents, results });
      reply.code(503);
      return { ...report, status: 'unhealthy', components: results };
    }

    return { ...report, components: results };
  };
}

export function createHttpServer<T extends HttpServerEnv, TMetrics>(
  context: ServiceContext<T, TMetrics>,
  config: HttpServerConfig = {},
): FastifyInstance {
  const fastify = Fastify({
    logger: false,
    requestIdLogLabel: 'correlationId',
    requestIdHeader: 'x-correlation-id',
    genReqId: () => context.diagnosticContext.correlationIdGenerator.generateRootId(),
  });

  const httpRequestsTotal = context.metricsContext.createCounter(
    httpServerMetrics.httpRequestsTotal,
  );
  const httpRequestDuration = context.metricsContext.createHistogram(
    httpServerMetrics.httpRequestDuration,
  );

  fastify.decorate('healthPath', config.healthPath ?? defaultHealthPath);
  fastify.decorateRequest('ctx');
  fastify.decorateRequest('logger');
  fastify.decorateRequest('correlationId');
  fastify.decorateRequest('startTime');

  fastify.addHook('onRequest', async (request) => {
    const logger = context.diagnosticContext.createChildLogger(request.id);

    request.ctx = context;
    request.correlationId = request.id;
    request.logger = logger;
    request.startTime = Date.now();

    logger.info('Request received', {
      method: request.method,
      url: request.url,
    });
  });

  fastify.addHook('onResponse', async (request, reply) => {
    const duration = Date.now() - request.startTime;
    const route = request.routeOptions.url ?? request.url;

    request.logger.info('Request completed', {
      method: request.method,
      url: request.url,
      statusCode: reply.statusCode,
      duration_ms: duration,
    });

    httpRequestsTotal.inc({
      method: request.method,
      route,
      status_code: String(reply.statusCode),
    });
    httpRequestDuration.observe({ method: request.method, route }, duration / 1000);
  });

  fastify.get('/metrics', async (_request, reply) => {
    reply.type(context.metricsContext.getRegistry().contentType);
    return context.metricsContext.getMetricsAsString();
  });

  fastify.get(fastify.healthPath, createHealthHandler(context, config));

  context.processContext.onShutdown(async () => {
    await fastify.close();
  });

  fastify.decorate(
    'startServer',
    async function (this: FastifyInstance, target: Partial<ServerListenTarget> = {}) {
      const listenTarget: ServerListenTarget = {
        host: target.host ?? defaultHost,
        port: target.port ?? context.envContext.config.PORT ?? 0,
      };

      await this.listen(listenTarget);

      context.diagnosticContext.logger.info('Server started', {
        ...listenTarget,
        environment: context.envContext.config.NODE_ENV ?? context.envContext.nodeEnv,
      });
    },
  );

  return fastify;
}
