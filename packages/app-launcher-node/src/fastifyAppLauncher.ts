import { createBlock, type BlockLine } from '@service-launcher/console-blocks-node';
import { SF } from '@service-launcher/service-framework-node';
import type {
  FastifyError,
  FastifyInstance,
  FastifyReply,
  FastifyRequest,
  RouteHandlerMethod,
  RouteOptions,
} from 'fastify';
import { createAppLauncher } from './appLauncher.js';
import { createFastifyRunner } from './runners.js';
import type { RequestSpan, TracingProvider } from './tracing.js';
import type { AppLauncher, AppLauncherConfig, LauncherContext } from './types.js';

export type TokenProvider = () => Promise<string> | string;

export type ValidationErrorHandler = (
  error: FastifyError,
  request: FastifyRequest,
  reply: FastifyReply,
) => unknown;

export interface TracingOptions {
  handleValidationErrors?: boolean;
  validationErrorHandler?: ValidationErrorHandler;
}

export interface RouterOptions {
  prefix?: string;
}

export interface FastifyAppLauncherConfig extends Omit<AppLauncherConfig, 'runner'> {
  healthChecks?: SF.HealthCheck[];
}

export interface FastifyAppLauncher extends AppLauncher {
  readonly app: FastifyInstance;
  addRoute(route: RouteOptions): void;
  /** Sets the `Authorization` response header on every path not listed in `excludedPaths`. */
  addTokenMiddleware(getToken: TokenProvider, excludedPaths?: readonly string[]): void;
  addTracing(provider: TracingProvider, options?: TracingOptions): void;
  addConsulHealthPath(path?: string, handler?: RouteHandlerMethod): void;
  /**
   * Registers the queued routes as one plugin. Hooks and error handlers added to the app
   * afterwards do not reach these routes.
   */
  includeRouter(options?: RouterOptions): Promise<void>;
}

export const DEFAULT_HEALTH_PATH = '/health';

function describeRoute(route: RouteOptions): string {
  const method = Array.isArray(route.method) ? route.method.join(',') : route.method;
  return `${method} ${route.url}`;
}

export function createValidationErrorHandler(provider: TracingProvider): ValidationErrorHandler {
  return (error, request, reply) => {
    const span = provider.startRequestSpan('validation error', {
      'http.url': request.url,
      'http.method': request.method,
    });
    span.recordError(error.message);
    span.end(422);

    return reply.code(422).send({ detail: error.validation });
  };
}

export async function createFastifyAppLauncher(
  context: LauncherContext,
  config: FastifyAppLauncherConfig = {},
): Promise<FastifyAppLauncher> {
  const logger = context.diagnosticContext.logger;
  const app = SF.createHttpServer(context, {
    healthChecks: config.healthChecks,
    healthPath: config.healthPath,
  });
  const healthHandler = SF.createHealthHandler(context, { healthChecks: config.healthChecks });
  const launcher = await createAppLauncher(context, { ...config, runner: createFastifyRunner(app) });

  const blockOptions = { output: config.console?.output, width: config.console?.width };
  const step = (lines: BlockLine[], action: () => void) => {
    createBlock({ ...blockOptions, lines, action }).render();
  };

  let pendingRoutes: RouteOptions[] = [];

  return {
    app,
    serviceName: launcher.serviceName,
    host: launcher.host,
    port: launcher.port,
    serviceId: launcher.serviceId,

    get healthPath() {
      return launcher.healthPath;
    },

    setHealthPath: (path) => launcher.setHealthPath(path),
    registerInConsul: (options) => launcher.registerInConsul(options),

    addRoute(route) {
      step([`Add route ${describeRoute(route)}`], () => {
        pendingRoutes.push(route);
      });
    },

    addTokenMiddleware(getToken, excludedPaths = []) {
      const excluded = new Set(excludedPaths);
      const lines = ['Add token middleware'];
      if (excluded.size > 0) {
        lines.push(`excluded: ${[...excluded].join(', ')}`);
      }

      step(lines, () => {
        app.addHook('onSend', async (request, reply, payload) => {
          const [path = request.url] = request.url.split('?');
          if (!excluded.has(path)) {
            reply.header('Authorization', await getToken());
          }
          return payload;
        });
      });
    },

    addTracing(provider, options = {}) {
      const handleValidationErrors = options.handleValidationErrors ?? true;
      const lines = ['Add tracing'];
      if (handleValidationErrors) {
        lines.push('with validation error handler');
      }

      step(lines, () => {
        const spans = new WeakMap<FastifyRequest, RequestSpan>();

        app.addHook('onRequest', async (request) => {
          const route = request.routeOptions.url ?? request.url;
          spans.set(
            request,
            provider.startRequestSpan(`${request.method} ${route}`, {
              'http.method': request.method,
              'http.url': request.url,
              'http.correlation_id': request.id,
            }),
          );
        });

        app.addHook('onError', async (request, _reply, error) => {
          spans.get(request)?.recordError(error.message);
        });

        app.addHook('onResponse', async (request, reply) => {
          spans.get(request)?.end(reply.statusCode);
          spans.delete(request);
        });

        if (handleValidationErrors) {
          const handleValidationError =
            options.validationErrorHandler ?? createValidationErrorHandler(provider);

          app.setErrorHandler((error: FastifyError, request, reply) => {
            if (error.validation) {
              return handleValidationError(error, request, reply);
            }
            return reply.send(error);
          });
        }
      });
    },

    addConsulHealthPath(path = DEFAULT_HEALTH_PATH, handler) {
      step([`Add Consul health path ${path}`], () => {
        launcher.setHealthPath(path);

        if (path === app.healthPath) {
          if (handler) {
            logger.warn('Health path is already served, custom handler ignored', { path });
          }
          return;
        }

        pendingRoutes.push({ method: 'GET', url: path, handler: handler ?? healthHandler });
      });
    },

    async includeRouter(options = {}) {
      const prefix = options.prefix ?? '';
      const routes = pendingRoutes;
      pendingRoutes = [];

      await createBlock({
        ...blockOptions,
        lines: [prefix ? `Include router at ${prefix}` : 'Include router', ...routes.map(describeRoute)],
        action: async () => {
          await app.register(
            async (router) => {
              for (const route of routes) {
                router.route(route);
              }
            },
            { prefix },
          );
        },
      }).renderAsync();
    },

    async run() {
      if (pendingRoutes.length > 0) {
        logger.warn('Routes were added but never included', {
          routes: pendingRoutes.map(describeRoute),
        });
      }
      await launcher.run();
    },
  };
}
