import type { FastifyReply, FastifyRequest } from 'fastify';
import type { DiagnosticContext, Logger } from '../diagnostics/types.js';
import type { EnvContext } from '../environment/types.js';
import type { MetricsContext } from '../metrics/types.js';
import type { ProcessLifecycleContext } from '../processLifecycle/types.js';

export interface ServiceContext<T = Record<string, unknown>, TMetrics = Record<string, never>> {
  readonly envContext: EnvContext<T>;
  readonly diagnosticContext: DiagnosticContext;
  readonly metricsContext: MetricsContext<TMetrics>;
  readonly processContext: ProcessLifecycleContext;
}

export interface HealthCheckResult {
  component: string;
  isHealthy: boolean;
}

export type HealthCheck = () => Promise<HealthCheckResult>;

export interface HealthReport {
  status: 'healthy' | 'unhealthy';
  uptime: number;
  timestamp: string;
  components: HealthCheckResult[];
}

export type HealthHandler = (request: FastifyRequest, reply: FastifyReply) => Promise<HealthReport>;

export interface HttpServerConfig {
  healthChecks?: HealthCheck[];
  healthPath?: string;
}

export interface ServerListenTarget {
  host: string;
  port: number;
}

declare module 'fastify' {
  interface FastifyRequest {
    logger: Logger;
    correlationId: string;
    ctx: ServiceContext<unknown, unknown>;
    startTime: number;
  }

  interface FastifyInstance {
    healthPath: string;
    startServer(target?: Partial<ServerListenTarget>): Promise<void>;
  }
}
