import type { ConsulClient } from '@service-launcher/consul-client-node';
import {
  createMockDiagnosticsContext,
  createMockEnvContext,
  createMockMetricsContext,
  createMockProcessContext,
} from '@service-launcher/service-framework-node/test';
import { vi } from 'vitest';
import type { LauncherEnv } from '../environment.js';
import type { ServerRunner } from '../runners.js';
import type { SpanAttributes } from '../tracing.js';
import type { LauncherContext } from '../types.js';

export function createTestLauncherContext(env: Partial<LauncherEnv> = {}) {
  const context = {
    envContext: createMockEnvContext<LauncherEnv>({
      PROCESS_NAME: 'orders',
      NODE_ENV: 'test',
      HOST: '127.0.0.1',
      PORT: 0,
      LOG_LEVEL: 'info',
      CONSUL_ENABLED: false,
      CONSUL_ADDRESS: 'http://consul.test:8500',
      CONSUL_CHECK_INTERVAL: '30s',
      CONSUL_CHECK_TIMEOUT: '3s',
      ...env,
    }),
    diagnosticContext: createMockDiagnosticsContext(),
    metricsContext: createMockMetricsContext(),
    processContext: createMockProcessContext(),
  } satisfies LauncherContext;

  return context;
}

export function createFakeConsulClient(overrides: Partial<ConsulClient> = {}): ConsulClient {
  return {
    baseUrl: 'http://consul.test:8500',
    registerService: vi.fn(async () => {}),
    passCheck: vi.fn(async () => {}),
    deregisterService: vi.fn(async () => {}),
    ...overrides,
  };
}

export function createFakeRunner(start: ServerRunner['start'] = async () => {}) {
  return {
    name: 'Fake',
    start: vi.fn(start),
  } satisfies ServerRunner;
}

export function createFakeTracingProvider() {
  const span = {
    setAttribute: vi.fn(),
    recordError: vi.fn(),
    end: vi.fn(),
  };
  const provider = {
    startRequestSpan: vi.fn((_name: string, _attributes?: SpanAttributes) => span),
  };
  return { provider, span };
}
