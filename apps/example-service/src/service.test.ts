import { createMemoryOutput } from '@service-launcher/console-blocks-node/test';
import type { ConsulClient } from '@service-launcher/consul-client-node';
import {
  createMockDiagnosticsContext,
  createMockEnvContext,
  createMockMetricsContext,
  createMockProcessContext,
} from '@service-launcher/service-framework-node/test';
import { afterEach, describe, expect, it, vi } from 'vitest';
import type { ExampleServiceContext } from './context.js';
import type { ExampleEnv } from './environment.js';
import { createExampleService } from './service.js';

function createTestContext(env: Partial<ExampleEnv> = {}) {
  const context = {
    envContext: createMockEnvContext<ExampleEnv>({
      PROCESS_NAME: 'example-service',
      NODE_ENV: 'test',
      HOST: '127.0.0.1',
      PORT: 0,
      LOG_LEVEL: 'info',
      CONSUL_ENABLED: false,
      CONSUL_ADDRESS: 'http://consul.test:8500',
      CONSUL_CHECK_INTERVAL: '30s',
      CONSUL_CHECK_TIMEOUT: '3s',
      GREETING: 'Hello',
      TRACING_ENABLED: false,
      ...env,
    }),
    diagnosticContext: createMockDiagnosticsContext(),
    metricsContext: createMockMetricsContext(),
    processContext: createMockProcessContext(),
  } satisfies ExampleServiceContext;

  return context;
}

function createFakeConsulClient(): ConsulClient {
  return {
    baseUrl: 'http://consul.test:8500',
    registerService: vi.fn(async () => {}),
    passCheck: vi.fn(async () => {}),
    deregisterService: vi.fn(async () => {}),
  };
}

describe('createExampleService', () => {
  let context: ReturnType<typeof createTestContext>;

  afterEach(async () => {
    await context.processContext.shutdown();
  });

  it('greets by name', async () => {
    context = createTestContext({ GREETING: 'Hi' });
    const launcher = await createExampleService(context, { console: { output: createMemoryOutput() } });

    const named = await launcher.app.inject({ method: 'GET', url: '/hello?name=Ada' });
    const anonymous = await launcher.app.inject({ method: 'GET', url: '/hello' });

    expect(named.json()).toEqual({ message: 'Hi, Ada!' });
    expect(anonymous.json()).toEqual({ message: 'Hi, world!' });
  });

  it('serves the health path used for Consul', async () => {
    context = createTestContext();
    const launcher = await createExampleService(context, { console: { output: createMemoryOutput() } });

    const response = await launcher.app.inject({ method: 'GET', url: '/health' });

    expect(launcher.healthPath).toBe('/health');
    expect(response.statusCode).toBe(200);
  });

  it('adds the API token to responses except health and metrics', async () => {
    context = createTestContext({ API_TOKEN: 'test-token' });
    const launcher = await createExampleService(context, { console: { output: createMemoryOutput() } });

    const hello = await launcher.app.inject({ method: 'GET', url: '/hello' });
    const health = await launcher.app.inject({ method: 'GET', url: '/health' });

    expect(hello.headers.authorization).toBe('test-token');
    expect(health.headers.authorization).toBeUndefined();
  });

  it('registers in Consul when enabled', async () => {
    context = createTestContext({ CONSUL_ENABLED: true });
    const consulClient = createFakeConsulClient();

    const launcher = await createExampleService(context, {
      consulClient,
      console: { output: createMemoryOutput() },
    });

    expect(consulClient.registerService).toHaveBeenCalledWith(
      expect.objectContaining({
        ID: `example-service:${launcher.port}`,
        Check: expect.objectContaining({ HTTP: `http://127.0.0.1:${launcher.port}/health` }),
      }),
    );
  });

  it('skips Consul when disabled', async () => {
    context = createTestContext();
    const consulClient = createFakeConsulClient();

    await createExampleService(context, { consulClient, console: { output: createMemoryOutput() } });

    expect(consulClient.registerService).not.toHaveBeenCalled();
  });
});
