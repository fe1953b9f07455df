import { afterEach, beforeEach, describe, expect, it, vi, type MockInstance } from 'vitest';
import { createDiagnosticContext } from '../diagnostics/diagnostics.js';
import type { DefaultEnvContext } from '../environment/types.js';
import { startProcessLifecycle } from './processLifecycle.js';
import type { ProcessStartFn } from './types.js';

function createTestEnvContext(): DefaultEnvContext {
  return {
    config: { PROCESS_NAME: 'orders-api' },
    nodeEnv: 'test',
  };
}

const startWithDefaults: ProcessStartFn = async () => {
  const envContext = createTestEnvContext();
  return { envContext, diagnosticContext: createDiagnosticContext(envContext) };
};

type ProcessListener = (...args: unknown[]) => unknown;

describe('startProcessLifecycle', () => {
  let processExitSpy: MockInstance<typeof process.exit>;
  let processOnSpy: MockInstance<typeof process.on>;
  let consoleLogSpy: MockInstance<typeof console.log>;
  let consoleErrorSpy: MockInstance<typeof console.error>;

  const findListener = (event: string): ProcessListener => {
    const call = [...processOnSpy.mock.calls].reverse().find((args) => args[0] === event);
    const listener: unknown = call?.[1];
    if (typeof listener !== 'function') {
      throw new Error(`No listener registered for ${event}`);
    }
    return (...args: unknown[]) => Reflect.apply(listener, process, args);
  };

  beforeEach(() => {
    processExitSpy = vi.spyOn(process, 'exit').mockImplementation((() => {}) as never);
    processOnSpy = vi.spyOn(process, 'on');
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    consoleErrorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    processExitSpy.mockRestore();
    processOnSpy.mockRestore();
    consoleLogSpy.mockRestore();
    consoleErrorSpy.mockRestore();
    vi.useRealTimers();
  });

  it('registers signal, rejection, exception and warning handlers', async () => {
    const context = await startProcessLifecycle(startWithDefaults);

    const events = ['SIGTERM', 'SIGINT', 'SIGUSR2', 'unhandledRejection', 'uncaughtException', 'warning'];
    for (const event of events) {
      expect(processOnSpy).toHaveBeenCalledWith(event, expect.any(Function));
    }

    await context.shutdown();
  });

  it('runs shutdown callbacks in registration order and exits with 0', async () => {
    const executionOrder: number[] = [];

    const context = await startProcessLifecycle(async (ctx) => {
      ctx.onShutdown(() => {
        executionOrder.push(1);
      });
      ctx.onShutdown(async () => {
        executionOrder.push(2);
      });
      return startWithDefaults(ctx);
    });

    await context.shutdown();

    expect(executionOrder).toEqual([1, 2]);
    expect(context.isShuttingDown()).toBe(true);
    expect(processExitSpy).toHaveBeenCalledWith(0);
  });

  it('keeps running callbacks after one fails', async () => {
    let secondCallbackExecuted = false;

    const context = await startProcessLifecycle(async (ctx) => {
      ctx.onShutdown(() => {
        throw new Error('Deregistration failed');
      });
      ctx.onShutdown(() => {
        secondCallbackExecuted = true;
      });
      return startWithDefaults(ctx);
    });

    await context.shutdown();

    expect(secondCallbackExecuted).toBe(true);
    const errorLogs = consoleErrorSpy.mock.calls.map((call) => String(call[0]));
    expect(errorLogs.some((log) => log.includes('Deregistration failed'))).toBe(true);
  });

  it('times out callbacks that never settle', async () => {
    vi.useFakeTimers();
    let secondCallbackExecuted = false;

    const context = await startProcessLifecycle(
      async (ctx) => {
        ctx.onShutdown(() => new Promise<void>(() => {}));
        ctx.onShutdown(() => {
          secondCallbackExecuted = true;
        });
        return startWithDefaults(ctx);
      },
      { shutdownConfiguration: { callbackTimeout: 100, totalTimeout: 1000 } },
    );

    const shutdownPromise = context.shutdown();
    await vi.advanceTimersByTimeAsync(100);
    await shutdownPromise;

    expect(secondCallbackExecuted).toBe(true);
    expect(processExitSpy).toHaveBeenCalledWith(0);
    expect(processExitSpy).not.toHaveBeenCalledWith(1);
  });

  it('forces exit when the total timeout is exceeded', async () => {
    vi.useFakeTimers();

    const context = await startProcessLifecycle(
      async (ctx) => {
        ctx.onShutdown(() => new Promise<void>(() => {}));
        return startWithDefaults(ctx);
      },
      { shutdownConfiguration: { callbackTimeout: 5000, totalTimeout: 200 } },
    );

    const shutdownPromise = context.shutdown();
    await vi.advanceTimersByTimeAsync(200);

    expect(processExitSpy).toHaveBeenCalledWith(1);

    await vi.advanceTimersByTimeAsync(5000);
    await shutdownPromise;
  });

  it('shuts down gracefully on SIGTERM', async () => {
    let callbackExecuted = false;

    await startProcessLifecycle(async (ctx) => {
      ctx.onShutdown(() => {
        callbackExecuted = true;
      });
      return startWithDefaults(ctx);
    });

    await findListener('SIGTERM')('SIGTERM');

    expect(callbackExecuted).toBe(true);
    expect(processExitSpy).toHaveBeenCalledWith(0);
  });

  it('logs unhandled rejections as fatal and shuts down', async () => {
    await startProcessLifecycle(startWithDefaults);

    await findListener('unhandledRejection')(new Error('Lost promise'), Promise.resolve());

    const errorLogs = consoleErrorSpy.mock.calls.map((call) => String(call[0]));
    expect(errorLogs.some((log) => log.includes('Unhandled promise rejection detected'))).toBe(true);
    expect(processExitSpy).toHaveBeenCalledWith(0);
  });

  it('logs uncaught exceptions as fatal and shuts down', async () => {
    await startProcessLifecycle(startWithDefaults);

    await findListener('uncaughtException')(new Error('Boom'));

    const errorLogs = consoleErrorSpy.mock.calls.map((call) => String(call[0]));
    expect(errorLogs.some((log) => log.includes('Boom'))).toBe(true);
    expect(processExitSpy).toHaveBeenCalledWith(0);
  });

  it('logs process warnings without shutting down', async () => {
    const context = await startProcessLifecycle(startWithDefaults);

    findListener('warning')(new Error('Deprecated API'));

    expect(context.isShuttingDown()).toBe(false);
    const logs = consoleLogSpy.mock.calls.map((call) => String(call[0]));
    expect(logs.some((log) => log.includes('Process warning emitted'))).toBe(true);

    await context.shutdown();
  });

  it('runs shutdown only once', async () => {
    const callback = vi.fn();

    const context = await startProcessLifecycle(async (ctx) => {
      ctx.onShutdown(callback);
      return startWithDefaults(ctx);
    });

    await context.shutdown();
    await context.shutdown();

    expect(callback).toHaveBeenCalledTimes(1);
  });

  it('restarts by stopping the current run and starting again', async () => {
    const startFn = vi.fn(startWithDefaults);

    const context = await startProcessLifecycle(startFn);
    await context.restart();

    expect(startFn).toHaveBeenCalledTimes(2);
    expect(context.isShuttingDown()).toBe(false);
    expect(processExitSpy).not.toHaveBeenCalled();

    await context.shutdown();
  });
});
