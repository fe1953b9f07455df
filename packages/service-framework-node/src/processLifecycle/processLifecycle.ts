import { createDiagnosticContext } from '../diagnostics/diagnostics.js';
import type { DiagnosticContext, Logger } from '../diagnostics/types.js';
import type {
  ProcessLifecycleConfig,
  ProcessLifecycleContext,
  ProcessStartFn,
  ShutdownCallback,
  ShutdownConfiguration,
} from './types.js';

const defaultShutdownConfiguration: ShutdownConfiguration = {
  callbackTimeout: 10000,
  totalTimeout: 30000,
};

const defaultRestartDelay = 1000;

interface LifecycleController {
  onShutdown(callback: ShutdownCallback): void;
  shutdown(): Promise<void>;
  isShuttingDown(): boolean;
  stopProcess(signal: string): Promise<void>;
  registerSignalHandlers(): void;
}

function stringifySafe(value: unknown): string | undefined {
  try {
    return JSON.stringify(value);
  } catch {
    return undefined;
  }
}

function createBootstrapDiagnosticContext(): DiagnosticContext {
  return createDiagnosticContext({
    config: { PROCESS_NAME: process.env.PROCESS_NAME || 'service' },
    nodeEnv: process.env.NODE_ENV || 'development',
  });
}

function createLifecycleController(
  getLogger: () => Logger,
  shutdownConfig: ShutdownConfiguration,
): LifecycleController {
  const callbacks: ShutdownCallback[] = [];
  let shuttingDown = false;
  let unregisterSignalHandlers: (() => void) | undefined;

  const executeCallbackWithTimeout = async (callback: ShutdownCallback): Promise<void> => {
    let timer: NodeJS.Timeout | undefined;
    try {
      await Promise.race([
        callback(),
        new Promise<never>((_, reject) => {
          timer = setTimeout(
            () => reject(new Error('Callback timeout')),
            shutdownConfig.callbackTimeout,
          );
        }),
      ]);
    } catch (error) {
      getLogger().error(error, 'Shutdown callback failed or timed out', {
        timeout: shutdownConfig.callbackTimeout,
      });
    } finally {
      clearTimeout(timer);
    }
  };

  const stopProcess = async (signal: string): Promise<void> => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;

    getLogger().info('Graceful shutdown initiated', { signal });

    const forceExitTimeout = setTimeout(() => {
      getLogger().fatal(new Error('Shutdown timeout exceeded, forcing exit'), {
        totalTimeout: shutdownConfig.totalTimeout,
      });
      process.exit(1);
    }, shutdownConfig.totalTimeout);

    for (const callback of callbacks) {
      await executeCallbackWithTimeout(callback);
    }

    clearTimeout(forceExitTimeout);
    unregisterSignalHandlers?.();

    getLogger().info('Graceful shutdown completed');
  };

  const initiateShutdown = async (signal: string): Promise<void> => {
    await stopProcess(signal);
    process.exit(0);
  };

  const handleSignal = (signal: NodeJS.Signals): Promise<void> => initiateShutdown(signal);

  const handleUnhandledRejection = (reason: unknown, promise: Promise<unknown>): Promise<void> => {
    getLogger().fatal(new Error('Unhandled promise rejection detected'), {
      reason: stringifySafe(reason),
      reasonString: String(reason),
      promise: String(promise),
    });
    return initiateShutdown('unhandledRejection');
  };

  const handleUncaughtException = (error: Error): Promise<void> => {
    getLogger().fatal(error, 'Uncaught exception detected');
    return initiateShutdown('uncaughtException');
  };

  const handleWarning = (warning: Error): void => {
    getLogger().warn('Process warning emitted', {
      name: warning.name,
      message: warning.message,
      stack: warning.stack,
    });
  };

  const registerSignalHandlers = (): void => {
    unregisterSignalHandlers?.();

    const signals: NodeJS.Signals[] = ['SIGTERM', 'SIGINT', 'SIGUSR2'];
    const signalHandlers = signals.map((signal) => {
      const handler = () => handleSignal(signal);
      process.on(signal, handler);
      return { signal, handler };
    });

    process.on('unhandledRejection', handleUnhandledRejection);
    process.on('uncaughtException', handleUncaughtException);
    process.on('warning', handleWarning);

    unregisterSignalHandlers = () => {
      for (const { signal, handler } of signalHandlers) {
        process.removeListener(signal, handler);
      }
      process.removeListener('unhandledRejection', handleUnhandledRejection);
      process.removeListener('uncaughtException', handleUncaughtException);
      process.removeListener('warning', handleWarning);
      unregisterSignalHandlers = undefined;
    };
  };

  return {
    onShutdown: (callback) => {
      callbacks.push(callback);
    },
    shutdown: async () => {
      if (!shuttingDown) {
        await initiateShutdown('manual');
      }
    },
    isShuttingDown: () => shuttingDown,
    stopProcess,
    registerSignalHandlers,
  };
}

/**
 * Runs `startFn` inside a process lifecycle: OS signals, unhandled rejections and uncaught
 * exceptions trigger a graceful shutdown that runs registered callbacks in order.
 *
 * The returned context stays valid across restarts.
 */
export async function startProcessLifecycle(
  startFn: ProcessStartFn,
  config: ProcessLifecycleConfig = {},
): Promise<ProcessLifecycleContext> {
  const shutdownConfig = config.shutdownConfiguration ?? defaultShutdownConfiguration;
  const restartDelay = config.restartDelay ?? defaultRestartDelay;

  let diagnosticContext = config.diagnosticContext ?? createBootstrapDiagnosticContext();
  const getLogger = () => diagnosticContext.logger;

  let controller = createLifecycleController(getLogger, shutdownConfig);
  controller.registerSignalHandlers();

  const run = async (): Promise<void> => {
    const result = await startFn(context);
    diagnosticContext = result.diagnosticContext;
  };

  const restart = async (): Promise<void> => {
    if (controller.isShuttingDown()) {
      getLogger().warn('Attempted to restart while shutting down');
      return;
    }

    await controller.stopProcess('CUSTOM_RESTART');

    controller = createLifecycleController(getLogger, shutdownConfig);
    controller.registerSignalHandlers();

    try {
      await run();
    } catch (error) {
      getLogger().error(error, 'Error starting process, restarting.', { restartDelay });
      setTimeout(() => {
        void restart();
      }, restartDelay);
    }
  };

  const context: ProcessLifecycleContext = {
    onShutdown: (callback) => controller.onShutdown(callback),
    shutdown: () => controller.shutdown(),
    isShuttingDown: () => controller.isShuttingDown(),
    restart,
  };

  await run();

  getLogger().info('Process lifecycle signal handlers registered');

  return context;
}
