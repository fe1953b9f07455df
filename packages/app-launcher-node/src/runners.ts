import { spawn } from 'node:child_process';
import type { FastifyInstance } from 'fastify';
import { LauncherError } from './launcherErrors.js';

export interface ServerTarget {
  host: string;
  port: number;
}

export interface ServerRunner {
  /** Shown in the launcher's footer block as `<name> run`. */
  readonly name: string;
  start(target: ServerTarget): Promise<void>;
}

export function createFastifyRunner(app: FastifyInstance): ServerRunner {
  return {
    name: 'Fastify',
    start: (target) => app.startServer(target),
  };
}

export interface SpawnedProcess {
  once(event: 'exit', listener: (code: number | null, signal: NodeJS.Signals | null) => void): unknown;
  once(event: 'error', listener: (error: Error) => void): unknown;
}

export type SpawnProcess = (
  command: string,
  args: string[],
  options: { stdio: 'inherit' },
) => SpawnedProcess;

export interface SubprocessRunnerConfig {
  command: string;
  args?: readonly string[];
  workers?: number;
  spawnProcess?: SpawnProcess;
}

export function buildSubprocessArgs(
  target: ServerTarget,
  workers: number,
  extraArgs: readonly string[] = [],
): string[] {
  return ['--bind', `${target.host}:${target.port}`, '--workers', String(workers), ...extraArgs];
}

/**
 * Serves through an external multi-worker server, e.g. `gunicorn --bind host:port --workers n app`.
 * `start` settles when the child process exits.
 */
export function createSubprocessRunner(config: SubprocessRunnerConfig): ServerRunner {
  const workers = config.workers ?? 1;
  const spawnProcess: SpawnProcess =
    config.spawnProcess ?? ((command, args, options) => spawn(command, args, options));

  if (!Number.isInteger(workers) || workers < 1) {
    throw new LauncherError(`Worker count must be a positive integer, got ${workers}`);
  }

  return {
    name: 'Subprocess',
    start(target) {
      const args = buildSubprocessArgs(target, workers, config.args);

      return new Promise<void>((resolve, reject) => {
        const child = spawnProcess(config.command, args, { stdio: 'inherit' });

        child.once('error', (error) => {
          reject(new LauncherError(`Failed to start ${config.command}`, error));
        });

        child.once('exit', (code, signal) => {
          if (code === 0) {
            resolve();
            return;
          }
          const reason = signal ? `signal ${signal}` : `code ${String(code)}`;
          reject(new LauncherError(`${config.command} exited with ${reason}`));
        });
      });
    },
  };
}
