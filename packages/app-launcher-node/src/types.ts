import type { BlockOutput } from '@service-launcher/console-blocks-node';
import type { ConsulClient, ConsulServiceRegistration } from '@service-launcher/consul-client-node';
import type { SF } from '@service-launcher/service-framework-node';
import type { LauncherEnv } from './environment.js';
import type { ServerRunner } from './runners.js';

export type LauncherContext = SF.ServiceContext<LauncherEnv, unknown>;

export interface ConsoleConfig {
  output?: BlockOutput;
  width?: number;
}

export interface AppLauncherConfig {
  runner: ServerRunner;
  /** Defaults to `PROCESS_NAME`. */
  serviceName?: string;
  /** Defaults to `HOST`. */
  host?: string;
  /** Defaults to `PORT`. */
  port?: number;
  healthPath?: string;
  /** Defaults to a client for `CONSUL_ADDRESS`. */
  consulClient?: ConsulClient;
  console?: ConsoleConfig;
}

export interface ConsulRegistrationOptions {
  checkPath?: string;
  checkInterval?: string;
  checkTimeout?: string;
}

export interface AppLauncher {
  readonly serviceName: string;
  readonly host: string;
  readonly port: number;
  readonly serviceId: string;
  readonly healthPath: string | undefined;
  setHealthPath(path: string): void;
  registerInConsul(options?: ConsulRegistrationOptions): Promise<ConsulServiceRegistration>;
  run(): Promise<void>;
}
