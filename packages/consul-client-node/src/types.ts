import { TB } from '@service-launcher/service-framework-node/typebox';
import type { Dispatcher } from 'undici';

export const ConsulCheckSchema = TB.Object({
  HTTP: TB.String({ minLength: 1 }),
  Interval: TB.String({ pattern: '^[0-9]+(ms|s|m|h)$' }),
  Timeout: TB.String({ pattern: '^[0-9]+(ms|s|m|h)$' }),
});

export const ConsulServiceRegistrationSchema = TB.Object({
  Name: TB.String({ minLength: 1 }),
  ID: TB.String({ minLength: 1 }),
  Port: TB.Integer({ minimum: 1, maximum: 65535 }),
  Address: TB.String({ minLength: 1 }),
  Check: ConsulCheckSchema,
});

export type ConsulCheck = TB.Static<typeof ConsulCheckSchema>;

export type ConsulServiceRegistration = TB.Static<typeof ConsulServiceRegistrationSchema>;

export interface ServiceRegistrationParams {
  serviceName: string;
  host: string;
  port: number;
  checkPath: string;
  checkInterval?: string;
  checkTimeout?: string;
}

export interface ConsulClientConfig {
  /** Agent address, e.g. `http://localhost:8500`. */
  baseUrl: string;
  dispatcher?: Dispatcher;
}

export interface ConsulClient {
  readonly baseUrl: string;
  registerService(registration: ConsulServiceRegistration): Promise<void>;
  passCheck(checkId: string, note?: string): Promise<void>;
  deregisterService(serviceId: string): Promise<void>;
}
