import { Value } from '@sinclair/typebox/value';
import { request } from 'undici';
import {
  ConsulFetchError,
  ConsulRegistrationValidationError,
  ConsulStatusError,
} from './consulErrors.js';
import {
  ConsulServiceRegistrationSchema,
  type ConsulClient,
  type ConsulClientConfig,
  type ConsulServiceRegistration,
  type ServiceRegistrationParams,
} from './types.js';

export const DEFAULT_CHECK_INTERVAL = '30s';
export const DEFAULT_CHECK_TIMEOUT = '3s';

export function createServiceId(serviceName: string, port: number): string {
  return `${serviceName}:${port}`;
}

export function buildServiceRegistration(params: ServiceRegistrationParams): ConsulServiceRegistration {
  return {
    Name: params.serviceName,
    ID: createServiceId(params.serviceName, params.port),
    Port: params.port,
    Address: params.host,
    Check: {
      HTTP: `http://${params.host}:${params.port}${params.checkPath}`,
      Interval: params.checkInterval ?? DEFAULT_CHECK_INTERVAL,
      Timeout: params.checkTimeout ?? DEFAULT_CHECK_TIMEOUT,
    },
  };
}

export function createConsulClient(config: ConsulClientConfig): ConsulClient {
  const baseUrl = config.baseUrl.replace(/\/+$/, '');

  const put = async (path: string, body?: unknown): Promise<void> => {
    let response;
    try {
      response = await request(baseUrl + path, {
        method: 'PUT',
        headers: body === undefined ? undefined : { 'Content-Type': 'application/json' },
        body: body === undefined ? undefined : JSON.stringify(body),
        dispatcher: config.dispatcher,
      });
    } catch (error) {
      throw new ConsulFetchError(
        `Consul request failed: ${error instanceof Error ? error.message : String(error)}`,
        error,
      );
    }

    // The agent answers 200 on success; anything else carries a plain-text reason.
    const responseText = await response.body.text();
    if (response.statusCode !== 200) {
      throw new ConsulStatusError(response.statusCode, responseText);
    }
  };

  return {
    baseUrl,

    async registerService(registration) {
      if (!Value.Check(ConsulServiceRegistrationSchema, registration)) {
        const errors = [...Value.Errors(ConsulServiceRegistrationSchema, registration)].map(
          (error) => `${error.path || '/'} ${error.message}`,
        );
        throw new ConsulRegistrationValidationError(errors);
      }
      await put('/v1/agent/service/register', registration);
    },

    async passCheck(checkId, note) {
      const query = note ? `?${new URLSearchParams({ note }).toString()}` : '';
      await put(`/v1/agent/check/pass/${encodeURIComponent(checkId)}${query}`);
    },

    async deregisterService(serviceId) {
      await put(`/v1/agent/service/deregister/${encodeURIComponent(serviceId)}`);
    },
  };
}
