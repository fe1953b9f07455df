export {
  buildServiceRegistration,
  createConsulClient,
  createServiceId,
  DEFAULT_CHECK_INTERVAL,
  DEFAULT_CHECK_TIMEOUT,
} from './consulClient.js';
export {
  ConsulClientError,
  ConsulFetchError,
  ConsulRegistrationValidationError,
  ConsulStatusError,
} from './consulErrors.js';
export { ConsulCheckSchema, ConsulServiceRegistrationSchema } from './types.js';
export type {
  ConsulCheck,
  ConsulClient,
  ConsulClientConfig,
  ConsulServiceRegistration,
  ServiceRegistrationParams,
} from './types.js';
