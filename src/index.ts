export {
  DeviceApiClient,
  createDeviceApiClient,
  type DeviceApiClientOptions,
  type DeviceApiConfig,
  type FetchResult
} from './client/device-api.js';
export {
  INSTALLED_PACKAGES_PATH,
  IP_CONFIG_PATH,
  MACHINE_NAME_PATH,
  SOFTWARE_INFO_PATH,
  installedPackagesEndpoint,
  ipConfigEndpoint,
  machineNameEndpoint,
  softwareInfoEndpoint,
  type Endpoint
} from './client/endpoints.js';
export {
  DEFAULT_PORT,
  DEFAULT_TIMEOUT,
  HttpTransport,
  TransportError,
  buildAuthorizationHeader,
  buildBaseUrl,
  createHttpTransport,
  type FetchInit,
  type FetchLike,
  type HttpTransportOptions,
  type Transport,
  type TransportErrorCode,
  type TransportFactory
} from './transport/http.js';
export { ConfigManager, type StoredProfile } from './config/manager.js';
export { connectWithProfile, testConnection, type ProfileClientOptions } from './utils/client.js';
export { DeviceApiError, InvalidArgumentError, PreconditionFailedError, type DeviceApiErrorCode } from './utils/errors.js';
export { Logger, type LogLevel, type LoggerLike } from './utils/logger.js';
export type * from './types/index.js';
