import defaultLogger, { type LoggerLike } from '../utils/logger.js';
import { PreconditionFailedError } from '../utils/errors.js';
import { createHttpTransport, type HttpTransportOptions, type Transport, type TransportFactory } from '../transport/http.js';
import {
  installedPackagesEndpoint,
  ipConfigEndpoint,
  machineNameEndpoint,
  softwareInfoEndpoint,
  type Endpoint
} from './endpoints.js';
import { connectionSchema, credentialsSchema, requireValid } from './validation.js';
import type { AppXPackages, Connection, Credentials, IpConfig, MachineName, SoftwareInfo } from '../types/index.js';

export type FetchResult<T> =
  | { status: 'ok'; value: T }
  | { status: 'empty' }
  | { status: 'decodeError'; error: Error; body: string };

export interface DeviceApiClientOptions extends HttpTransportOptions {
  connection?: Connection;
  credentials?: Credentials;
  transportFactory?: TransportFactory;
  logger?: LoggerLike;
}

export interface DeviceApiConfig extends DeviceApiClientOptions {
  connection: Connection;
  credentials: Credentials;
}

/**
 * Client for the device's HTTP management API.
 *
 * A default-constructed client is unusable until both a connection and
 * credentials are provided. Every change to either one rebuilds the
 * underlying transport; requests already in flight finish on the transport
 * they started with.
 */
export class DeviceApiClient {
  private currentConnection: Connection | null = null;
  private currentCredentials: Credentials | null = null;
  private transport: Transport | null = null;

  private readonly transportFactory: TransportFactory;
  private readonly transportOptions: HttpTransportOptions;
  private readonly logger: LoggerLike;

  constructor(private readonly options: DeviceApiClientOptions = {}) {
    this.transportFactory = options.transportFactory ?? createHttpTransport;
    this.transportOptions = { timeout: options.timeout, fetch: options.fetch };
    this.logger = options.logger ?? defaultLogger;

    if (options.connection !== undefined || options.credentials !== undefined) {
      this.configure(options.connection, options.credentials);
    }
  }

  get connection(): Connection | null {
    return this.currentConnection;
  }

  get credentials(): Credentials | null {
    return this.currentCredentials;
  }

  get isConfigured(): boolean {
    return this.transport !== null;
  }

  initialize(connection: Connection, credentials: Credentials): void {
    this.configure(connection, credentials);
  }

  setConnection(connection: Connection): void {
    const validated = requireValid(connectionSchema, connection, 'connection');
    this.currentConnection = validated;
    this.rebuildIfReady();
  }

  setCredentials(credentials: Credentials): void {
    const validated = requireValid(credentialsSchema, credentials, 'credentials');
    this.currentCredentials = validated;
    this.rebuildIfReady();
  }

  /** Returns a new client for another device, keeping credentials and options. */
  withConnection(connection: Connection): DeviceApiClient {
    return new DeviceApiClient({
      ...this.options,
      connection,
      credentials: this.requireCredentials()
    });
  }

  /** Returns a new client with other credentials, keeping connection and options. */
  withCredentials(credentials: Credentials): DeviceApiClient {
    return new DeviceApiClient({
      ...this.options,
      connection: this.requireConnection(),
      credentials
    });
  }

  async getMachineName(): Promise<MachineName> {
    return this.getOrEmpty(machineNameEndpoint);
  }

  async getSoftwareInfo(): Promise<SoftwareInfo> {
    return this.getOrEmpty(softwareInfoEndpoint);
  }

  async getIpConfig(): Promise<IpConfig> {
    return this.getOrEmpty(ipConfigEndpoint);
  }

  async getInstalledPackages(): Promise<AppXPackages> {
    return this.getOrEmpty(installedPackagesEndpoint);
  }

  /**
   * GET an endpoint and decode its body, keeping "no data" and "bad data"
   * apart. Transport failures are thrown, never folded into the result.
   */
  async fetch<T>(endpoint: Endpoint<T>): Promise<FetchResult<T>> {
    const transport = this.requireTransport();

    this.logger.debug(`GET ${transport.baseUrl}${endpoint.path}`);
    const body = await transport.get(endpoint.path);
    if (body === null || body.trim() === '') {
      return { status: 'empty' };
    }

    let json: unknown;
    try {
      json = JSON.parse(body);
    } catch (error) {
      return { status: 'decodeError', error: error instanceof Error ? error : new Error(String(error)), body };
    }

    if (json === null) {
      return { status: 'empty' };
    }

    const parsed = endpoint.schema.safeParse(json);
    if (!parsed.success) {
      return { status: 'decodeError', error: parsed.error, body };
    }
    return { status: 'ok', value: parsed.data };
  }

  private async getOrEmpty<T>(endpoint: Endpoint<T>): Promise<T> {
    const result = await this.fetch(endpoint);

    switch (result.status) {
      case 'ok':
        return result.value;
      case 'decodeError':
        this.logger.warn(`Could not decode response from ${endpoint.path}: ${result.error.message}`);
        return endpoint.empty();
      case 'empty':
        return endpoint.empty();
    }
  }

  private configure(connection: unknown, credentials: unknown): void {
    const validConnection = requireValid(connectionSchema, connection, 'connection');
    const validCredentials = requireValid(credentialsSchema, credentials, 'credentials');

    this.currentConnection = validConnection;
    this.currentCredentials = validCredentials;
    this.rebuildTransport();
  }

  private rebuildIfReady(): void {
    if (this.currentConnection && this.currentCredentials) {
      this.rebuildTransport();
    }
  }

  private rebuildTransport(): void {
    const connection = this.requireConnection();
    const credentials = this.requireCredentials();

    this.transport = this.transportFactory(connection, credentials, this.transportOptions);
    this.logger.debug(`Transport ready for ${this.transport.baseUrl}`);
  }

  private requireConnection(): Connection {
    if (!this.currentConnection) {
      throw new PreconditionFailedError('Set connection information before using the client.');
    }
    return this.currentConnection;
  }

  private requireCredentials(): Credentials {
    if (!this.currentCredentials) {
      throw new PreconditionFailedError('Set credentials before using the client.');
    }
    return this.currentCredentials;
  }

  private requireTransport(): Transport {
    if (!this.transport) {
      this.requireConnection();
      this.requireCredentials();
      throw new PreconditionFailedError('Client transport has not been initialized.');
    }
    return this.transport;
  }
}

/** Creates a client that is configured from the start. */
export function createDeviceApiClient(config: DeviceApiConfig): DeviceApiClient {
  return new DeviceApiClient(config);
}
