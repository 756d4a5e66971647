import defaultConfigManager, { type ConfigManager } from '../config/manager.js';
import { DeviceApiClient, createDeviceApiClient, type DeviceApiClientOptions } from '../client/device-api.js';
import logger from './logger.js';
import type { ConnectionStatus } from '../types/index.js';

export type ProfileClientOptions = Omit<DeviceApiClientOptions, 'connection' | 'credentials' | 'timeout'> & {
  configManager?: ConfigManager;
};

/**
 * Builds a configured client from a stored profile, or from the current
 * profile when no name is given.
 */
export async function connectWithProfile(
  profileName?: string,
  options: ProfileClientOptions = {}
): Promise<DeviceApiClient> {
  const { configManager = defaultConfigManager, ...clientOptions } = options;
  const profile = await configManager.getProfile(profileName);

  logger.debug(`Using profile "${profile.name}" (timeout ${profile.timeout}ms)`);

  return createDeviceApiClient({
    ...clientOptions,
    connection: profile.connection,
    credentials: profile.credentials,
    timeout: profile.timeout
  });
}

async function resolveProfileLabel(configManager: ConfigManager, profileName?: string): Promise<string | null> {
  if (profileName) {
    return profileName;
  }
  // An unreadable config file was already reported by the failed connection.
  const config = await configManager.loadConfig().catch(() => null);
  return config?.currentProfile ?? null;
}

export async function testConnection(
  profileName?: string,
  options: ProfileClientOptions = {}
): Promise<ConnectionStatus> {
  const configManager = options.configManager ?? defaultConfigManager;

  try {
    const client = await connectWithProfile(profileName, options);
    const machineName = await client.getMachineName();
    return {
      connected: true,
      machineName: machineName.name,
      profile: await resolveProfileLabel(configManager, profileName)
    };
  } catch (error) {
    return {
      connected: false,
      error: error instanceof Error ? error.message : String(error),
      profile: await resolveProfileLabel(configManager, profileName)
    };
  }
}
