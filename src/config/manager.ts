import { promises as fs } from 'node:fs';
import { join } from 'node:path';
import { homedir } from 'node:os';
import { z } from 'zod';
import type { ConfigData, Connection, Credentials, ProfileInfo } from '../types/index.js';
import { DEFAULT_TIMEOUT } from '../transport/http.js';
import { connectionSchema, credentialsSchema, requireValid } from '../client/validation.js';

const DEFAULT_CONFIG_DIR = join(homedir(), '.device-portal');
const CONFIG_FILE_NAME = 'config.json';

const configSchema = z.object({
  profiles: z.record(
    z.object({
      connection: z.object({
        host: z.string(),
        port: z.number().int().optional(),
        scheme: z.enum(['http', 'https']).optional()
      }),
      credentials: z.union([
        z.object({ username: z.string(), password: z.string() }),
        z.object({ token: z.string() })
      ]),
      createdAt: z.string(),
      lastUsed: z.string()
    })
  ),
  currentProfile: z.string().nullable(),
  preferences: z.object({
    timeout: z.number().int().positive()
  })
});

export interface StoredProfile {
  name: string;
  connection: Connection;
  credentials: Credentials;
  timeout: number;
}

function defaultConfig(): ConfigData {
  return {
    profiles: {},
    currentProfile: null,
    preferences: {
      timeout: DEFAULT_TIMEOUT
    }
  };
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Named device profiles kept in a JSON file.
 *
 * Credentials, passwords and tokens included, are stored in plain text. The
 * file is created with mode 0600 inside a 0700 directory, which is the only
 * protection they get; keep the config directory off shared volumes.
 * Connection and credentials are validated before a profile is saved.
 */
export class ConfigManager {
  private config: ConfigData | null = null;
  readonly configFile: string;

  constructor(private readonly configDir: string = DEFAULT_CONFIG_DIR) {
    this.configFile = join(configDir, CONFIG_FILE_NAME);
  }

  async ensureConfigDir(): Promise<void> {
    await fs.mkdir(this.configDir, { recursive: true, mode: 0o700 });
  }

  async loadConfig(): Promise<ConfigData> {
    if (this.config) {
      return this.config;
    }

    let raw: string;
    try {
      raw = await fs.readFile(this.configFile, 'utf8');
    } catch (error) {
      if (isNotFound(error)) {
        this.config = defaultConfig();
        return this.config;
      }
      throw error;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new Error(`Config file ${this.configFile} is not valid JSON: ${reason}`);
    }

    const parsed = configSchema.safeParse(json);
    if (!parsed.success) {
      throw new Error(`Config file ${this.configFile} is malformed: ${parsed.error.issues[0]?.message ?? 'unknown issue'}`);
    }

    this.config = parsed.data;
    return this.config;
  }

  async saveConfig(): Promise<void> {
    if (!this.config) {
      throw new Error('No config to save');
    }
    await this.ensureConfigDir();
    await fs.writeFile(this.configFile, JSON.stringify(this.config, null, 2), { mode: 0o600 });
  }

  private async withConfig(callback: (config: ConfigData) => void): Promise<void> {
    const config = await this.loadConfig();
    callback(config);
    this.config = config;
    await this.saveConfig();
  }

  async setProfile(profileName: string, connection: Connection, credentials: Credentials): Promise<void> {
    if (!profileName.trim()) {
      throw new Error('Profile name cannot be empty');
    }

    const validConnection = requireValid(connectionSchema, connection, 'connection');
    const validCredentials = requireValid(credentialsSchema, credentials, 'credentials');

    await this.withConfig((config) => {
      const now = new Date().toISOString();
      const existing = config.profiles[profileName];

      config.profiles[profileName] = {
        connection: validConnection,
        credentials: validCredentials,
        createdAt: existing?.createdAt ?? now,
        lastUsed: now
      };

      if (!config.currentProfile) {
        config.currentProfile = profileName;
      }
    });
  }

  async getProfile(profileName?: string): Promise<StoredProfile> {
    const config = await this.loadConfig();
    const targetProfile = profileName || config.currentProfile;

    if (!targetProfile) {
      throw new Error('No profile specified and no current profile set.');
    }

    const profile = config.profiles[targetProfile];
    if (!profile) {
      throw new Error(`Profile "${targetProfile}" not found. Available profiles: ${Object.keys(config.profiles).join(', ')}`);
    }

    return {
      name: targetProfile,
      connection: profile.connection,
      credentials: profile.credentials,
      timeout: config.preferences.timeout
    };
  }

  async listProfiles(): Promise<{ profiles: Record<string, ProfileInfo>; currentProfile: string | null }> {
    const config = await this.loadConfig();
    return {
      profiles: config.profiles,
      currentProfile: config.currentProfile
    };
  }

  async setCurrentProfile(profileName: string): Promise<void> {
    await this.withConfig((config) => {
      const profile = config.profiles[profileName];
      if (!profile) {
        throw new Error(`Profile "${profileName}" not found`);
      }

      config.currentProfile = profileName;
      profile.lastUsed = new Date().toISOString();
    });
  }

  async deleteProfile(profileName: string): Promise<void> {
    await this.withConfig((config) => {
      if (!config.profiles[profileName]) {
        throw new Error(`Profile "${profileName}" not found`);
      }

      delete config.profiles[profileName];

      if (config.currentProfile === profileName) {
        const remainingProfiles = Object.keys(config.profiles);
        config.currentProfile = remainingProfiles.length > 0 ? remainingProfiles[0] : null;
      }
    });
  }

  async getPreferences(): Promise<ConfigData['preferences']> {
    const config = await this.loadConfig();
    return config.preferences;
  }

  async setPreference<K extends keyof ConfigData['preferences']>(key: K, value: ConfigData['preferences'][K]): Promise<void> {
    await this.withConfig((config) => {
      config.preferences[key] = value;
    });
  }

  async clearAllData(): Promise<void> {
    try {
      await fs.unlink(this.configFile);
    } catch (error) {
      if (!isNotFound(error)) {
        throw error;
      }
    }

    this.config = null;
  }
}

export default new ConfigManager();
