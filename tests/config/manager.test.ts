import { promises as fs } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { ConfigManager } from '../../src/config/manager.js';
import { InvalidArgumentError } from '../../src/utils/errors.js';

describe('ConfigManager', () => {
  let configDir: string;
  let manager: ConfigManager;

  beforeEach(async () => {
    configDir = await fs.mkdtemp(join(tmpdir(), 'device-portal-'));
    manager = new ConfigManager(configDir);
  });

  afterEach(async () => {
    await fs.rm(configDir, { recursive: true, force: true });
  });

  it('should fall back to defaults when no config file exists', async () => {
    await expect(manager.loadConfig()).resolves.toEqual({
      profiles: {},
      currentProfile: null,
      preferences: { timeout: 10000 }
    });
  });

  it('should make the first saved profile current and persist it', async () => {
    await manager.setProfile('lab', { host: '192.168.1.20' }, { username: 'administrator', password: 'test-secret' });
    await manager.setProfile('bench', { host: '192.168.1.30', port: 8443, scheme: 'https' }, { token: 'test-token' });

    const reloaded = new ConfigManager(configDir);
    const { profiles, currentProfile } = await reloaded.listProfiles();

    expect(currentProfile).toBe('lab');
    expect(Object.keys(profiles)).toEqual(['lab', 'bench']);
    await expect(reloaded.getProfile('bench')).resolves.toEqual({
      name: 'bench',
      connection: { host: '192.168.1.30', port: 8443, scheme: 'https' },
      credentials: { token: 'test-token' },
      timeout: 10000
    });
  });

  it('should refuse to save a profile with an invalid connection or credentials', async () => {
    await expect(manager.setProfile('lab', { host: '' }, { token: 'test-token' })).rejects.toThrow(
      'Invalid argument "connection": host cannot be empty'
    );
    await expect(manager.setProfile('lab', { host: '192.168.1.20' }, { token: '' })).rejects.toThrow(InvalidArgumentError);

    await expect(fs.access(manager.configFile)).rejects.toThrow();
    await expect(manager.listProfiles()).resolves.toEqual({ profiles: {}, currentProfile: null });
  });

  it('should write the config file readable by its owner only', async () => {
    await manager.setProfile('lab', { host: '192.168.1.20' }, { token: 'test-token' });

    const stats = await fs.stat(manager.configFile);
    expect(stats.mode & 0o777).toBe(0o600);
  });

  it('should resolve the current profile when no name is given', async () => {
    await manager.setProfile('lab', { host: '192.168.1.20' }, { token: 'test-token' });

    await expect(manager.getProfile()).resolves.toMatchObject({ name: 'lab', connection: { host: '192.168.1.20' } });
  });

  it('should fail when no profile is available', async () => {
    await expect(manager.getProfile()).rejects.toThrow('No profile specified and no current profile set.');
  });

  it('should list available profiles when a name is unknown', async () => {
    await manager.setProfile('lab', { host: '192.168.1.20' }, { token: 'test-token' });

    await expect(manager.getProfile('missing')).rejects.toThrow('Profile "missing" not found. Available profiles: lab');
  });

  it('should switch the current profile', async () => {
    await manager.setProfile('lab', { host: '192.168.1.20' }, { token: 'test-token' });
    await manager.setProfile('bench', { host: '192.168.1.30' }, { token: 'test-token' });

    await manager.setCurrentProfile('bench');

    await expect(manager.getProfile()).resolves.toMatchObject({ name: 'bench' });
    await expect(manager.setCurrentProfile('missing')).rejects.toThrow('Profile "missing" not found');
  });

  it('should move the current profile on when it is deleted', async () => {
    await manager.setProfile('lab', { host: '192.168.1.20' }, { token: 'test-token' });
    await manager.setProfile('bench', { host: '192.168.1.30' }, { token: 'test-token' });

    await manager.deleteProfile('lab');
    expect((await manager.listProfiles()).currentProfile).toBe('bench');

    await manager.deleteProfile('bench');
    expect((await manager.listProfiles()).currentProfile).toBeNull();
  });

  it('should store the timeout preference', async () => {
    await manager.setProfile('lab', { host: '192.168.1.20' }, { token: 'test-token' });
    await manager.setPreference('timeout', 2500);

    const reloaded = new ConfigManager(configDir);
    await expect(reloaded.getPreferences()).resolves.toEqual({ timeout: 2500 });
    await expect(reloaded.getProfile()).resolves.toMatchObject({ timeout: 2500 });
  });

  it('should reject a config file that is not JSON', async () => {
    await fs.writeFile(join(configDir, 'config.json'), '{broken');

    await expect(manager.loadConfig()).rejects.toThrow(/is not valid JSON/);
  });

  it('should reject a config file with the wrong shape', async () => {
    await fs.writeFile(join(configDir, 'config.json'), JSON.stringify({ profiles: [] }));

    await expect(manager.loadConfig()).rejects.toThrow(/is malformed/);
  });

  it('should remove everything on clearAllData', async () => {
    await manager.setProfile('lab', { host: '192.168.1.20' }, { token: 'test-token' });

    await manager.clearAllData();

    await expect(fs.access(manager.configFile)).rejects.toThrow();
    await expect(manager.listProfiles()).resolves.toEqual({ profiles: {}, currentProfile: null });
  });
});
