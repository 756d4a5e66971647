export type Scheme = 'http' | 'https';

export interface Connection {
  host: string;
  port?: number;
  scheme?: Scheme;
}

export interface BasicCredentials {
  username: string;
  password: string;
}

export interface TokenCredentials {
  token: string;
}

export type Credentials = BasicCredentials | TokenCredentials;

export interface MachineName {
  name: string;
}

export interface SoftwareInfo {
  computerName: string;
  language: string;
  osEdition: string;
  osEditionId: number;
  osVersion: string;
  platform: string;
}

export interface IpAddress {
  ipAddress: string;
  mask: string;
}

export interface DhcpInfo {
  leaseExpires: number;
  leaseObtained: number;
  address: IpAddress;
}

export interface NetworkAdapter {
  description: string;
  hardwareAddress: string;
  index: number;
  name: string;
  type: string;
  dhcp: DhcpInfo;
  gateways: IpAddress[];
  ipAddresses: IpAddress[];
}

export interface IpConfig {
  adapters: NetworkAdapter[];
}

export interface PackageVersion {
  major: number;
  minor: number;
  build: number;
  revision: number;
}

export interface AppXPackage {
  name: string;
  packageFamilyName: string;
  packageFullName: string;
  packageOrigin: number;
  packageRelativeId: string;
  publisher: string;
  version: PackageVersion;
  canUninstall: boolean;
  isXap: boolean;
}

export interface AppXPackages {
  installedPackages: AppXPackage[];
}

export interface ProfileInfo {
  connection: Connection;
  credentials: Credentials;
  createdAt: string;
  lastUsed: string;
}

export interface ConfigData {
  profiles: Record<string, ProfileInfo>;
  currentProfile: string | null;
  preferences: {
    timeout: number;
  };
}

export interface ConnectionStatus {
  connected: boolean;
  error?: string;
  profile: string | null;
  machineName?: string;
}
