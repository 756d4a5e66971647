import { z } from 'zod';
import type {
  AppXPackages,
  IpAddress,
  IpConfig,
  MachineName,
  PackageVersion,
  SoftwareInfo
} from '../types/index.js';

export const MACHINE_NAME_PATH = '/api/os/machinename';
export const SOFTWARE_INFO_PATH = '/api/os/info';
export const IP_CONFIG_PATH = '/api/networking/ipconfig';
export const INSTALLED_PACKAGES_PATH = '/api/appx/packagemanager/packages';

/**
 * A fixed device endpoint together with the decoder for its body and the
 * value returned when the device has nothing to report.
 */
export interface Endpoint<T> {
  path: string;
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  empty: () => T;
}

// The device omits fields or sends null for them; both read as the default.
const text = z.string().nullish().transform((value) => value ?? '');
const integer = z.number().nullish().transform((value) => value ?? 0);
const flag = z.boolean().nullish().transform((value) => value ?? false);
const list = <T>(item: z.ZodType<T, z.ZodTypeDef, unknown>) =>
  z.array(item).nullish().transform((value): T[] => value ?? []);

const emptyIpAddress = (): IpAddress => ({ ipAddress: '', mask: '' });
const emptyVersion = (): PackageVersion => ({ major: 0, minor: 0, build: 0, revision: 0 });

const ipAddressSchema = z
  .object({ IpAddress: text, Mask: text })
  .transform((wire): IpAddress => ({ ipAddress: wire.IpAddress, mask: wire.Mask }));

const dhcpSchema = z
  .object({
    LeaseExpires: integer,
    LeaseObtained: integer,
    Address: ipAddressSchema.nullish()
  })
  .nullish()
  .transform((wire) => ({
    leaseExpires: wire?.LeaseExpires ?? 0,
    leaseObtained: wire?.LeaseObtained ?? 0,
    address: wire?.Address ?? emptyIpAddress()
  }));

const adapterSchema = z
  .object({
    Description: text,
    HardwareAddress: text,
    Index: integer,
    Name: text,
    Type: text,
    DHCP: dhcpSchema,
    Gateways: list(ipAddressSchema),
    IpAddresses: list(ipAddressSchema)
  })
  .transform((wire) => ({
    description: wire.Description,
    hardwareAddress: wire.HardwareAddress,
    index: wire.Index,
    name: wire.Name,
    type: wire.Type,
    dhcp: wire.DHCP,
    gateways: wire.Gateways,
    ipAddresses: wire.IpAddresses
  }));

const versionSchema = z
  .object({ Major: integer, Minor: integer, Build: integer, Revision: integer })
  .nullish()
  .transform((wire): PackageVersion =>
    wire ? { major: wire.Major, minor: wire.Minor, build: wire.Build, revision: wire.Revision } : emptyVersion()
  );

const packageSchema = z
  .object({
    Name: text,
    PackageFamilyName: text,
    PackageFullName: text,
    PackageOrigin: integer,
    PackageRelativeId: text,
    Publisher: text,
    Version: versionSchema,
    CanUninstall: flag,
    IsXAP: flag
  })
  .transform((wire) => ({
    name: wire.Name,
    packageFamilyName: wire.PackageFamilyName,
    packageFullName: wire.PackageFullName,
    packageOrigin: wire.PackageOrigin,
    packageRelativeId: wire.PackageRelativeId,
    publisher: wire.Publisher,
    version: wire.Version,
    canUninstall: wire.CanUninstall,
    isXap: wire.IsXAP
  }));

export const machineNameEndpoint: Endpoint<MachineName> = {
  path: MACHINE_NAME_PATH,
  // Some firmware reports the name as ComputerName
  schema: z
    .object({ Name: z.string().nullish(), ComputerName: z.string().nullish() })
    .transform((wire): MachineName => ({ name: wire.Name ?? wire.ComputerName ?? '' })),
  empty: () => ({ name: '' })
};

export const softwareInfoEndpoint: Endpoint<SoftwareInfo> = {
  path: SOFTWARE_INFO_PATH,
  schema: z
    .object({
      ComputerName: text,
      Language: text,
      OsEdition: text,
      OsEditionId: integer,
      OsVersion: text,
      Platform: text
    })
    .transform((wire): SoftwareInfo => ({
      computerName: wire.ComputerName,
      language: wire.Language,
      osEdition: wire.OsEdition,
      osEditionId: wire.OsEditionId,
      osVersion: wire.OsVersion,
      platform: wire.Platform
    })),
  empty: () => ({
    computerName: '',
    language: '',
    osEdition: '',
    osEditionId: 0,
    osVersion: '',
    platform: ''
  })
};

export const ipConfigEndpoint: Endpoint<IpConfig> = {
  path: IP_CONFIG_PATH,
  schema: z.object({ Adapters: list(adapterSchema) }).transform((wire): IpConfig => ({ adapters: wire.Adapters })),
  empty: () => ({ adapters: [] })
};

export const installedPackagesEndpoint: Endpoint<AppXPackages> = {
  path: INSTALLED_PACKAGES_PATH,
  schema: z
    .object({ InstalledPackages: list(packageSchema) })
    .transform((wire): AppXPackages => ({ installedPackages: wire.InstalledPackages })),
  empty: () => ({ installedPackages: [] })
};
