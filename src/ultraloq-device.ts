/* Copyright(C) 2017-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * ultraloq-device.ts: Base class for all Ultraloq devices.
 */
import type { API, HAP, PlatformAccessory } from "homebridge";
import { type HomebridgePluginLogging, type Nullable, sanitizeName } from "homebridge-plugin-utils";
import type { UltraloqLockConfig, UltraloqLockStatus } from "./ultraloq-types.js";
import { ULTRALOQ_MANUFACTURER } from "./settings.js";
import type { UltraloqAccount } from "./ultraloq-account.js";
import type { UltraloqPlatform } from "./ultraloq-platform.js";
import util from "node:util";

// Device-specific options and settings.
export interface UltraloqHints {

  batteryLowLevel: number;
  hasBattery: boolean;
  hasLockTrigger: boolean;
  logLock: boolean;
  syncName: boolean;
}

// Feature options and serial numbers identify devices by their UUID, stripped of separators.
export function ultraloqDeviceId(uuid: string): string {

  return uuid.replace(/[:-]/g, "").toUpperCase();
}

export abstract class UltraloqBase {

  public readonly account: UltraloqAccount;
  public readonly api: API;
  protected readonly hap: HAP;
  public readonly log: HomebridgePluginLogging;
  public readonly platform: UltraloqPlatform;

  constructor(account: UltraloqAccount) {

    this.account = account;
    this.api = account.platform.api;
    this.hap = this.api.hap;
    this.platform = account.platform;

    this.log = {

      debug: (message: string, ...parameters: unknown[]): void => account.platform.debug(util.format(this.name + ": " + message, ...parameters)),
      error: (message: string, ...parameters: unknown[]): void => account.platform.log.error(util.format(this.name + ": " + message, ...parameters)),
      info: (message: string, ...parameters: unknown[]): void => account.platform.log.info(util.format(this.name + ": " + message, ...parameters)),
      warn: (message: string, ...parameters: unknown[]): void => account.platform.log.warn(util.format(this.name + ": " + message, ...parameters))
    };
  }

  // Configure the device information for HomeKit.
  protected setInfo(accessory: PlatformAccessory, device: UltraloqLockConfig, status: UltraloqLockStatus | null): boolean {

    const infoService = accessory.getService(this.hap.Service.AccessoryInformation);

    infoService?.updateCharacteristic(this.hap.Characteristic.Manufacturer, ULTRALOQ_MANUFACTURER);

    if(device.model.length) {

      infoService?.updateCharacteristic(this.hap.Characteristic.Model, device.model);
    }

    infoService?.updateCharacteristic(this.hap.Characteristic.SerialNumber, ultraloqDeviceId(device.uuid));

    // The firmware version is only available once we've polled the lock.
    if(status?.version.length) {

      // Capture the version of the device firmware, ensuring we get major, minor, and patch levels if they exist.
      const versionRegex = /^v?(\d+)(?:\.(\d+))?(?:\.(\d+))?/i;
      const match: Nullable<(string | undefined)[]> = versionRegex.exec(status.version);

      infoService?.updateCharacteristic(this.hap.Characteristic.FirmwareRevision,
        match ? (match[1] ?? "0") + "." + (match[2] ?? "0") + "." + (match[3] ?? "0") : status.version);
    }

    return true;
  }

  // Utility function to return the fully enumerated name of this device.
  public get name(): string {

    return this.account.name;
  }
}

export abstract class UltraloqDevice extends UltraloqBase {

  public accessory: PlatformAccessory;
  public abstract device: UltraloqLockConfig;
  public hints: UltraloqHints;
  public abstract status: UltraloqLockStatus | null;

  constructor(account: UltraloqAccount, accessory: PlatformAccessory) {

    super(account);

    this.accessory = accessory;
    this.hints = { batteryLowLevel: 0, hasBattery: false, hasLockTrigger: false, logLock: false, syncName: false };
  }

  // Configure device-specific settings.
  protected configureHints(): boolean {

    this.hints.syncName = this.hasFeature("Device.SyncName");

    // Inform the user if we've opted for something other than the defaults.
    if(this.hints.syncName) {

      this.log.info("Syncing Ultraloq device name to HomeKit.");
    }

    return true;
  }

  // Configure the device information details for HomeKit.
  public configureInfo(): boolean {

    // Sync the Ultraloq name with HomeKit, if configured.
    if(this.hints.syncName && this.device.name) {

      this.accessoryName = this.device.name;
    }

    return this.setInfo(this.accessory, this.device, this.status);
  }

  // Cleanup any MQTT subscriptions and other activities as needed.
  public cleanup(): void {

    this.account.mqtt?.unsubscribe(this.id, "lock");
    this.account.mqtt?.unsubscribe(this.id, "battery");
    this.account.mqtt?.unsubscribe(this.id, "status");
  }

  // Update the device with a freshly polled status, or with null when the poll failed.
  public abstract updateStatus(status: UltraloqLockStatus | null): void;

  // Utility function to return an integer configuration parameter on a device.
  public getFeatureNumber(option: string): Nullable<number | undefined> {

    return this.platform.featureOptions.getInteger(option, this.id, this.account.id);
  }

  // Utility for checking feature options on a device.
  public hasFeature(option: string): boolean {

    return this.account.hasFeature(option, this.id);
  }

  // Utility function to determine whether or not a device is currently available. We need a successful poll and a lock that's online.
  public get isOnline(): boolean {

    return this.account.lastUpdateSuccess && (this.status?.online ?? false);
  }

  // Return a unique identifier for an Ultraloq device.
  public get id(): string {

    return ultraloqDeviceId(this.device.uuid);
  }

  // Utility function to return the fully enumerated name of this device.
  public override get name(): string {

    return this.account.name + ": " + this.device.name;
  }

  // Utility function to return the current accessory name of this device.
  public get accessoryName(): string {

    const name = this.accessory.getService(this.hap.Service.AccessoryInformation)?.getCharacteristic(this.hap.Characteristic.Name).value;

    return (typeof name === "string") ? name : this.device.name;
  }

  // Utility function to set the current accessory name of this device.
  public set accessoryName(name: string) {

    const cleanedName = sanitizeName(name);

    // Set all the internally managed names within Homebridge to the new accessory name.
    this.accessory.displayName = cleanedName;
    this.accessory._associatedHAPAccessory.displayName = cleanedName;

    // Set all the HomeKit-visible names.
    this.accessory.getService(this.hap.Service.AccessoryInformation)?.updateCharacteristic(this.hap.Characteristic.Name, cleanedName);
  }
}
