/* Copyright(C) 2017-2025, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * ultraloq-account.ts: Ultraloq cloud account class, polling the cloud and keeping HomeKit in sync.
 */
import { PLATFORM_NAME, PLUGIN_NAME, ULTRALOQ_ACCOUNT_REFRESH_INTERVAL, ULTRALOQ_ACCOUNT_REFRESH_INTERVAL_MIN } from "./settings.js";
import type { API, HAP, PlatformAccessory } from "homebridge";
import { type HomebridgePluginLogging, MqttClient, type Nullable, sanitizeName } from "homebridge-plugin-utils";
import type { UltraloqLockConfig, UltraloqLockStatus } from "./ultraloq-types.js";
import { UltraloqAuthError } from "./ultraloq-errors.js";
import { type UltraloqDevice, ultraloqDeviceId } from "./ultraloq-device.js";
import type { UltraloqAccountOptions } from "./ultraloq-options.js";
import { UltraloqApi } from "./ultraloq-api.js";
import { UltraloqLock } from "./ultraloq-lock.js";
import type { UltraloqPlatform } from "./ultraloq-platform.js";
import util from "node:util";

export class UltraloqAccount {

  private _addressId: number | null;
  private api: API;
  public config: UltraloqAccountOptions;
  public readonly configuredDevices: { [index: string]: UltraloqDevice | undefined };
  private hap: HAP;
  private isStopped: boolean;
  public lastUpdateSuccess: boolean;
  private locks: UltraloqLockConfig[] | null;
  public readonly lockStatuses: { [index: string]: UltraloqLockStatus | undefined };
  public readonly log: HomebridgePluginLogging;
  public mqtt: MqttClient | null;
  private pollTimer: NodeJS.Timeout | null;
  private pendingRefresh: Promise<boolean> | null;
  private refreshRequested: boolean;
  public platform: UltraloqPlatform;
  public readonly ultraloqApi: UltraloqApi;

  constructor(platform: UltraloqPlatform, accountOptions: UltraloqAccountOptions, ultraloqApi?: UltraloqApi) {

    this._addressId = null;
    this.api = platform.api;
    this.config = accountOptions;
    this.configuredDevices = {};
    this.hap = this.api.hap;
    this.isStopped = false;
    this.lastUpdateSuccess = false;
    this.locks = null;
    this.lockStatuses = {};
    this.mqtt = null;
    this.pendingRefresh = null;
    this.platform = platform;
    this.pollTimer = null;
    this.refreshRequested = false;

    // Configure our logging.
    this.log = {

      debug: (message: string, ...parameters: unknown[]): void => this.platform.debug(util.format(this.name + ": " + message, ...parameters)),
      error: (message: string, ...parameters: unknown[]): void => this.platform.log.error(util.format(this.name + ": " + message, ...parameters)),
      info: (message: string, ...parameters: unknown[]): void => this.platform.log.info(util.format(this.name + ": " + message, ...parameters)),
      warn: (message: string, ...parameters: unknown[]): void => this.platform.log.warn(util.format(this.name + ": " + message, ...parameters))
    };

    this.ultraloqApi = ultraloqApi ?? new UltraloqApi(this.log);
  }

  // Initialize our connection to the Ultraloq cloud and start polling.
  public async login(): Promise<void> {

    // This account has been disabled. Remove anything we may have restored from the accessory cache and we're done.
    if(!this.hasFeature("Device")) {

      this.log.info("Disabling this Ultraloq account.");

      this.platform.accessories.filter(accessory => accessory.context.account === this.id).map(accessory => this.removeHomeKitDevice(accessory));
      this.isStopped = true;

      return;
    }

    // Initialize MQTT, if needed.
    if(!this.mqtt && this.config.mqttUrl) {

      this.mqtt = new MqttClient(this.config.mqttUrl, this.config.mqttTopic, this.log);
    }

    // Our first poll takes care of authentication, address selection, and device discovery.
    await this.refresh();

    // Kickoff our polling loop.
    this.scheduleRefresh();
  }

  // Stop polling the Ultraloq cloud.
  public stop(): void {

    this.isStopped = true;

    if(this.pollTimer) {

      clearTimeout(this.pollTimer);
      this.pollTimer = null;
    }
  }

  // Poll the Ultraloq cloud. A poll requested while another is underway joins the one in progress.
  public async refresh(): Promise<boolean> {

    if(this.pendingRefresh) {

      return this.pendingRefresh;
    }

    this.pendingRefresh = this.poll().finally(() => {

      this.pendingRefresh = null;
    });

    return this.pendingRefresh;
  }

  // Refresh our view of the account, forgetting the locks we've discovered so we pick up any that have been added or removed.
  public async refreshLocks(): Promise<boolean> {

    this.locks = null;

    return this.refresh();
  }

  // Poll immediately, typically after we've sent a command to a lock. A poll already underway may have read the lock status before the command
  // took effect, so we wait for it to finish and poll again.
  public async requestRefresh(): Promise<void> {

    if(this.pendingRefresh) {

      this.refreshRequested = true;
      await this.pendingRefresh;
    }

    await this.refresh();
  }

  // Schedule our next poll.
  private scheduleRefresh(): void {

    if(this.isStopped) {

      return;
    }

    if(this.pollTimer) {

      clearTimeout(this.pollTimer);
    }

    this.pollTimer = setTimeout(() => void this.refresh().finally(() => this.scheduleRefresh()), this.refreshInterval * 1000);
  }

  // Execute a single poll of the Ultraloq cloud.
  private async poll(): Promise<boolean> {

    if(this.isStopped) {

      return false;
    }

    this.refreshRequested = false;

    try {

      // Authenticate, if we need to.
      if(!this.ultraloqApi.isAuthenticated && !(await this.authenticate())) {

        return this.pollFailed();
      }

      // Figure out which address we're working with.
      const addressId = this._addressId ?? await this.resolveAddress();

      if(addressId === null) {

        return this.pollFailed();
      }

      // Discover the locks on this address, if we haven't already.
      if(!this.locks) {

        this.locks = await this.ultraloqApi.getLocks(addressId);

        this.log.debug("Found %s lock%s on the account.", this.locks.length, this.locks.length === 1 ? "" : "s");
        this.discoverAndSyncAccessories(this.locks);
      }

      // Retrieve the status of every lock at once. A lock we can't get a status for keeps the last one we knew about.
      const locks = this.locks;
      const results = await Promise.allSettled(locks.map(async lock => this.ultraloqApi.getLockStatus(lock.uuid)));

      // A command was sent while we were waiting. These statuses may predate it, and the poll that follows will bring us up to date.
      if(this.refreshRequested) {

        this.lastUpdateSuccess = true;

        return true;
      }

      results.forEach((result, index) => {

        const lock = locks[index];

        if(!lock) {

          return;
        }

        if(result.status === "fulfilled") {

          this.lockStatuses[lock.uuid] = result.value;

          return;
        }

        this.log.warn("%s: Unable to retrieve the lock status: %s.", lock.name, this.errorMessage(result.reason));

        // Our session is no longer valid. We'll login again on the next poll.
        if(result.reason instanceof UltraloqAuthError) {

          this.ultraloqApi.reset();
        }
      });

      this.lastUpdateSuccess = true;
    } catch(error) {

      if(error instanceof UltraloqAuthError) {

        this.ultraloqApi.reset();
      }

      this.log.error("Error communicating with the Ultraloq cloud: %s.", this.errorMessage(error));

      return this.pollFailed();
    }

    this.updateDevices();

    return true;
  }

  // Mark the poll as failed and let our devices know they're unavailable.
  private pollFailed(): boolean {

    this.lastUpdateSuccess = false;
    this.updateDevices();

    return false;
  }

  // Push the latest lock statuses to our devices.
  private updateDevices(): void {

    for(const device of Object.values(this.configuredDevices)) {

      device?.updateStatus(this.lastUpdateSuccess ? (this.lockStatuses[device.device.uuid] ?? null) : null);
    }
  }

  // Login to the Ultraloq cloud.
  private async authenticate(): Promise<boolean> {

    try {

      await this.ultraloqApi.login(this.config.email, this.config.password);
    } catch(error) {

      if(error instanceof UltraloqAuthError) {

        this.log.error("Invalid authentication: %s. Please check your email and password.", error.message);
      } else {

        this.log.error("Cannot connect to the Ultraloq cloud: %s.", this.errorMessage(error));
      }

      return false;
    }

    this.log.info("Connected to the Ultraloq cloud as %s.", this.config.email);

    return true;
  }

  // Choose the address whose locks we'll make available. Without a configured address, we use the first one on the account.
  private async resolveAddress(): Promise<number | null> {

    const addresses = await this.ultraloqApi.getAddresses();

    if(!addresses.length) {

      this.log.error("No addresses were found on this Ultraloq account.");
      this.stop();

      return null;
    }

    for(const address of addresses) {

      this.log.info("Available address: %s (id: %s).", address.name || "Unnamed", address.id);
    }

    const address = (this.config.addressId === undefined) ? addresses[0] : addresses.find(x => x.id === this.config.addressId);

    if(!address) {

      this.log.error("The configured address id %s was not found on this Ultraloq account.", this.config.addressId);
      this.stop();

      return null;
    }

    this._addressId = address.id;

    this.log.info("Using address: %s (id: %s).", address.name || "Unnamed", address.id);

    return address.id;
  }

  // Discover and sync Ultraloq locks between HomeKit and the Ultraloq cloud.
  private discoverAndSyncAccessories(locks: UltraloqLockConfig[]): void {

    for(const lock of locks) {

      this.addHomeKitDevice(lock);
    }

    // Remove locks that are no longer found on this account, but we still have in HomeKit.
    this.cleanupDevices(locks);
  }

  // Add a newly detected Ultraloq lock to HomeKit.
  public addHomeKitDevice(lock: UltraloqLockConfig): boolean {

    const uuid = this.hap.uuid.generate(lock.uuid);

    // See if we already know about this accessory.
    let accessory = this.platform.accessories.find(x => x.UUID === uuid);

    // Enable or disable certain devices based on configuration parameters.
    if(!this.hasFeature("Device", ultraloqDeviceId(lock.uuid))) {

      if(accessory) {

        this.removeHomeKitDevice(accessory);
      }

      return false;
    }

    // We've got a new device, let's add it to HomeKit.
    if(!accessory) {

      accessory = new this.api.platformAccessory(sanitizeName(lock.name), uuid, this.hap.Categories.DOOR_LOCK);

      this.log.info("%s: Adding %s to HomeKit.", lock.name, lock.model);

      // Register this accessory with homebridge and add it to the accessory array so we can track it.
      this.api.registerPlatformAccessories(PLUGIN_NAME, PLATFORM_NAME, [accessory]);
      this.platform.accessories.push(accessory);
      this.api.updatePlatformAccessories(this.platform.accessories);
    }

    const device = this.configuredDevices[accessory.UUID];

    // Setup the accessory as a new lock if we haven't configured it yet.
    if(!device) {

      this.log.info("Discovered %s: %s.", lock.model, lock.name);
      this.configuredDevices[accessory.UUID] = new UltraloqLock(this, lock, accessory);

      return true;
    }

    // Update the configuration on an existing lock.
    device.device = lock;
    device.configureInfo();

    return true;
  }

  // Cleanup removed Ultraloq locks from HomeKit.
  private cleanupDevices(locks: UltraloqLockConfig[]): void {

    const known = locks.map(lock => this.hap.uuid.generate(lock.uuid));

    for(const accessory of this.platform.accessories.filter(x => x.context.account === this.id)) {

      if(known.includes(accessory.UUID) && this.configuredDevices[accessory.UUID]) {

        continue;
      }

      this.removeHomeKitDevice(accessory);
    }
  }

  // Remove an individual Ultraloq lock from HomeKit.
  public removeHomeKitDevice(accessory: PlatformAccessory): void {

    // Ensure that this accessory hasn't already been removed.
    if(!this.platform.accessories.some(x => x.UUID === accessory.UUID)) {

      return;
    }

    // Grab our instance of the lock, if it exists.
    const device = this.configuredDevices[accessory.UUID];

    this.log.info("%s: Removing %s from HomeKit.", device?.device.name ?? accessory.displayName, device?.device.model ?? "device");

    // Cleanup our device instance.
    device?.cleanup();

    // Finally, remove it from our list of configured devices and HomeKit.
    delete this.configuredDevices[accessory.UUID];

    // Unregister the accessory and delete it's remnants from HomeKit and the plugin.
    this.api.unregisterPlatformAccessories(PLUGIN_NAME, PLATFORM_NAME, [accessory]);
    this.platform.accessories.splice(this.platform.accessories.indexOf(accessory), 1);

    // Tell Homebridge to save the updated list of accessories.
    this.api.updatePlatformAccessories(this.platform.accessories);
  }

  // Lookup a lock by its Ultraloq UUID and return it if it exists.
  public deviceLookup(uuid: string): UltraloqDevice | null {

    return this.configuredDevices[this.hap.uuid.generate(uuid)] ?? null;
  }

  // Utility function to return an integer configuration parameter on the account.
  public getFeatureNumber(option: string): Nullable<number | undefined> {

    return this.platform.featureOptions.getInteger(option, this.id);
  }

  // Utility for checking feature options on the account, or on a device belonging to it.
  public hasFeature(option: string, deviceId?: string): boolean {

    return this.platform.featureOptions.test(option, deviceId ?? this.id, this.id);
  }

  // Utility to return a readable message from whatever was thrown.
  private errorMessage(error: unknown): string {

    return (error instanceof Error) ? error.message : String(error);
  }

  // The address we're working with, once we've resolved it.
  public get addressId(): number | null {

    return this._addressId;
  }

  // Return a unique identifier for an Ultraloq account.
  public get id(): string {

    return ultraloqDeviceId(this.hap.uuid.generate(this.config.email.toLowerCase()));
  }

  // The interval, in seconds, between polls of the Ultraloq cloud.
  public get refreshInterval(): number {

    return Math.max(this.getFeatureNumber("Account.RefreshInterval") ?? ULTRALOQ_ACCOUNT_REFRESH_INTERVAL, ULTRALOQ_ACCOUNT_REFRESH_INTERVAL_MIN);
  }

  // Utility function to return the name of this account.
  public get name(): string {

    return this.config.name ?? this.config.email;
  }
}
