/* Copyright(C) 2019-2025, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * ultraloq-lock.ts: Lock device class for Ultraloq.
 */
import type { CharacteristicValue, PlatformAccessory } from "homebridge";
import type { UltraloqLockConfig, UltraloqLockStatus } from "./ultraloq-types.js";
import { acquireService, validService } from "homebridge-plugin-utils";
import { ULTRALOQ_BATTERY_LOW_LEVEL } from "./settings.js";
import type { UltraloqAccount } from "./ultraloq-account.js";
import { UltraloqDevice } from "./ultraloq-device.js";
import { UltraloqReservedNames } from "./ultraloq-types.js";

export class UltraloqLock extends UltraloqDevice {

  private _hkLockState: CharacteristicValue;
  public device: UltraloqLockConfig;
  public status: UltraloqLockStatus | null;

  // Create an instance.
  constructor(account: UltraloqAccount, device: UltraloqLockConfig, accessory: PlatformAccessory) {

    super(account, accessory);

    this.device = device;
    this.status = null;
    this._hkLockState = this.hap.Characteristic.LockCurrentState.UNKNOWN;

    this.configureHints();
    this.configureDevice();
  }

  // Configure device-specific settings for this device.
  protected override configureHints(): boolean {

    // Configure our parent's hints.
    super.configureHints();

    this.hints.hasBattery = this.hasFeature("Battery");
    this.hints.hasLockTrigger = this.hasFeature("Lock.Trigger");
    this.hints.logLock = this.hasFeature("Log.Lock");
    this.hints.batteryLowLevel = this.getFeatureNumber("Battery.LowLevel") ?? ULTRALOQ_BATTERY_LOW_LEVEL;

    // Sanity check the low battery threshold.
    if((this.hints.batteryLowLevel < 0) || (this.hints.batteryLowLevel > 100)) {

      this.hints.batteryLowLevel = ULTRALOQ_BATTERY_LOW_LEVEL;
    }

    if(this.hints.batteryLowLevel !== ULTRALOQ_BATTERY_LOW_LEVEL) {

      this.log.info("Low battery threshold set to %s%.", this.hints.batteryLowLevel);
    }

    return true;
  }

  // Initialize and configure the lock accessory for HomeKit.
  private configureDevice(): boolean {

    // Save the device identifiers so we can find this accessory again after a restart.
    this.accessory.context.account = this.account.id;
    this.accessory.context.uuid = this.device.uuid;

    this.configureInfo();
    this.configureLock();
    this.configureBattery();
    this.configureLockTrigger();
    this.configureMqtt();

    return true;
  }

  // Configure the lock for HomeKit.
  private configureLock(): boolean {

    const service = acquireService(this.accessory, this.hap.Service.LockMechanism, this.accessoryName, undefined, () => this.log.info("Configuring lock."));

    if(!service) {

      this.log.error("Unable to add the lock.");

      return false;
    }

    // Let HomeKit know the lock isn't responding when we can't reach it.
    service.getCharacteristic(this.hap.Characteristic.LockCurrentState).onGet(() => {

      if(!this.isOnline) {

        throw new this.hap.HapStatusError(this.hap.HAPStatus.SERVICE_COMMUNICATION_FAILURE);
      }

      return this.hkLockState;
    });

    service.getCharacteristic(this.hap.Characteristic.LockTargetState).onGet(() => this.hkTargetState);

    service.getCharacteristic(this.hap.Characteristic.LockTargetState).onSet(async (value: CharacteristicValue) => {

      const targetLocked = value === this.hap.Characteristic.LockTargetState.SECURED;

      // If the lock is already where we want it, there's nothing to do.
      if(this.status && (this.status.isLocked === targetLocked) && !this.status.isJammed) {

        this.log.debug("Lock is already %s.", targetLocked ? "locked" : "unlocked");

        return;
      }

      if(!(await this.lockCommand(targetLocked))) {

        setTimeout(() => service.updateCharacteristic(this.hap.Characteristic.LockTargetState, this.hkTargetState), 50);
      }

      service.updateCharacteristic(this.hap.Characteristic.LockCurrentState, this.hkLockState);
    });

    // Initialize the state.
    service.displayName = this.accessoryName;
    service.updateCharacteristic(this.hap.Characteristic.Name, this.accessoryName);
    service.updateCharacteristic(this.hap.Characteristic.LockCurrentState, this.hkLockState);
    service.updateCharacteristic(this.hap.Characteristic.LockTargetState, this.hkTargetState);

    service.setPrimaryService(true);

    return true;
  }

  // Configure the battery for HomeKit.
  private configureBattery(): boolean {

    // Validate whether we should have this service enabled.
    if(!validService(this.accessory, this.hap.Service.Battery, this.hints.hasBattery)) {

      return false;
    }

    const service = acquireService(this.accessory, this.hap.Service.Battery, this.accessoryName + " Battery", undefined,
      () => this.log.info("Enabling battery status."));

    if(!service) {

      this.log.error("Unable to add the battery status.");

      return false;
    }

    service.updateCharacteristic(this.hap.Characteristic.ChargingState, this.hap.Characteristic.ChargingState.NOT_CHARGEABLE);
    this.updateBattery();

    return true;
  }

  // Configure a switch to automate lock and unlock events in HomeKit beyond what HomeKit might allow for a lock service that gets treated as a secure service.
  private configureLockTrigger(): boolean {

    // Validate whether we should have this service enabled.
    if(!validService(this.accessory, this.hap.Service.Switch, this.hints.hasLockTrigger, UltraloqReservedNames.SWITCH_LOCK_TRIGGER)) {

      return false;
    }

    // Acquire the service.
    const service = acquireService(this.accessory, this.hap.Service.Switch, this.accessoryName + " Lock Trigger", UltraloqReservedNames.SWITCH_LOCK_TRIGGER,
      () => this.log.info("Enabling the lock automation trigger."));

    if(!service) {

      this.log.error("Unable to add the lock automation trigger.");

      return false;
    }

    // The switch is on when the lock is unlocked.
    service.getCharacteristic(this.hap.Characteristic.On).onGet(() => this.hkLockState === this.hap.Characteristic.LockCurrentState.UNSECURED);

    service.getCharacteristic(this.hap.Characteristic.On).onSet(async (value: CharacteristicValue) => {

      const isUnlocked = this.hkLockState === this.hap.Characteristic.LockCurrentState.UNSECURED;

      // If we're already in the requested state, we're done.
      if(value === isUnlocked) {

        return;
      }

      // Turning the switch on unlocks, turning it off locks.
      if(!(await this.lockCommand(value !== true))) {

        setTimeout(() => service.updateCharacteristic(this.hap.Characteristic.On, isUnlocked), 50);
      }
    });

    // Initialize the switch.
    service.updateCharacteristic(this.hap.Characteristic.On, this.hkLockState === this.hap.Characteristic.LockCurrentState.UNSECURED);

    return true;
  }

  // Configure MQTT capabilities of this lock.
  private configureMqtt(): boolean {

    // MQTT lock status.
    this.account.mqtt?.subscribeGet(this.id, "lock", "Lock", () => this.mqttLockState);

    // MQTT lock commands.
    this.account.mqtt?.subscribeSet(this.id, "lock", "Lock", (value: string) => {

      switch(value) {

        case "true":

          void this.lockCommand(true);

          break;

        case "false":

          void this.lockCommand(false);

          break;

        default:

          this.log.error("MQTT: Unknown lock set message received: %s.", value);

          break;
      }
    });

    // MQTT battery status.
    this.account.mqtt?.subscribeGet(this.id, "battery", "Battery", () => this.status ? this.status.battery.toString() : "unknown");

    // MQTT lock diagnostics.
    this.account.mqtt?.subscribeGet(this.id, "status", "Status", () => this.mqttStatus);

    return true;
  }

  // Update our state with a freshly polled status. A null status means the poll failed and we keep what we last knew.
  public updateStatus(status: UltraloqLockStatus | null): void {

    if(status) {

      this.status = status;
    }

    this.hkLockState = this.lockState;
    this.updateBattery();

    // Firmware versions can change between polls.
    this.configureInfo();
  }

  // Update the battery service with the current battery level.
  private updateBattery(): void {

    const service = this.accessory.getService(this.hap.Service.Battery);

    if(!service || !this.status) {

      return;
    }

    const level = Math.min(Math.max(this.status.battery, 0), 100);

    service.updateCharacteristic(this.hap.Characteristic.BatteryLevel, level);
    service.updateCharacteristic(this.hap.Characteristic.StatusLowBattery, (level < this.hints.batteryLowLevel) ?
      this.hap.Characteristic.StatusLowBattery.BATTERY_LEVEL_LOW : this.hap.Characteristic.StatusLowBattery.BATTERY_LEVEL_NORMAL);
  }

  // Utility function to execute lock and unlock actions on a lock.
  private async lockCommand(isLocking: boolean): Promise<boolean> {

    const action = isLocking ? "lock" : "unlock";

    const addressId = this.account.addressId;

    // If we're not online, we're done.
    if(!this.isOnline || (addressId === null)) {

      this.log.error("Unable to %s. Device is offline.", action);

      return false;
    }

    try {

      await (isLocking ? this.account.ultraloqApi.lock(this.device.uuid, addressId) : this.account.ultraloqApi.unlock(this.device.uuid, addressId));
    } catch(error) {

      this.log.error("Unable to %s: %s.", action, error instanceof Error ? error.message : error);

      return false;
    }

    // The command was verified by the cloud. Reflect it immediately, rather than waiting on the next poll.
    if(this.status) {

      this.status = { ...this.status, isLocked: isLocking, isUnlocked: !isLocking, rawLockState: isLocking ? 2 : 1 };
    }

    this.hkLockState = isLocking ? this.hap.Characteristic.LockCurrentState.SECURED : this.hap.Characteristic.LockCurrentState.UNSECURED;

    // Refresh our view of the lock.
    await this.account.requestRefresh();

    return true;
  }

  // Map the polled status to a HomeKit lock state.
  private get lockState(): CharacteristicValue {

    if(!this.status) {

      return this.hap.Characteristic.LockCurrentState.UNKNOWN;
    }

    if(this.status.isJammed) {

      return this.hap.Characteristic.LockCurrentState.JAMMED;
    }

    if(this.status.isLocked) {

      return this.hap.Characteristic.LockCurrentState.SECURED;
    }

    return this.status.isUnlocked ? this.hap.Characteristic.LockCurrentState.UNSECURED : this.hap.Characteristic.LockCurrentState.UNKNOWN;
  }

  // Return the current HomeKit lock state that we are tracking for this lock.
  public get hkLockState(): CharacteristicValue {

    return this._hkLockState;
  }

  // Set the current HomeKit lock state for this lock.
  private set hkLockState(value: CharacteristicValue) {

    // If nothing is changed, we're done.
    if(this.hkLockState === value) {

      return;
    }

    const isInitialState = this._hkLockState === this.hap.Characteristic.LockCurrentState.UNKNOWN;

    // Update the lock state.
    this._hkLockState = value;

    const service = this.accessory.getService(this.hap.Service.LockMechanism);

    service?.updateCharacteristic(this.hap.Characteristic.LockTargetState, this.hkTargetState);
    service?.updateCharacteristic(this.hap.Characteristic.LockCurrentState, value);

    // Update the lock trigger switch, if enabled.
    this.accessory.getServiceById(this.hap.Service.Switch, UltraloqReservedNames.SWITCH_LOCK_TRIGGER)?.updateCharacteristic(this.hap.Characteristic.On,
      value === this.hap.Characteristic.LockCurrentState.UNSECURED);

    // Publish to MQTT, if configured to do so.
    this.account.mqtt?.publish(this.id, "lock", this.mqttLockState);

    // Log the change, if configured to do so. We don't log the initial state we learn about at startup.
    if(this.hints.logLock && !isInitialState) {

      this.log.info(this.lockStateDescription + ".");
    }
  }

  // The target state HomeKit should show for the current lock state.
  private get hkTargetState(): CharacteristicValue {

    return (this.hkLockState === this.hap.Characteristic.LockCurrentState.UNSECURED) ?
      this.hap.Characteristic.LockTargetState.UNSECURED : this.hap.Characteristic.LockTargetState.SECURED;
  }

  // A human readable description of the lock state.
  private get lockStateDescription(): string {

    switch(this.hkLockState) {

      case this.hap.Characteristic.LockCurrentState.SECURED:

        return "Locked";

      case this.hap.Characteristic.LockCurrentState.UNSECURED:

        return "Unlocked";

      case this.hap.Characteristic.LockCurrentState.JAMMED:

        return "Jammed";

      default:

        return "Unknown";
    }
  }

  // Lock diagnostics as we publish them to MQTT.
  private get mqttStatus(): string {

    if(!this.status) {

      return "unknown";
    }

    return JSON.stringify({

      battery: this.status.battery,
      bleStrength: this.status.bleStrength,
      lastTime: this.status.lastTime,
      netStrength: this.status.netStrength,
      online: this.status.online,
      sleep: this.status.sleep,
      timestamp: this.status.timestamp,
      version: this.status.version,
      wifiStrength: this.status.wifiStrength
    });
  }

  // The lock state as we publish it to MQTT.
  private get mqttLockState(): string {

    switch(this.hkLockState) {

      case this.hap.Characteristic.LockCurrentState.SECURED:

        return "true";

      case this.hap.Characteristic.LockCurrentState.UNSECURED:

        return "false";

      default:

        return "unknown";
    }
  }
}
