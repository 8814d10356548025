/* Copyright(C) 2020-2025, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * ultraloq-options.ts: Feature option and type definitions for Ultraloq.
 */
import { ULTRALOQ_ACCOUNT_REFRESH_INTERVAL, ULTRALOQ_BATTERY_LOW_LEVEL } from "./settings.js";
import type { FeatureOptionEntry } from "homebridge-plugin-utils";

// Plugin configuration options.
export interface UltraloqOptions {

  accounts: UltraloqAccountOptions[];
  debugAll: boolean;
  options: string[];
}

// Account configuration options.
export interface UltraloqAccountOptions {

  addressId?: number;
  email: string;
  mqttTopic: string;
  mqttUrl?: string;
  name?: string;
  password: string;
}

// The webUI makes use of additional metadata to only surface the feature options relevant for a particular device.
//
// modelKey:    Ultraloq models this option applies to.
interface UltraloqFeatureOption extends FeatureOptionEntry {

  modelKey?: string[];
}

// Feature option categories.
export const featureOptionCategories = [

  { description: "Device feature options.", modelKey: ["all"], name: "Device" },
  { description: "Account feature options.", modelKey: ["account"], name: "Account" },
  { description: "Lock feature options.", modelKey: ["U-Bolt"], name: "Lock" },
  { description: "Battery feature options.", modelKey: ["U-Bolt"], name: "Battery" },
  { description: "Logging feature options.", modelKey: ["all"], name: "Log" }
];

/* eslint-disable @stylistic/max-len */
// Individual feature options, broken out by category.
export const featureOptions: { [index: string]: UltraloqFeatureOption[] } = {

  // Account options.
  "Account": [

    { default: false, defaultValue: ULTRALOQ_ACCOUNT_REFRESH_INTERVAL, description: "Interval, in seconds, between lock status checks with the Ultraloq cloud.", name: "RefreshInterval" }
  ],

  // Battery options.
  "Battery": [

    { default: true, description: "Add a battery service reporting the lock's battery level.", name: "" },
    { default: false, defaultValue: ULTRALOQ_BATTERY_LOW_LEVEL, description: "Battery level, in percent, below which the lock reports a low battery.", name: "LowLevel" }
  ],

  // Device options.
  "Device": [

    { default: true, description: "Make this device available in HomeKit.", name: "" },
    { default: false, description: "Synchronize the Ultraloq name of this device with HomeKit. Synchronization is one-way only, syncing the device name from Ultraloq to HomeKit.", name: "SyncName" }
  ],

  // Lock options.
  "Lock": [

    { default: false, description: "Add a switch accessory to control the lock. This can be useful in automation scenarios where you want to work around HomeKit's security restrictions for controlling locks and triggering events when a lock or unlock event occurs.", name: "Trigger" }
  ],

  // Logging options.
  "Log": [

    { default: true, description: "Log lock events in Homebridge.", name: "Lock" }
  ]
};
/* eslint-enable @stylistic/max-len */
