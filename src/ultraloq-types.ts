/* Copyright(C) 2020-2025, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * ultraloq-types.ts: Interface and type definitions for Ultraloq.
 */

// Reserved names for the services we manage on an accessory.
export enum UltraloqReservedNames {

  // Manage our switch types.
  SWITCH_LOCK_TRIGGER = "LockTrigger"
}

// An address (home) on the Ultraloq account. Devices are listed per address.
export interface UltraloqAddress {

  id: number;
  name: string;
}

// A lock we've found on the account.
export interface UltraloqLockConfig {

  bridge: Record<string, unknown>;
  groupId?: number | string;
  model: string;
  name: string;
  params: Record<string, unknown>;
  status: unknown;
  userUid?: string;
  uuid: string;
}

// Realtime status of a lock. The cloud reports the bolt as 1 when open and 2 when thrown.
export interface UltraloqLockStatus {

  battery: number;
  bleStrength: number;
  isJammed: boolean;
  isLocked: boolean;
  isUnlocked: boolean;
  lastTime: number;
  model?: string;
  netStrength: number;
  online: boolean;
  rawLockState: number;
  sleep: boolean;
  timestamp: number;
  uuid?: string;
  version: string;
  wifiStrength: number;
}

// Connectivity of a lock. We need both paths up before the cloud will relay a command.
export interface UltraloqOnlineStatus {

  bleOnline: boolean;
  isOnline: boolean;
  rawData: Record<string, unknown>;
  remoteOnline: boolean;
}

// Lock commands the cloud understands.
export type UltraloqLockAction = "LOCK" | "UNLOCK";
