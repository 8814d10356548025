/* Copyright(C) 2017-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * ultraloq-api.ts: Ultraloq cloud API client.
 */
import { ULTRALOQ_ADDRESS_URL, ULTRALOQ_API_VERSION, ULTRALOQ_APP_ID, ULTRALOQ_APP_VERSION, ULTRALOQ_CLIENT_ID, ULTRALOQ_CLIENT_UUID, ULTRALOQ_COMMAND_VERIFY_DELAY,
  ULTRALOQ_DEVICE_COMMAND_URL, ULTRALOQ_DEVICE_LIST_URL, ULTRALOQ_DEVICE_ONLINE_URL, ULTRALOQ_DEVICE_STATUS_URL, ULTRALOQ_LOCK_MODEL, ULTRALOQ_LOGIN_URL,
  ULTRALOQ_REQUEST_TIMEOUT, ULTRALOQ_TIMEZONE, ULTRALOQ_TOKEN_URL, ULTRALOQ_USER_AGENT } from "./settings.js";
import type { UltraloqAddress, UltraloqLockAction, UltraloqLockConfig, UltraloqLockStatus, UltraloqOnlineStatus } from "./ultraloq-types.js";
import { UltraloqApiError, UltraloqAuthError, UltraloqNotFoundError } from "./ultraloq-errors.js";
import { addressListSchema, deviceGroupListSchema, envelopeSchema, lockStatusSchema, loginSchema, onlineStatusSchema, tokenSchema } from "./ultraloq-schemas.js";
import { type HomebridgePluginLogging, sleep } from "homebridge-plugin-utils";
import type { UltraloqDeviceGroup } from "./ultraloq-schemas.js";
import type { z } from "zod";

// Tunables for the API client. Both are expressed in seconds.
export interface UltraloqApiOptions {

  timeout?: number;
  verifyDelay?: number;
}

// The Ultraloq cloud accepts three different body encodings, depending on the endpoint.
interface UltraloqRequestBody {

  data: Record<string, string>;
  type: "form" | "json" | "multipart";
}

type UltraloqEnvelope = z.infer<typeof envelopeSchema>;

export class UltraloqApi {

  private _apiBaseUrl: string | null;
  private _apiToken: string | null;
  private accessToken: string | null;
  private readonly defaultHeaders: Record<string, string>;
  private readonly log: HomebridgePluginLogging;
  private readonly timeout: number;
  private readonly verifyDelay: number;

  constructor(log: HomebridgePluginLogging, options: UltraloqApiOptions = {}) {

    this._apiBaseUrl = null;
    this._apiToken = null;
    this.accessToken = null;
    this.log = log;
    this.timeout = options.timeout ?? ULTRALOQ_REQUEST_TIMEOUT;
    this.verifyDelay = options.verifyDelay ?? ULTRALOQ_COMMAND_VERIFY_DELAY;

    this.defaultHeaders = {

      "User-Agent": ULTRALOQ_USER_AGENT,
      "X-Api-Version": ULTRALOQ_API_VERSION,
      "X-Build": "Release",
      "X-Stage": "Release"
    };
  }

  // Retrieve an API token. Every other request is authorized with it.
  public async getApiToken(): Promise<string> {

    const envelope = await this.request("Token", ULTRALOQ_TOKEN_URL, {

      data: { appid: ULTRALOQ_APP_ID, clientid: ULTRALOQ_CLIENT_ID, timezone: ULTRALOQ_TIMEZONE, uuid: ULTRALOQ_CLIENT_UUID, version: ULTRALOQ_APP_VERSION },
      type: "json"
    });

    const tokenData = tokenSchema.safeParse(this.unwrap("Token", envelope) ?? {});

    if(!tokenData.success || !tokenData.data.token || !tokenData.data.urls?.utec) {

      this.log.debug("Token response is missing the token or the API URL.");

      throw new UltraloqApiError("Invalid token response");
    }

    this._apiToken = tokenData.data.token;
    this._apiBaseUrl = tokenData.data.urls.utec;

    this.log.debug("API token obtained: %s. API URL: %s.", redactToken(this._apiToken), this._apiBaseUrl);

    return this._apiToken;
  }

  // Login to the Ultraloq cloud. We retrieve a fresh API token first, then present our credentials with it.
  public async login(email: string, password: string): Promise<boolean> {

    this.log.debug("Starting authentication for %s.", email);

    const token = await this.getApiToken();

    const envelope = await this.request("Login", ULTRALOQ_LOGIN_URL, {

      data: { data: JSON.stringify({ email: email, password: password }), token: token },
      type: "form"
    }, {}, UltraloqAuthError);

    switch(envelope.code) {

      case 200:

        break;

      case 401:

        throw new UltraloqAuthError("Invalid email or password", { code: envelope.code });

      default:

        throw new UltraloqApiError("Login failed: " + (envelope.description ?? "code " + envelope.code.toString()), { code: envelope.code });
    }

    // A successful login doesn't hand us a new token. The API token we used to login becomes our session token.
    this.accessToken = token;

    const user = loginSchema.safeParse(envelope.data ?? {});

    this.log.debug("Authentication successful, user: %s.", (user.success ? user.data.uuid : undefined) ?? "unknown");

    return true;
  }

  // Retrieve the addresses (homes) defined on this account.
  public async getAddresses(): Promise<UltraloqAddress[]> {

    const token = this.requireToken();

    const envelope = await this.request("Address", ULTRALOQ_ADDRESS_URL, { data: { token: token }, type: "form" });

    return this.validate("Address", addressListSchema, this.unwrap("Address", envelope) ?? []);
  }

  // Retrieve the raw device groups for an address.
  public async getDevices(addressId: number): Promise<UltraloqDeviceGroup[]> {

    const token = this.requireToken();

    const envelope = await this.request("Device list", ULTRALOQ_DEVICE_LIST_URL, {

      // eslint-disable-next-line camelcase
      data: { data: JSON.stringify({ address_id: addressId }), token: token },
      type: "multipart"
    });

    return this.validate("Device list", deviceGroupListSchema, this.unwrap("Device list", envelope) ?? []);
  }

  // Retrieve the locks we support at an address. Anything that isn't a U-Bolt is filtered out.
  public async getLocks(addressId: number): Promise<UltraloqLockConfig[]> {

    const locks: UltraloqLockConfig[] = [];

    for(const group of await this.getDevices(addressId)) {

      for(const device of group.devices) {

        if((device.model !== ULTRALOQ_LOCK_MODEL) || !device.uuid) {

          continue;
        }

        locks.push({

          bridge: device.bridge ?? {},
          groupId: group.id ?? undefined,
          model: device.model,
          name: device.name || device.uuid,
          params: device.params ?? {},
          status: device.status,
          userUid: device.user?.uid?.toString(),
          uuid: device.uuid
        });
      }
    }

    return locks;
  }

  // Find the user identifier the cloud expects as the parameter of lock commands for a device.
  public async getDeviceUserUid(uuid: string, addressId: number): Promise<string> {

    for(const group of await this.getDevices(addressId)) {

      const device = group.devices.find(entry => entry.uuid === uuid);

      if(!device) {

        continue;
      }

      const userUid = device.user?.uid?.toString();

      if(!userUid) {

        throw new UltraloqApiError("No user UID found for device " + uuid);
      }

      return userUid;
    }

    throw new UltraloqNotFoundError("Device " + uuid + " not found");
  }

  // Retrieve the realtime status of a lock.
  public async getLockStatus(uuid: string): Promise<UltraloqLockStatus> {

    const token = this.requireToken();

    const envelope = await this.request("Lock status", ULTRALOQ_DEVICE_STATUS_URL, { data: { data: JSON.stringify({ uuid: uuid }), token: token }, type: "multipart" });
    const status = this.validate("Lock status", lockStatusSchema, this.unwrap("Lock status", envelope) ?? {});

    return {

      battery: status.battery,
      bleStrength: status.ble_strength,
      isJammed: Boolean(status.is_jam),
      isLocked: status.is_locked === 2,
      isUnlocked: status.is_locked === 1,
      lastTime: status.lasttime,
      model: status.model ?? undefined,
      netStrength: status.net_strength,
      online: Boolean(status.online),
      rawLockState: status.is_locked,
      sleep: Boolean(status.sleep),
      timestamp: status.timestamp,
      uuid: status.uuid ?? undefined,
      version: status.version,
      wifiStrength: status.wifi_strength
    };
  }

  // Check whether a lock is reachable over both Bluetooth and the cloud.
  public async checkLockOnline(uuid: string): Promise<UltraloqOnlineStatus> {

    const token = this.requireToken();

    const envelope = await this.request("Online check", ULTRALOQ_DEVICE_ONLINE_URL, { data: { data: JSON.stringify({ uuid: uuid }), token: token }, type: "form" });
    const online = this.validate("Online check", onlineStatusSchema, this.unwrap("Online check", envelope) ?? {});

    const bleOnline = online.ble === 1;
    const remoteOnline = online.remote === 1;

    return { bleOnline: bleOnline, isOnline: bleOnline && remoteOnline, rawData: online, remoteOnline: remoteOnline };
  }

  // Lock a lock.
  public async lock(uuid: string, addressId: number): Promise<boolean> {

    return this.sendLockCommand(uuid, addressId, "LOCK");
  }

  // Unlock a lock.
  public async unlock(uuid: string, addressId: number): Promise<boolean> {

    return this.sendLockCommand(uuid, addressId, "UNLOCK");
  }

  // Flip a lock to the opposite of its current state. We return the new locked state.
  public async toggleLock(uuid: string, addressId: number): Promise<boolean> {

    const status = await this.getLockStatus(uuid);

    if(status.isLocked) {

      await this.unlock(uuid, addressId);

      return false;
    }

    await this.lock(uuid, addressId);

    return true;
  }

  // Send a lock command and verify the lock followed it.
  private async sendLockCommand(uuid: string, addressId: number, action: UltraloqLockAction): Promise<boolean> {

    const token = this.requireToken();

    // The cloud accepts commands for locks it can't reach and silently drops them. Make sure the lock is reachable first.
    const online = await this.checkLockOnline(uuid);

    if(!online.isOnline) {

      throw new UltraloqApiError("Lock is not online (BLE: " + online.bleOnline.toString() + ", Remote: " + online.remoteOnline.toString() + ")");
    }

    const command = {

      // eslint-disable-next-line camelcase
      device_uuid: uuid,
      payload: {

        info: 8,
        param: await this.getDeviceUserUid(uuid, addressId)
      },
      timestamp: Math.floor(Date.now() / 1000),
      topic: (action === "LOCK") ? "lock/lock" : "lock/unlock"
    };

    this.log.debug("%s request: %s.", action, JSON.stringify(command));

    const envelope = await this.request(action, ULTRALOQ_DEVICE_COMMAND_URL, { data: { data: JSON.stringify(command), token: token }, type: "form" }, { platform: "2" });

    this.unwrap(action, envelope);

    this.log.debug("%s accepted for %s.", action, uuid);

    // Give the lock a moment to act before we check on it.
    await sleep(this.verifyDelay * 1000);

    let status: UltraloqLockStatus;

    try {

      status = await this.getLockStatus(uuid);
    } catch(error) {

      // The command was accepted. Not being able to read the result back doesn't make it a failure.
      this.log.warn("Unable to verify the lock state after %s: %s.", action, error instanceof Error ? error.message : error);

      return true;
    }

    const expectedLocked = action === "LOCK";

    if(status.isLocked !== expectedLocked) {

      throw new UltraloqApiError(action + " command failed - expected " + lockStateName(expectedLocked) + ", got " + lockStateName(status.isLocked));
    }

    return true;
  }

  // Forget our tokens. The next request will need a new login.
  public reset(): void {

    this._apiBaseUrl = null;
    this._apiToken = null;
    this.accessToken = null;
  }

  // Ensure we have a token before talking to anything but the token endpoint.
  private requireToken(): string {

    if(!this._apiToken) {

      throw new UltraloqAuthError("Not authenticated - no API token");
    }

    return this._apiToken;
  }

  // Return the payload of a successful response, or throw with the description the cloud gave us.
  private unwrap(label: string, envelope: UltraloqEnvelope): unknown {

    if(envelope.code !== 200) {

      this.log.debug("%s request failed with code %s.", label, envelope.code);

      throw new UltraloqApiError(label + " request failed: " + (envelope.description ?? "Unknown error"), { code: envelope.code });
    }

    return envelope.data;
  }

  // Validate a response payload against its schema.
  private validate<T extends z.ZodTypeAny>(label: string, schema: T, data: unknown): z.output<T> {

    const result = schema.safeParse(data);

    if(!result.success) {

      this.log.debug("%s response failed validation: %s.", label, result.error.message);

      throw new UltraloqApiError("Invalid " + label.toLowerCase() + " response format");
    }

    return result.data;
  }

  // Execute a request against the Ultraloq cloud and parse the response envelope.
  private async request(label: string, url: string, body: UltraloqRequestBody, headers: Record<string, string> = {},
    ErrorType: typeof UltraloqApiError = UltraloqApiError): Promise<UltraloqEnvelope> {

    const requestHeaders: Record<string, string> = { ...this.defaultHeaders, ...headers };
    let payload: FormData | URLSearchParams | string;

    switch(body.type) {

      case "json":

        requestHeaders["Content-Type"] = "application/json; charset=utf-8";
        payload = JSON.stringify(body.data);

        break;

      case "form":

        requestHeaders["Content-Type"] = "application/x-www-form-urlencoded; charset=utf-8";
        payload = new URLSearchParams(body.data);

        break;

      default:

        payload = new FormData();

        for(const [ key, value ] of Object.entries(body.data)) {

          payload.append(key, value);
        }

        break;
    }

    this.log.debug("%s request: POST %s.", label, url);

    let statusCode: number;
    let text: string;

    try {

      const response = await fetch(url, { body: payload, headers: requestHeaders, method: "POST", signal: AbortSignal.timeout(this.timeout * 1000) });

      statusCode = response.status;
      text = await response.text();
    } catch(error) {

      const message = error instanceof Error ? error.message : String(error);

      this.log.debug("%s request network error: %s.", label, message);

      throw new UltraloqApiError("Network error: " + message, {}, { cause: error });
    }

    this.log.debug("%s response status: %s.", label, statusCode);

    if(statusCode !== 200) {

      this.log.debug("%s response body: %s", label, text.slice(0, 200));

      throw new ErrorType(label + " request failed with status " + statusCode.toString(), { statusCode: statusCode });
    }

    let json: unknown;

    try {

      json = JSON.parse(text);
    } catch(error) {

      throw new ErrorType("Invalid " + label.toLowerCase() + " response format: " + text.slice(0, 100), { statusCode: statusCode }, { cause: error });
    }

    const envelope = envelopeSchema.safeParse(json);

    if(!envelope.success) {

      throw new ErrorType("Invalid " + label.toLowerCase() + " response format: " + text.slice(0, 100), { statusCode: statusCode });
    }

    return envelope.data;
  }

  // The base URL the token endpoint handed us.
  public get apiBaseUrl(): string | null {

    return this._apiBaseUrl;
  }

  // Utility to check whether we have an established session.
  public get isAuthenticated(): boolean {

    return this.accessToken !== null;
  }
}

// Utility to describe a lock state in error messages.
function lockStateName(isLocked: boolean): string {

  return isLocked ? "LOCKED" : "UNLOCKED";
}

// Utility to keep tokens out of the logs.
function redactToken(token: string): string {

  return token.slice(0, 8) + "...";
}
