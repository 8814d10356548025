/* Copyright(C) 2022-2024, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * settings.ts: Settings and constants for homebridge-ultraloq.
 */
// The name of our plugin.
export const PLUGIN_NAME = "homebridge-ultraloq";

// The platform the plugin creates.
export const PLATFORM_NAME = "Ultraloq";

// How often, in seconds, should we poll the Ultraloq cloud for lock status.
export const ULTRALOQ_ACCOUNT_REFRESH_INTERVAL = 300;

// Minimum polling interval, in seconds, we allow users to configure.
export const ULTRALOQ_ACCOUNT_REFRESH_INTERVAL_MIN = 30;

// Default battery level, in percent, below which we report a low battery.
export const ULTRALOQ_BATTERY_LOW_LEVEL = 20;

// How long, in seconds, we wait after a lock command before verifying the lock state.
export const ULTRALOQ_COMMAND_VERIFY_DELAY = 2;

// How long, in seconds, we wait for the Ultraloq cloud to respond to a request.
export const ULTRALOQ_REQUEST_TIMEOUT = 30;

// Default MQTT topic to use when publishing events. This is in the form of: ultraloq/UUID/event
export const ULTRALOQ_MQTT_TOPIC = "ultraloq";

// The model name the Ultraloq cloud uses for the locks we support.
export const ULTRALOQ_LOCK_MODEL = "U-Bolt";

// Manufacturer reported to HomeKit.
export const ULTRALOQ_MANUFACTURER = "U-tec";

// Ultraloq cloud endpoints.
export const ULTRALOQ_TOKEN_URL = "https://uemc.u-tec.com/app/token";
export const ULTRALOQ_LOGIN_URL = "https://cloud.u-tec.com/app/user/login";
export const ULTRALOQ_ADDRESS_URL = "https://cloud.u-tec.com/app/address";
export const ULTRALOQ_DEVICE_LIST_URL = "https://cloud.u-tec.com/app/device/list/address";
export const ULTRALOQ_DEVICE_STATUS_URL = "https://cloud.u-tec.com/app/device/status";
export const ULTRALOQ_DEVICE_COMMAND_URL = "https://cloud.u-tec.com/app/device/lock/logs/add";
export const ULTRALOQ_DEVICE_ONLINE_URL = "https://cloud.u-tec.com/app/device/lock/share/get/isopen";

// The Ultraloq cloud only talks to clients that identify themselves as the U home mobile app.
export const ULTRALOQ_APP_ID = "13ca0de1e6054747c44665ae13e36c2c";
export const ULTRALOQ_APP_VERSION = "3.2";
export const ULTRALOQ_CLIENT_ID = "1375ac0809878483ee236497d57f371f";
export const ULTRALOQ_CLIENT_UUID = "77b7de5d1a5efd83";
export const ULTRALOQ_TIMEZONE = "-8";
export const ULTRALOQ_API_VERSION = "3.3";
export const ULTRALOQ_USER_AGENT = "U home/3.2.9.2 (Linux; U; Android 12; Android SDK built for arm64 Build/SE1A.220621.001)";
