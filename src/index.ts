/* Copyright(C) 2024, PW (https://github.com/pwilms). All rights reserved.
 *
 * index.ts: homebridge-ultraloq plugin registration.
 */
import type { API } from "homebridge";
import { PLATFORM_NAME } from "./settings.js";
import { UltraloqPlatform } from "./ultraloq-platform.js";

/**
 * This method registers the platform with Homebridge
 */
export default (api: API): void => {

  api.registerPlatform(PLATFORM_NAME, UltraloqPlatform);
};
