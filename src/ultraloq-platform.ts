/* Copyright(C) 2017-2025, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * ultraloq-platform.ts: homebridge-ultraloq platform class.
 */
import type { API, DynamicPlatformPlugin, Logging, PlatformAccessory, PlatformConfig } from "homebridge";
import { PLATFORM_NAME, PLUGIN_NAME } from "./settings.js";
import { type UltraloqAccountOptions, type UltraloqOptions, featureOptionCategories, featureOptions } from "./ultraloq-options.js";
import { FeatureOptions } from "homebridge-plugin-utils";
import { accountConfigSchema } from "./ultraloq-schemas.js";
import { UltraloqAccount } from "./ultraloq-account.js";
import util from "node:util";

export class UltraloqPlatform implements DynamicPlatformPlugin {

  public accessories: PlatformAccessory[];
  public readonly accounts: UltraloqAccount[];
  public readonly api: API;
  public readonly config: UltraloqOptions;
  public readonly featureOptions: FeatureOptions;
  public readonly log: Logging;

  constructor(log: Logging, config: PlatformConfig | undefined, api: API) {

    this.accessories = [];
    this.accounts = [];
    this.api = api;
    this.featureOptions = new FeatureOptions(featureOptionCategories, featureOptions, this.parseOptions(config?.options));
    this.log = log;

    // Plugin options into our config variables.
    this.config = {

      accounts: this.parseAccounts(config?.accounts),
      debugAll: config?.debugAll === true,
      options: this.parseOptions(config?.options)
    };

    // We need an Ultraloq account configured to do anything.
    if(!this.config.accounts.length) {

      this.log.info("No Ultraloq accounts have been configured.");

      return;
    }

    // Debugging - most people shouldn't enable this.
    this.debug("Debug logging on. Expect a lot of data.");

    // Loop through each configured account and instantiate it.
    for(const accountConfig of this.config.accounts) {

      // We need login credentials or we're skipping this one.
      if(!accountConfig.email || !accountConfig.password) {

        this.log.info("No Ultraloq login credentials have been configured.");

        continue;
      }

      this.accounts.push(new UltraloqAccount(this, accountConfig));
    }

    // Avoid a prospective race condition by waiting to configure our accounts until Homebridge is done loading all the cached accessories it knows about, and calling
    // configureAccessory() on each.
    api.on("didFinishLaunching", this.launchAccounts.bind(this));

    // Stop polling when Homebridge shuts down.
    api.on("shutdown", () => this.accounts.forEach(account => account.stop()));
  }

  // This gets called when homebridge restores cached accessories at startup. We intentionally avoid doing anything significant here, and save all that logic
  // for device discovery.
  public configureAccessory(accessory: PlatformAccessory): void {

    // Add this to the accessory array so we can track it.
    this.accessories.push(accessory);
  }

  // Launch our configured accounts once all accessories have been loaded. Once we do, they will sustain themselves.
  private launchAccounts(): void {

    // Remove cached accessories that belong to accounts we no longer have configured.
    const accountIds = this.accounts.map(account => account.id);
    const orphans = this.accessories.filter(accessory => !accountIds.includes(accessory.context.account));

    for(const accessory of orphans) {

      this.log.info("%s: Removing device from HomeKit.", accessory.displayName);
      this.accessories.splice(this.accessories.indexOf(accessory), 1);
    }

    if(orphans.length) {

      this.api.unregisterPlatformAccessories(PLUGIN_NAME, PLATFORM_NAME, orphans);
    }

    // Iterate through all our accounts and startup.
    for(const account of this.accounts) {

      // Login to the Ultraloq cloud.
      void account.login();
    }
  }

  // Validate the accounts we've been given in the plugin configuration.
  private parseAccounts(accounts: unknown): UltraloqAccountOptions[] {

    if(!Array.isArray(accounts)) {

      return [];
    }

    const parsed: UltraloqAccountOptions[] = [];

    for(const entry of accounts) {

      const result = accountConfigSchema.safeParse(entry);

      if(!result.success) {

        this.log.error("Ignoring an invalid account configuration entry.");

        continue;
      }

      parsed.push(result.data);
    }

    return parsed;
  }

  // Validate the feature options we've been given in the plugin configuration.
  private parseOptions(options: unknown): string[] {

    return Array.isArray(options) ? options.filter((option): option is string => typeof option === "string") : [];
  }

  // Utility for debug logging.
  public debug(message: string, ...parameters: unknown[]): void {

    if(this.config.debugAll) {

      this.log.info(util.format(message, ...parameters));
    }
  }
}
