import type { Logging, PlatformConfig } from 'homebridge';
import { type Mock, vi } from 'vitest';
import type { UltraloqAddress, UltraloqLockConfig, UltraloqLockStatus } from '../src/ultraloq-types.js';
import { HomebridgeAPI } from 'homebridge/lib/api.js';
import { UltraloqApi } from '../src/ultraloq-api.js';
import { UltraloqNotFoundError } from '../src/ultraloq-errors.js';
import { UltraloqPlatform } from '../src/ultraloq-platform.js';

export const LOCK_UUID = 'AA:BB:CC:DD:EE:01';
export const SECOND_LOCK_UUID = 'AA:BB:CC:DD:EE:02';

export interface TestLog {
    debug: Mock;
    error: Mock;
    info: Mock;
    log: Mock;
    success: Mock;
    warn: Mock;
}

export const lockConfig = (overrides: Partial<UltraloqLockConfig> = {}): UltraloqLockConfig => ({

    bridge: {},
    groupId: 7,
    model: 'U-Bolt',
    name: 'Front Door',
    params: {},
    status: {},
    userUid: '42',
    uuid: LOCK_UUID,
    ...overrides
});

export const lockStatus = (overrides: Partial<UltraloqLockStatus> = {}): UltraloqLockStatus => ({

    battery: 85,
    bleStrength: 3,
    isJammed: false,
    isLocked: true,
    isUnlocked: false,
    lastTime: 1700000000,
    netStrength: 4,
    online: true,
    rawLockState: 2,
    sleep: false,
    timestamp: 1700000000,
    version: '2.1.7',
    wifiStrength: -60,
    ...overrides
});

// Create a platform on a real Homebridge API instance.
export const createPlatform = (config: Partial<PlatformConfig> = {}): { api: HomebridgeAPI, log: TestLog, platform: UltraloqPlatform } => {

    const log: TestLog = { debug: vi.fn(), error: vi.fn(), info: vi.fn(), log: vi.fn(), success: vi.fn(), warn: vi.fn() };
    const api = new HomebridgeAPI();

    vi.spyOn(api, 'registerPlatformAccessories');
    vi.spyOn(api, 'unregisterPlatformAccessories');
    vi.spyOn(api, 'updatePlatformAccessories');

    const platform = new UltraloqPlatform(log as unknown as Logging, { platform: 'Ultraloq', ...config }, api);

    return { api, log, platform };
};

// An in-process stand-in for the Ultraloq cloud, behind the real API client.
export class FakeCloud {

    public addresses: UltraloqAddress[];
    public readonly api: UltraloqApi;
    public authenticated: boolean;
    public locks: UltraloqLockConfig[];
    public readonly statuses: Map<string, UltraloqLockStatus | Error>;

    constructor() {

        this.addresses = [ { id: 12, name: 'Home' }, { id: 13, name: 'Cabin' } ];
        this.api = new UltraloqApi({ debug: vi.fn(), error: vi.fn(), info: vi.fn(), warn: vi.fn() }, { verifyDelay: 0 });
        this.authenticated = false;
        this.locks = [ lockConfig() ];
        this.statuses = new Map<string, UltraloqLockStatus | Error>([ [ LOCK_UUID, lockStatus() ] ]);

        vi.spyOn(this.api, 'isAuthenticated', 'get').mockImplementation(() => this.authenticated);

        vi.spyOn(this.api, 'login').mockImplementation(async () => {

            this.authenticated = true;

            return true;
        });

        vi.spyOn(this.api, 'reset').mockImplementation(() => {

            this.authenticated = false;
        });

        vi.spyOn(this.api, 'getAddresses').mockImplementation(async () => this.addresses);
        vi.spyOn(this.api, 'getLocks').mockImplementation(async () => this.locks);

        vi.spyOn(this.api, 'getLockStatus').mockImplementation(async (uuid: string) => {

            const status = this.statuses.get(uuid);

            if(!status) {

                throw new UltraloqNotFoundError('Device ' + uuid + ' not found');
            }

            if(status instanceof Error) {

                throw status;
            }

            return status;
        });

        vi.spyOn(this.api, 'lock').mockImplementation(async (uuid: string) => this.setLocked(uuid, true));
        vi.spyOn(this.api, 'unlock').mockImplementation(async (uuid: string) => this.setLocked(uuid, false));
    }

    // Move the bolt of a lock we know about.
    public setLocked(uuid: string, isLocked: boolean): boolean {

        const status = this.statuses.get(uuid);

        if(status && !(status instanceof Error)) {

            this.statuses.set(uuid, { ...status, isLocked: isLocked, isUnlocked: !isLocked, rawLockState: isLocked ? 2 : 1 });
        }

        return true;
    }
}
