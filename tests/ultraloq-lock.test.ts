import { FakeCloud, LOCK_UUID, type TestLog, createPlatform, lockStatus } from './helpers.js';
import type { PlatformAccessory, PlatformConfig } from 'homebridge';
import { afterEach, describe, expect, it, vi } from 'vitest';
import type { HomebridgeAPI } from 'homebridge/lib/api.js';
import type { MqttClient } from 'homebridge-plugin-utils';
import { UltraloqAccount } from '../src/ultraloq-account.js';
import { UltraloqReservedNames } from '../src/ultraloq-types.js';

describe('UltraloqLock', () => {
    let account: UltraloqAccount;
    let api: HomebridgeAPI;
    let cloud: FakeCloud;
    let log: TestLog;

    // Bring up an account with a single lock and poll it once.
    const setup = async (config: Partial<PlatformConfig> = {}, mqtt: MqttClient | null = null): Promise<PlatformAccessory> => {

        const harness = createPlatform(config);

        api = harness.api;
        log = harness.log;
        cloud = new FakeCloud();
        account = new UltraloqAccount(harness.platform, { email: 'user@example.test', mqttTopic: 'ultraloq', password: 'test-secret' }, cloud.api);
        account.mqtt = mqtt;

        await account.refresh();

        const accessory = harness.platform.accessories[0];

        if(!accessory) {

            throw new Error('The lock was not added to HomeKit.');
        }

        return accessory;
    };

    const currentState = (accessory: PlatformAccessory): unknown =>
        accessory.getService(api.hap.Service.LockMechanism)?.getCharacteristic(api.hap.Characteristic.LockCurrentState).value;

    const targetState = (accessory: PlatformAccessory): unknown =>
        accessory.getService(api.hap.Service.LockMechanism)?.getCharacteristic(api.hap.Characteristic.LockTargetState).value;

    afterEach(() => {
        account.stop();
    });

    it('describes the lock to HomeKit', async () => {
        const accessory = await setup();
        const info = accessory.getService(api.hap.Service.AccessoryInformation);

        expect(accessory.UUID).toBe(api.hap.uuid.generate(LOCK_UUID));
        expect(accessory.context.account).toBe(account.id);
        expect(accessory.context.uuid).toBe(LOCK_UUID);
        expect(info?.getCharacteristic(api.hap.Characteristic.Manufacturer).value).toBe('U-tec');
        expect(info?.getCharacteristic(api.hap.Characteristic.Model).value).toBe('U-Bolt');
        expect(info?.getCharacteristic(api.hap.Characteristic.SerialNumber).value).toBe('AABBCCDDEE01');
        expect(info?.getCharacteristic(api.hap.Characteristic.FirmwareRevision).value).toBe('2.1.7');
    });

    it('reports a locked lock as secured', async () => {
        const accessory = await setup();

        expect(currentState(accessory)).toBe(api.hap.Characteristic.LockCurrentState.SECURED);
        expect(targetState(accessory)).toBe(api.hap.Characteristic.LockTargetState.SECURED);
    });

    it('reports an unlocked lock as unsecured', async () => {
        const accessory = await setup();

        cloud.setLocked(LOCK_UUID, false);
        await account.refresh();

        expect(currentState(accessory)).toBe(api.hap.Characteristic.LockCurrentState.UNSECURED);
        expect(targetState(accessory)).toBe(api.hap.Characteristic.LockTargetState.UNSECURED);
    });

    it('reports a jammed lock', async () => {
        const accessory = await setup();

        cloud.statuses.set(LOCK_UUID, lockStatus({ isJammed: true }));
        await account.refresh();

        expect(currentState(accessory)).toBe(api.hap.Characteristic.LockCurrentState.JAMMED);
    });

    it('reports the battery level', async () => {
        const accessory = await setup();
        const battery = accessory.getService(api.hap.Service.Battery);

        expect(battery?.getCharacteristic(api.hap.Characteristic.BatteryLevel).value).toBe(85);
        expect(battery?.getCharacteristic(api.hap.Characteristic.StatusLowBattery).value).toBe(api.hap.Characteristic.StatusLowBattery.BATTERY_LEVEL_NORMAL);
        expect(battery?.getCharacteristic(api.hap.Characteristic.ChargingState).value).toBe(api.hap.Characteristic.ChargingState.NOT_CHARGEABLE);
    });

    it('reports a low battery below the threshold', async () => {
        const accessory = await setup();

        cloud.statuses.set(LOCK_UUID, lockStatus({ battery: 15 }));
        await account.refresh();

        const battery = accessory.getService(api.hap.Service.Battery);

        expect(battery?.getCharacteristic(api.hap.Characteristic.BatteryLevel).value).toBe(15);
        expect(battery?.getCharacteristic(api.hap.Characteristic.StatusLowBattery).value).toBe(api.hap.Characteristic.StatusLowBattery.BATTERY_LEVEL_LOW);
    });

    it('omits the battery when disabled', async () => {
        const accessory = await setup({ options: [ 'Disable.Battery' ] });

        expect(accessory.getService(api.hap.Service.Battery)).toBeUndefined();
    });

    it('answers with no response when the lock is offline', async () => {
        const accessory = await setup();

        cloud.statuses.set(LOCK_UUID, lockStatus({ online: false }));
        await account.refresh();

        const characteristic = accessory.getService(api.hap.Service.LockMechanism)?.getCharacteristic(api.hap.Characteristic.LockCurrentState);

        await expect(characteristic?.handleGetRequest()).rejects.toBe(api.hap.HAPStatus.SERVICE_COMMUNICATION_FAILURE);
    });

    it('answers with no response when the cloud cannot be reached', async () => {
        const accessory = await setup();

        cloud.authenticated = false;
        vi.mocked(cloud.api.login).mockRejectedValueOnce(new Error('Network error: fetch failed'));
        await account.refresh();

        const characteristic = accessory.getService(api.hap.Service.LockMechanism)?.getCharacteristic(api.hap.Characteristic.LockCurrentState);

        expect(account.lastUpdateSuccess).toBe(false);
        await expect(characteristic?.handleGetRequest()).rejects.toBe(api.hap.HAPStatus.SERVICE_COMMUNICATION_FAILURE);
    });

    it('unlocks from HomeKit', async () => {
        const accessory = await setup();

        await accessory.getService(api.hap.Service.LockMechanism)?.getCharacteristic(api.hap.Characteristic.LockTargetState)
            .handleSetRequest(api.hap.Characteristic.LockTargetState.UNSECURED);

        expect(cloud.api.unlock).toHaveBeenCalledWith(LOCK_UUID, 12);
        expect(currentState(accessory)).toBe(api.hap.Characteristic.LockCurrentState.UNSECURED);
        expect(log.info).toHaveBeenCalledWith('user@example.test: Front Door: Unlocked.');
    });

    it('does not send a command when the lock is already in the requested state', async () => {
        const accessory = await setup();

        await accessory.getService(api.hap.Service.LockMechanism)?.getCharacteristic(api.hap.Characteristic.LockTargetState)
            .handleSetRequest(api.hap.Characteristic.LockTargetState.SECURED);

        expect(cloud.api.lock).not.toHaveBeenCalled();
    });

    it('logs a failed command and keeps the current state', async () => {
        const accessory = await setup();

        vi.mocked(cloud.api.unlock).mockRejectedValueOnce(new Error('Lock is not online (BLE: true, Remote: false)'));

        await accessory.getService(api.hap.Service.LockMechanism)?.getCharacteristic(api.hap.Characteristic.LockTargetState)
            .handleSetRequest(api.hap.Characteristic.LockTargetState.UNSECURED);

        expect(log.error).toHaveBeenCalledWith('user@example.test: Front Door: Unable to unlock: Lock is not online (BLE: true, Remote: false).');
        expect(currentState(accessory)).toBe(api.hap.Characteristic.LockCurrentState.SECURED);
    });

    it('keeps an unlock that lands while a poll is reading the lock status', async () => {
        const accessory = await setup();
        const requestRefresh = vi.spyOn(account, 'requestRefresh');

        let release = (): void => undefined;
        const held = new Promise<void>(resolve => {

            release = resolve;
        });

        vi.mocked(cloud.api.getLockStatus).mockImplementationOnce(async () => {

            await held;

            return lockStatus();
        });

        const poll = account.refresh();
        const command = accessory.getService(api.hap.Service.LockMechanism)?.getCharacteristic(api.hap.Characteristic.LockTargetState)
            .handleSetRequest(api.hap.Characteristic.LockTargetState.UNSECURED);

        await vi.waitFor(() => expect(requestRefresh).toHaveBeenCalled());

        release();

        await expect(poll).resolves.toBe(true);
        await command;

        expect(cloud.api.getLockStatus).toHaveBeenCalledTimes(3);
        expect(currentState(accessory)).toBe(api.hap.Characteristic.LockCurrentState.UNSECURED);
        expect(targetState(accessory)).toBe(api.hap.Characteristic.LockTargetState.UNSECURED);
        expect(log.info).not.toHaveBeenCalledWith('user@example.test: Front Door: Locked.');
    });

    it('uses a configured low battery threshold', async () => {
        const accessory = await setup({ options: [ 'Enable.Battery.LowLevel.30' ] });

        cloud.statuses.set(LOCK_UUID, lockStatus({ battery: 25 }));
        await account.refresh();

        const battery = accessory.getService(api.hap.Service.Battery);

        expect(battery?.getCharacteristic(api.hap.Characteristic.StatusLowBattery).value).toBe(api.hap.Characteristic.StatusLowBattery.BATTERY_LEVEL_LOW);
    });

    it('does not log lock events when disabled', async () => {
        const accessory = await setup({ options: [ 'Disable.Log.Lock' ] });

        cloud.setLocked(LOCK_UUID, false);
        await account.refresh();

        expect(currentState(accessory)).toBe(api.hap.Characteristic.LockCurrentState.UNSECURED);
        expect(log.info).not.toHaveBeenCalledWith('user@example.test: Front Door: Unlocked.');
    });

    it('adds a lock trigger switch when enabled', async () => {
        const accessory = await setup({ options: [ 'Enable.Lock.Trigger' ] });
        const trigger = accessory.getServiceById(api.hap.Service.Switch, UltraloqReservedNames.SWITCH_LOCK_TRIGGER);

        expect(trigger?.getCharacteristic(api.hap.Characteristic.On).value).toBe(false);

        await trigger?.getCharacteristic(api.hap.Characteristic.On).handleSetRequest(true);

        expect(cloud.api.unlock).toHaveBeenCalledWith(LOCK_UUID, 12);
        expect(trigger?.getCharacteristic(api.hap.Characteristic.On).value).toBe(true);
    });

    it('locks when the lock trigger switch is turned off', async () => {
        const accessory = await setup({ options: [ 'Enable.Lock.Trigger' ] });
        const trigger = accessory.getServiceById(api.hap.Service.Switch, UltraloqReservedNames.SWITCH_LOCK_TRIGGER);

        cloud.setLocked(LOCK_UUID, false);
        await account.refresh();

        expect(trigger?.getCharacteristic(api.hap.Characteristic.On).value).toBe(true);

        await trigger?.getCharacteristic(api.hap.Characteristic.On).handleSetRequest(false);

        expect(cloud.api.lock).toHaveBeenCalledWith(LOCK_UUID, 12);
        expect(trigger?.getCharacteristic(api.hap.Characteristic.On).value).toBe(false);
        expect(currentState(accessory)).toBe(api.hap.Characteristic.LockCurrentState.SECURED);
    });

    it('has no lock trigger switch by default', async () => {
        const accessory = await setup();

        expect(accessory.getServiceById(api.hap.Service.Switch, UltraloqReservedNames.SWITCH_LOCK_TRIGGER)).toBeUndefined();
    });

    describe('MQTT', () => {
        const createMqtt = () => {

            const publish = vi.fn<(id: string, topic: string, message: string) => void>();
            const subscribeGet = vi.fn<(id: string, topic: string, type: string, getValue: () => string) => void>();
            const subscribeSet = vi.fn<(id: string, topic: string, type: string, setValue: (value: string) => void) => void>();
            const unsubscribe = vi.fn<(id: string, topic: string) => void>();

            return { client: { publish, subscribeGet, subscribeSet, unsubscribe } as unknown as MqttClient, publish, subscribeGet, subscribeSet };
        };

        // Find the handler a lock registered for a topic.
        const handler = (mock: { mock: { calls: unknown[][] } }, topic: string): ((value: string) => unknown) => {

            const registered: unknown = mock.mock.calls.find(call => call[1] === topic)?.[3];

            if(typeof registered !== 'function') {

                throw new Error('Nothing is subscribed to ' + topic + '.');
            }

            return (value: string): unknown => registered(value);
        };

        it('publishes the lock state when it changes', async () => {
            const mqtt = createMqtt();
            const accessory = await setup({}, mqtt.client);

            expect(mqtt.publish).toHaveBeenCalledWith('AABBCCDDEE01', 'lock', 'true');

            await accessory.getService(api.hap.Service.LockMechanism)?.getCharacteristic(api.hap.Characteristic.LockTargetState)
                .handleSetRequest(api.hap.Characteristic.LockTargetState.UNSECURED);

            expect(mqtt.publish).toHaveBeenLastCalledWith('AABBCCDDEE01', 'lock', 'false');
        });

        it('answers lock, battery and status requests', async () => {
            const mqtt = createMqtt();

            await setup({}, mqtt.client);

            expect(handler(mqtt.subscribeGet, 'lock')('')).toBe('true');
            expect(handler(mqtt.subscribeGet, 'battery')('')).toBe('85');
            expect(handler(mqtt.subscribeGet, 'status')('')).toBe(JSON.stringify({

                battery: 85,
                bleStrength: 3,
                lastTime: 1700000000,
                netStrength: 4,
                online: true,
                sleep: false,
                timestamp: 1700000000,
                version: '2.1.7',
                wifiStrength: -60
            }));
        });

        it('locks and unlocks on request', async () => {
            const mqtt = createMqtt();
            const accessory = await setup({}, mqtt.client);
            const setLock = handler(mqtt.subscribeSet, 'lock');

            setLock('false');

            await vi.waitFor(() => expect(currentState(accessory)).toBe(api.hap.Characteristic.LockCurrentState.UNSECURED));
            expect(cloud.api.unlock).toHaveBeenCalledWith(LOCK_UUID, 12);

            setLock('true');

            await vi.waitFor(() => expect(currentState(accessory)).toBe(api.hap.Characteristic.LockCurrentState.SECURED));
            expect(cloud.api.lock).toHaveBeenCalledWith(LOCK_UUID, 12);
        });

        it('rejects an unknown lock request', async () => {
            const mqtt = createMqtt();

            await setup({}, mqtt.client);

            handler(mqtt.subscribeSet, 'lock')('open');

            expect(log.error).toHaveBeenCalledWith('user@example.test: Front Door: MQTT: Unknown lock set message received: open.');
            expect(cloud.api.lock).not.toHaveBeenCalled();
            expect(cloud.api.unlock).not.toHaveBeenCalled();
        });
    });
});
