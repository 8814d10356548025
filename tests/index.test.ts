import { describe, expect, it, vi } from 'vitest';
import { HomebridgeAPI } from 'homebridge/lib/api.js';
import { UltraloqPlatform } from '../src/ultraloq-platform.js';
import registerPlatform from '../src/index.js';

describe('Platform Registration', () => {
    it('should register the platform with Homebridge', () => {
        const api = new HomebridgeAPI();
        const spy = vi.spyOn(api, 'registerPlatform').mockImplementation(() => undefined);

        // Call the function that registers the platform
        registerPlatform(api);

        // Check that registerPlatform was called with the correct platform name and class
        expect(spy).toHaveBeenCalledWith('Ultraloq', UltraloqPlatform);
    });
});
