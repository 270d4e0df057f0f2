/**
 * Device Configuration
 */

import { Keymap, PlatformName } from '../normalize/keymap';

/**
 * Configuration for a Device.
 */
export interface DeviceConfig {
    /** Built-in keymap to use, or a custom keymap (default: 'browser') */
    platform: PlatformName | Keymap;
    /** Release every held code when the window is resized or moved (default: false) */
    releaseOnResize: boolean;
    /** Log unmapped codes and each published snapshot (default: false) */
    debug: boolean;
}

/**
 * Default device configuration.
 */
export const DEFAULT_DEVICE_CONFIG: DeviceConfig = {
    platform: 'browser',
    releaseOnResize: false,
    debug: false
};
