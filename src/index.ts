/**
 * device-input - Per-tick keyboard and mouse snapshots for a window
 *
 * Features:
 * - Platform-independent key, button and modifier codes
 * - Hold durations counted in ticks, with one-shot release reporting
 * - Push, pull and WebSocket-relayed event sources
 * - Keymaps for macOS, Windows and browsers
 */

// ============================================
// Core
// ============================================
export {
    Key,
    CODE_RANGES,
    codeName,
    rangeOf,
    isKeyName,
    isModifier,
    isMouseButton,
    KEY_RELEASED,
    DEFAULT_QUEUE_CAPACITY,
    DEFAULT_MAX_PER_DRAIN,
    PressTracker,
    SnapshotPublisher,
    isReleased,
    heldTicks,
    isDown,
    justPressed,
    justReleased,
    describeDown
} from './core';

export type {
    InputCode,
    KeyName,
    CodeRange,
    CodeRangeName,
    Snapshot
} from './core';

// ============================================
// Normalization
// ============================================
export { EventNormalizer } from './normalize/normalizer';
export type { NormalizerOptions } from './normalize/normalizer';
export { loadKeymap, parseKeymap, parseNativeCode, isPlatformName, PLATFORM_NAMES } from './normalize/keymap';
export type { Keymap, KeymapFile, ModifierBit, PlatformName } from './normalize/keymap';

// ============================================
// Sources
// ============================================
export * from './source';

// ============================================
// Platform decoders
// ============================================
export * from './platform';

// ============================================
// Device
// ============================================
export { Device } from './device/device';
export type { ResizeListener } from './device/device';
export { DEFAULT_DEVICE_CONFIG } from './device/config';
export type { DeviceConfig } from './device/config';
export { startTicker, DEFAULT_TICKER_OPTIONS } from './device/ticker';
export type { TickerOptions, TickCallback, Updatable } from './device/ticker';
