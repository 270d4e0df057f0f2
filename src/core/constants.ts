/**
 * Input Constants
 */

/**
 * Added to a hold duration when the code is released.
 *
 * A released entry keeps its held duration, recoverable as
 * `duration - KEY_RELEASED`. At 60 updates per second a key would need to
 * be held for more than six months before a released duration turned
 * positive.
 */
export const KEY_RELEASED = -1_000_000_000;

/** Default capacity of the push-model event buffer */
export const DEFAULT_QUEUE_CAPACITY = 256;

/** Default cap on events read from a pull-model source per tick */
export const DEFAULT_MAX_PER_DRAIN = 1024;
