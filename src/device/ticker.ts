/**
 * Ticker - Fixed-rate update loop
 *
 * Calls device.update() on an interval and hands each snapshot to the
 * application. Stops itself when the callback throws.
 *
 * @example
 * const stop = startTicker(device, input => game.step(input), { rate: 60 });
 * // later
 * stop();
 */

import { Snapshot } from '../core/snapshot';
import { Device } from './device';

export interface TickerOptions {
    /** Updates per second (default: 60) */
    rate: number;
}

export const DEFAULT_TICKER_OPTIONS: TickerOptions = {
    rate: 60
};

export type TickCallback = (snapshot: Snapshot) => void;

/** The part of a Device the ticker drives */
export type Updatable = Pick<Device, 'update'>;

/**
 * Start calling `onTick` with a fresh snapshot `rate` times per second.
 *
 * @returns Function that stops the ticker
 */
export function startTicker(
    device: Updatable,
    onTick: TickCallback,
    options: Partial<TickerOptions> = {}
): () => void {
    const { rate } = { ...DEFAULT_TICKER_OPTIONS, ...options };
    if (!Number.isFinite(rate) || rate <= 0) {
        throw new Error(`Ticker rate must be a positive number, got ${rate}`);
    }

    let interval: ReturnType<typeof setInterval> | null = null;

    const stop = (): void => {
        if (interval !== null) {
            clearInterval(interval);
            interval = null;
        }
    };

    interval = setInterval(() => {
        try {
            onTick(device.update());
        } catch (err) {
            stop();
            console.error('[ticker] Tick failed, stopping:', err);
        }
    }, 1000 / rate);

    return stop;
}
