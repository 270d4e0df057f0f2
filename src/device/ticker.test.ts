import { describe, test, expect, beforeEach, afterEach, vi } from 'vitest';
import { Snapshot } from '../core/snapshot';
import { PushEventSource } from '../source/push-source';
import { Device } from './device';
import { startTicker } from './ticker';

describe('startTicker', () => {
    let source: PushEventSource;
    let device: Device;

    beforeEach(() => {
        vi.useFakeTimers();
        source = new PushEventSource();
        device = new Device(source);
    });

    afterEach(() => {
        device.dispose();
        vi.useRealTimers();
        vi.restoreAllMocks();
    });

    test('updates the device at the given rate', () => {
        const ticks: number[] = [];
        const stop = startTicker(device, snapshot => ticks.push(snapshot.tick), { rate: 10 });

        vi.advanceTimersByTime(350);
        expect(ticks).toEqual([1, 2, 3]);

        stop();
        vi.advanceTimersByTime(1000);
        expect(ticks).toEqual([1, 2, 3]);
    });

    test('defaults to 60 updates per second', () => {
        const onTick = vi.fn();
        const stop = startTicker(device, onTick);

        vi.advanceTimersByTime(15);
        expect(onTick).not.toHaveBeenCalled();
        vi.advanceTimersByTime(2);
        expect(onTick).toHaveBeenCalledTimes(1);
        vi.advanceTimersByTime(17);
        expect(onTick).toHaveBeenCalledTimes(2);
        stop();
    });

    test('a throwing callback stops the ticker', () => {
        const error = vi.spyOn(console, 'error').mockImplementation(() => {});
        const failure = new Error('game over');
        const seen: Snapshot[] = [];

        startTicker(device, snapshot => {
            seen.push(snapshot);
            throw failure;
        }, { rate: 20 });

        vi.advanceTimersByTime(500);
        expect(seen).toHaveLength(1);
        expect(error).toHaveBeenCalledWith('[ticker] Tick failed, stopping:', failure);
    });

    test('rejects invalid rates', () => {
        expect(() => startTicker(device, () => {}, { rate: 0 })).toThrow('Ticker rate must be a positive number, got 0');
    });
});
