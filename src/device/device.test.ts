import { describe, test, expect, beforeEach, afterEach, vi } from 'vitest';
import { Key } from '../core/codes';
import { KEY_RELEASED } from '../core/constants';
import { parseKeymap } from '../normalize/keymap';
import { PullEventSource } from '../source/pull-source';
import { PushEventSource } from '../source/push-source';
import { RawEvent, WindowEvent } from '../source/types';
import { Device } from './device';

describe('Device', () => {
    let source: PushEventSource;
    let device: Device;

    beforeEach(() => {
        source = new PushEventSource();
        device = new Device(source);
    });

    afterEach(() => {
        device.dispose();
        vi.restoreAllMocks();
    });

    test('defaults to the browser keymap', () => {
        expect(device.platform).toBe('browser');
        expect(device.latest).toBeNull();
    });

    test('update drains the source and publishes a snapshot', () => {
        source.push({ kind: 'keyDown', code: 'KeyA', mods: 0x1, x: 10, y: 20 });

        const first = device.update();
        expect(first.down.get(Key.A)).toBe(0);
        expect(first.down.get(Key.Shift)).toBe(0);
        expect(first.mx).toBe(10);
        expect(first.tick).toBe(1);
        expect(device.latest).toBe(first);

        source.push({ kind: 'keyUp', code: 'KeyA', mods: 0x1 });
        const second = device.update();
        expect(second.down.get(Key.A)).toBe(KEY_RELEASED);
        expect(second.down.get(Key.Shift)).toBe(1);
        expect(device.tick).toBe(2);
    });

    test('a quick tap is seen held once, then released, then gone', () => {
        source.push({ kind: 'keyDown', code: 'Space' });
        source.push({ kind: 'keyUp', code: 'Space' });

        expect(device.update().down.get(Key.Space)).toBe(0);
        expect(device.update().down.get(Key.Space)).toBe(KEY_RELEASED);
        expect(device.update().down.has(Key.Space)).toBe(false);
    });

    test('pointer query overrides event positions', () => {
        const pull = new PullEventSource(
            () => null,
            () => ({ x: 64, y: 48 })
        );
        const pulled = new Device(pull, { platform: 'macos' });

        const snapshot = pulled.update();
        expect(snapshot.mx).toBe(64);
        expect(snapshot.my).toBe(48);
        pulled.dispose();
    });

    test('resize listeners run immediately and the next snapshot is marked', () => {
        const seen: WindowEvent[] = [];
        const unsubscribe = device.onResize(event => seen.push(event));

        source.pushImmediate({ kind: 'resized' });
        expect(seen).toEqual([{ kind: 'resized' }]);

        expect(device.update().resized).toBe(true);
        expect(device.update().resized).toBe(false);

        unsubscribe();
        source.pushImmediate({ kind: 'moved' });
        expect(seen).toHaveLength(1);
    });

    test('releaseOnResize releases held keys', () => {
        device.dispose();
        source = new PushEventSource();
        device = new Device(source, { releaseOnResize: true });

        source.push({ kind: 'keyDown', code: 'KeyW' });
        device.update();

        source.pushImmediate({ kind: 'resized' });
        expect(device.update().down.get(Key.W)).toBe(KEY_RELEASED);
    });

    test('update from inside update throws', () => {
        let inner: unknown = null;
        const reentrant: Device = new Device(new PullEventSource((): RawEvent | null => {
            try {
                reentrant.update();
            } catch (err) {
                inner = err;
            }
            return null;
        }));

        reentrant.update();
        expect(inner).toBeInstanceOf(Error);
        expect(inner).toHaveProperty('message', 'Device: update() called re-entrantly');
    });

    test('custom keymaps', () => {
        const keymap = parseKeymap({
            platform: 'gamepad-bridge',
            keys: { '0x10': 'Return' },
            buttons: { '1': 'MouseLeft' },
            modifiers: {}
        });
        const custom = new Device(new PushEventSource(), { platform: keymap });
        expect(custom.platform).toBe('gamepad-bridge');
        custom.dispose();
    });

    test('debug logs held codes', () => {
        const log = vi.spyOn(console, 'log').mockImplementation(() => {});
        device.dispose();
        source = new PushEventSource();
        device = new Device(source, { debug: true });

        device.update();
        expect(log).not.toHaveBeenCalled();

        source.push({ kind: 'keyDown', code: 'KeyA' });
        device.update();
        expect(log).toHaveBeenCalledWith('[device] tick 2: A:0');
    });

    test('dispose closes the source', () => {
        device.dispose();
        expect(() => source.push({ kind: 'keyDown', code: 'KeyA' })).toThrow('PushEventSource: push after close');
        expect(() => device.update()).toThrow('Device: update after dispose');
    });
});
