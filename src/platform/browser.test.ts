import { describe, test, expect } from 'vitest';
import { Key } from '../core/codes';
import { PressTracker } from '../core/press-tracker';
import { SnapshotPublisher } from '../core/publisher';
import { loadKeymap } from '../normalize/keymap';
import { EventNormalizer } from '../normalize/normalizer';
import { BrowserEventRecord, decodeBrowserEvent, packModifiers, wheelLines } from './browser';

const NO_MODS = { shiftKey: false, ctrlKey: false, altKey: false, metaKey: false };

describe('Browser decoding', () => {
    test('packModifiers', () => {
        expect(packModifiers(NO_MODS)).toBe(0);
        expect(packModifiers({ ...NO_MODS, shiftKey: true, metaKey: true })).toBe(0x9);
        expect(packModifiers({ shiftKey: true, ctrlKey: true, altKey: true, metaKey: true })).toBe(0xF);
    });

    test('wheelLines converts to lines', () => {
        expect(wheelLines(120, 0)).toBe(3);
        expect(wheelLines(-40, 0)).toBe(-1);
        expect(wheelLines(4, 0)).toBe(1);
        expect(wheelLines(0, 0)).toBe(0);
        expect(wheelLines(-3, 1)).toBe(-3);
        expect(wheelLines(1, 2)).toBe(3);
    });

    test('keyboard records', () => {
        expect(decodeBrowserEvent({ type: 'keydown', code: 'KeyZ', ...NO_MODS, ctrlKey: true }))
            .toEqual({ kind: 'keyDown', code: 'KeyZ', mods: 0x2 });
        expect(decodeBrowserEvent({ type: 'keyup', code: 'KeyZ', ...NO_MODS }))
            .toEqual({ kind: 'keyUp', code: 'KeyZ', mods: 0 });
        expect(decodeBrowserEvent({ type: 'keydown', code: 'KeyZ', repeat: true, ...NO_MODS })).toBeNull();
    });

    test('mouse and wheel records carry the position', () => {
        expect(decodeBrowserEvent({ type: 'mousedown', button: 0, offsetX: 12, offsetY: 34, ...NO_MODS }))
            .toEqual({ kind: 'mouseDown', code: 0, mods: 0, x: 12, y: 34 });
        expect(decodeBrowserEvent({ type: 'mousemove', button: 0, offsetX: 13, offsetY: 35, ...NO_MODS }))
            .toEqual({ kind: 'mouseMove', x: 13, y: 35 });
        expect(decodeBrowserEvent({ type: 'wheel', deltaY: -2, deltaMode: 1, offsetX: 1, offsetY: 1, ...NO_MODS }))
            .toEqual({ kind: 'scroll', scroll: -2, x: 1, y: 1 });
    });

    test('window records', () => {
        expect(decodeBrowserEvent({ type: 'blur' })).toEqual({ kind: 'focusLost' });
        expect(decodeBrowserEvent({ type: 'focus' })).toEqual({ kind: 'focusGained' });
        expect(decodeBrowserEvent({ type: 'resize' })).toEqual({ kind: 'resized' });
        expect(decodeBrowserEvent({ type: 'visibilitychange', hidden: true })).toEqual({ kind: 'iconified' });
        expect(decodeBrowserEvent({ type: 'visibilitychange', hidden: false })).toEqual({ kind: 'uniconified' });
    });

    test('shift+click normalizes to Shift and MouseLeft', () => {
        const tracker = new PressTracker();
        const publisher = new SnapshotPublisher(tracker);
        const normalizer = new EventNormalizer(loadKeymap('browser'), tracker);

        const records: BrowserEventRecord[] = [
            { type: 'keydown', code: 'ShiftLeft', ...NO_MODS, shiftKey: true },
            { type: 'mousedown', button: 0, offsetX: 5, offsetY: 6, ...NO_MODS, shiftKey: true }
        ];
        for (const record of records) {
            const raw = decodeBrowserEvent(record);
            if (raw) normalizer.apply(raw);
        }
        const held = publisher.poll();
        expect([...held.down.keys()].sort((a, b) => a - b)).toEqual([Key.Shift, Key.MouseLeft]);

        const release = decodeBrowserEvent({ type: 'keyup', code: 'ShiftLeft', ...NO_MODS });
        if (release) normalizer.apply(release);
        const released = publisher.poll();
        expect(released.down.get(Key.Shift)).toBeLessThan(0);
        expect(released.down.get(Key.MouseLeft)).toBe(1);
    });
});
