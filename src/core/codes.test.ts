import { describe, test, expect } from 'vitest';
import { CODE_RANGES, Key, codeName, isKeyName, isModifier, isMouseButton, rangeOf } from './codes';

describe('Canonical codes', () => {
    test('every code is unique', () => {
        const codes = Object.values(Key);
        expect(new Set(codes).size).toBe(codes.length);
    });

    test('every code falls inside a range', () => {
        for (const [name, code] of Object.entries(Key)) {
            expect(rangeOf(code), name).not.toBeNull();
        }
    });

    test('ranges are ascending and disjoint', () => {
        for (let i = 1; i < CODE_RANGES.length; i++) {
            expect(CODE_RANGES[i].first).toBeGreaterThan(CODE_RANGES[i - 1].last);
        }
    });

    test('ranges classify codes', () => {
        expect(rangeOf(Key.Return)).toBe('editing');
        expect(rangeOf(Key.Digit7)).toBe('digit');
        expect(rangeOf(Key.Q)).toBe('letter');
        expect(rangeOf(Key.PageDown)).toBe('navigation');
        expect(rangeOf(Key.F20)).toBe('function');
        expect(rangeOf(Key.KeypadEquals)).toBe('keypad');
        expect(rangeOf(Key.Command)).toBe('modifier');
        expect(rangeOf(Key.MouseMiddle)).toBe('mouse');
        expect(rangeOf(0x20)).toBeNull();
        expect(rangeOf(0x1000)).toBeNull();
    });

    test('codeName looks codes up by value', () => {
        expect(codeName(Key.A)).toBe('A');
        expect(codeName(0xE1)).toBe('Shift');
        expect(codeName(0x200)).toBeNull();
    });

    test('isKeyName only accepts table names', () => {
        expect(isKeyName('Escape')).toBe(true);
        expect(isKeyName('escape')).toBe(false);
        expect(isKeyName('toString')).toBe(false);
    });

    test('modifier and mouse predicates', () => {
        expect(isModifier(Key.Shift)).toBe(true);
        expect(isModifier(Key.A)).toBe(false);
        expect(isMouseButton(Key.MouseRight)).toBe(true);
        expect(isMouseButton(Key.Function)).toBe(false);
    });
});
