/**
 * Browser event decoding
 *
 * Converts DOM-shaped keyboard, mouse, wheel and focus records into raw
 * events. The records are structural so the same decoder serves a page
 * script (forwarding over WebSocketEventSource) and tests; only the
 * fields used here are required.
 *
 * Key codes are KeyboardEvent.code values, which name the physical key
 * independently of the keyboard layout. Button codes are
 * MouseEvent.button values.
 */

import { RawEvent } from '../source/types';

export const BrowserModifier = Object.freeze({
    Shift: 0x1,
    Control: 0x2,
    Alt: 0x4,
    Meta: 0x8
} as const);

/** Wheel deltaMode values */
const DOM_DELTA_PIXEL = 0;
const DOM_DELTA_LINE = 1;
const DOM_DELTA_PAGE = 2;

/** Pixels per scroll line when the browser reports pixel deltas */
export const PIXELS_PER_LINE = 40;

/** Lines per page when the browser reports page deltas */
export const LINES_PER_PAGE = 3;

interface ModifierState {
    shiftKey: boolean;
    ctrlKey: boolean;
    altKey: boolean;
    metaKey: boolean;
}

export interface BrowserKeyRecord extends ModifierState {
    type: 'keydown' | 'keyup';
    code: string;
    repeat?: boolean;
}

export interface BrowserMouseRecord extends ModifierState {
    type: 'mousedown' | 'mouseup' | 'mousemove';
    button: number;
    offsetX: number;
    offsetY: number;
}

export interface BrowserWheelRecord extends ModifierState {
    type: 'wheel';
    deltaY: number;
    deltaMode: number;
    offsetX: number;
    offsetY: number;
}

export interface BrowserWindowRecord {
    type: 'focus' | 'blur' | 'resize' | 'visibilitychange';
    hidden?: boolean;
}

export type BrowserEventRecord =
    | BrowserKeyRecord
    | BrowserMouseRecord
    | BrowserWheelRecord
    | BrowserWindowRecord;

/**
 * Pack modifier flags into the browser keymap's mask layout.
 */
export function packModifiers(state: ModifierState): number {
    let mods = 0;
    if (state.shiftKey) mods |= BrowserModifier.Shift;
    if (state.ctrlKey) mods |= BrowserModifier.Control;
    if (state.altKey) mods |= BrowserModifier.Alt;
    if (state.metaKey) mods |= BrowserModifier.Meta;
    return mods;
}

/**
 * Wheel delta in whole lines, positive toward the user.
 * A nonzero delta scrolls at least one line.
 */
export function wheelLines(deltaY: number, deltaMode: number): number {
    let lines: number;
    switch (deltaMode) {
        case DOM_DELTA_LINE:
            lines = deltaY;
            break;
        case DOM_DELTA_PAGE:
            lines = deltaY * LINES_PER_PAGE;
            break;
        case DOM_DELTA_PIXEL:
        default:
            lines = deltaY / PIXELS_PER_LINE;
            break;
    }

    if (lines === 0) return 0;
    const whole = Math.trunc(lines);
    const magnitude = Math.max(1, Math.abs(whole));
    return lines > 0 ? magnitude : -magnitude;
}

/**
 * Convert one DOM event record into a raw event.
 *
 * @returns The raw event, or null for auto-repeat keydowns
 */
export function decodeBrowserEvent(record: BrowserEventRecord): RawEvent | null {
    switch (record.type) {
        case 'keydown':
            if (record.repeat) return null;
            return { kind: 'keyDown', code: record.code, mods: packModifiers(record) };
        case 'keyup':
            return { kind: 'keyUp', code: record.code, mods: packModifiers(record) };
        case 'mousedown':
            return {
                kind: 'mouseDown',
                code: record.button,
                mods: packModifiers(record),
                x: record.offsetX,
                y: record.offsetY
            };
        case 'mouseup':
            return {
                kind: 'mouseUp',
                code: record.button,
                mods: packModifiers(record),
                x: record.offsetX,
                y: record.offsetY
            };
        case 'mousemove':
            return { kind: 'mouseMove', x: record.offsetX, y: record.offsetY };
        case 'wheel':
            return {
                kind: 'scroll',
                scroll: wheelLines(record.deltaY, record.deltaMode),
                x: record.offsetX,
                y: record.offsetY
            };
        case 'focus':
            return { kind: 'focusGained' };
        case 'blur':
            return { kind: 'focusLost' };
        case 'resize':
            return { kind: 'resized' };
        case 'visibilitychange':
            return record.hidden ? { kind: 'iconified' } : { kind: 'uniconified' };
    }
}
