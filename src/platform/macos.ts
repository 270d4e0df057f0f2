/**
 * macOS event decoding
 *
 * The Cocoa shim reports input as (event, data) pairs from its view and
 * window delegate callbacks. Mouse buttons arrive on the key channel with
 * codes above the virtual key range; modifier changes arrive as the full
 * NSEvent modifierFlags word.
 */

import { RawEvent } from '../source/types';

export const MacosEvent = Object.freeze({
    Up: 1,
    Down: 2,
    Scroll: 3,
    Modifiers: 4,
    Resized: 5,
    FocusIn: 6,
    FocusOut: 7,
    Moved: 8
} as const);

export const MACOS_MOUSE_LEFT = 0xA0;
export const MACOS_MOUSE_MIDDLE = 0xA1;
export const MACOS_MOUSE_RIGHT = 0xA2;

function isMouseCode(code: number): boolean {
    return code >= MACOS_MOUSE_LEFT && code <= MACOS_MOUSE_RIGHT;
}

/**
 * Convert one shim callback into a raw event.
 *
 * @param event One of the MacosEvent values
 * @param data Key code, button code, scroll delta or modifier flags
 * @returns The raw event, or null for unknown event types
 */
export function decodeMacosEvent(event: number, data: number): RawEvent | null {
    switch (event) {
        case MacosEvent.Down:
            return isMouseCode(data)
                ? { kind: 'mouseDown', code: data }
                : { kind: 'keyDown', code: data };
        case MacosEvent.Up:
            return isMouseCode(data)
                ? { kind: 'mouseUp', code: data }
                : { kind: 'keyUp', code: data };
        case MacosEvent.Scroll:
            // deltaY is fractional for trackpads
            return { kind: 'scroll', scroll: Math.trunc(data) };
        case MacosEvent.Modifiers:
            return { kind: 'modifiers', mods: data };
        case MacosEvent.Resized:
            return { kind: 'resized' };
        case MacosEvent.Moved:
            return { kind: 'moved' };
        case MacosEvent.FocusIn:
            return { kind: 'focusGained' };
        case MacosEvent.FocusOut:
            return { kind: 'focusLost' };
        default:
            return null;
    }
}
