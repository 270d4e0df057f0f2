/**
 * Windows message decoding
 *
 * The Win32 shim forwards the window-procedure messages it cares about,
 * together with the modifier state it samples with GetKeyState (packed
 * into the bits listed in the windows keymap). Key messages carry the
 * virtual key code in wParam. Button messages carry no button code, so
 * the button is derived from the message and reported with the matching
 * VK_*BUTTON code.
 */

import { RawEvent } from '../source/types';

export const WindowsMessage = Object.freeze({
    WM_MOVE: 0x0003,
    WM_SIZE: 0x0005,
    WM_ACTIVATE: 0x0006,
    WM_SETFOCUS: 0x0007,
    WM_KILLFOCUS: 0x0008,
    WM_KEYDOWN: 0x0100,
    WM_KEYUP: 0x0101,
    WM_SYSKEYDOWN: 0x0104,
    WM_SYSKEYUP: 0x0105,
    WM_MOUSEMOVE: 0x0200,
    WM_LBUTTONDOWN: 0x0201,
    WM_LBUTTONUP: 0x0202,
    WM_RBUTTONDOWN: 0x0204,
    WM_RBUTTONUP: 0x0205,
    WM_MBUTTONDOWN: 0x0207,
    WM_MBUTTONUP: 0x0208,
    WM_MOUSEWHEEL: 0x020A,
    WM_EXITSIZEMOVE: 0x0232
} as const);

const VK_LBUTTON = 0x01;
const VK_RBUTTON = 0x02;
const VK_MBUTTON = 0x04;

const SIZE_MINIMIZED = 1;
const WA_INACTIVE = 0;
const WHEEL_DELTA = 120;

/** One message as forwarded by the shim */
export interface WindowsMessageRecord {
    msg: number;
    wParam: number;
    lParam: number;

    /** Modifier mask sampled when the message was handled */
    mods?: number;
}

/** Signed low and high words of a message parameter */
function loWord(value: number): number {
    return (value << 16) >> 16;
}

function hiWord(value: number): number {
    return value >> 16;
}

/**
 * Wheel delta in whole notches, positive toward the user as on macOS.
 * A nonzero delta scrolls at least one notch.
 */
export function wheelNotches(delta: number): number {
    if (delta === 0) return 0;
    const notches = -delta / WHEEL_DELTA;
    const magnitude = Math.max(1, Math.abs(Math.trunc(notches)));
    return notches > 0 ? magnitude : -magnitude;
}

function withMods(event: RawEvent, mods: number | undefined): RawEvent {
    if (mods !== undefined) event.mods = mods;
    return event;
}

/**
 * Convert one forwarded window message into a raw event.
 *
 * @returns The raw event, or null for messages with no input meaning
 */
export function decodeWindowsMessage(record: WindowsMessageRecord): RawEvent | null {
    const { msg, wParam, lParam, mods } = record;
    const x = loWord(lParam);
    const y = hiWord(lParam);

    switch (msg) {
        case WindowsMessage.WM_KEYDOWN:
        case WindowsMessage.WM_SYSKEYDOWN:
            return withMods({ kind: 'keyDown', code: wParam }, mods);
        case WindowsMessage.WM_KEYUP:
        case WindowsMessage.WM_SYSKEYUP:
            return withMods({ kind: 'keyUp', code: wParam }, mods);

        case WindowsMessage.WM_LBUTTONDOWN:
            return withMods({ kind: 'mouseDown', code: VK_LBUTTON, x, y }, mods);
        case WindowsMessage.WM_LBUTTONUP:
            return withMods({ kind: 'mouseUp', code: VK_LBUTTON, x, y }, mods);
        case WindowsMessage.WM_RBUTTONDOWN:
            return withMods({ kind: 'mouseDown', code: VK_RBUTTON, x, y }, mods);
        case WindowsMessage.WM_RBUTTONUP:
            return withMods({ kind: 'mouseUp', code: VK_RBUTTON, x, y }, mods);
        case WindowsMessage.WM_MBUTTONDOWN:
            return withMods({ kind: 'mouseDown', code: VK_MBUTTON, x, y }, mods);
        case WindowsMessage.WM_MBUTTONUP:
            return withMods({ kind: 'mouseUp', code: VK_MBUTTON, x, y }, mods);
        case WindowsMessage.WM_MOUSEMOVE:
            return withMods({ kind: 'mouseMove', x, y }, mods);

        case WindowsMessage.WM_MOUSEWHEEL:
            // Wheel position is in screen coordinates; leave the pointer alone.
            return withMods({ kind: 'scroll', scroll: wheelNotches(hiWord(wParam)) }, mods);

        case WindowsMessage.WM_SIZE:
            return wParam === SIZE_MINIMIZED ? { kind: 'iconified' } : { kind: 'resized' };
        case WindowsMessage.WM_EXITSIZEMOVE:
            return { kind: 'resized' };
        case WindowsMessage.WM_MOVE:
            return { kind: 'moved' };

        case WindowsMessage.WM_ACTIVATE:
            return (wParam & 0xFFFF) === WA_INACTIVE ? { kind: 'focusLost' } : { kind: 'focusGained' };
        case WindowsMessage.WM_SETFOCUS:
            return { kind: 'focusGained' };
        case WindowsMessage.WM_KILLFOCUS:
            return { kind: 'focusLost' };

        default:
            return null;
    }
}
