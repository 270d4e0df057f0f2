/**
 * Canonical Input Codes
 *
 * Every physical key, mouse button and modifier has exactly one code,
 * identical on every platform. Codes are grouped into disjoint ranges so
 * a code's category can be read from its value.
 */

/** A canonical input code (a value of the Key table) */
export type InputCode = number;

/** Code range categories */
export type CodeRangeName =
    | 'editing'
    | 'digit'
    | 'navigation'
    | 'letter'
    | 'function'
    | 'keypad'
    | 'modifier'
    | 'mouse';

/** Inclusive code range */
export interface CodeRange {
    name: CodeRangeName;
    first: InputCode;
    last: InputCode;
}

/**
 * The code domain, in ascending order. Ranges never overlap.
 */
export const CODE_RANGES: readonly CodeRange[] = [
    { name: 'editing', first: 0x01, last: 0x1F },
    { name: 'digit', first: 0x30, last: 0x39 },
    { name: 'letter', first: 0x41, last: 0x5A },
    { name: 'navigation', first: 0x60, last: 0x6F },
    { name: 'function', first: 0x70, last: 0x83 },
    { name: 'keypad', first: 0x90, last: 0xA1 },
    { name: 'modifier', first: 0xE0, last: 0xE7 },
    { name: 'mouse', first: 0xF0, last: 0xF7 }
];

/**
 * Canonical codes for every supported key, button and modifier.
 */
export const Key = Object.freeze({
    // Editing and punctuation
    Return: 0x01,
    Tab: 0x02,
    Space: 0x03,
    Delete: 0x04,
    Escape: 0x05,
    Equal: 0x06,
    Minus: 0x07,
    LeftBracket: 0x08,
    RightBracket: 0x09,
    Quote: 0x0A,
    Semicolon: 0x0B,
    Backslash: 0x0C,
    Comma: 0x0D,
    Slash: 0x0E,
    Period: 0x0F,
    Grave: 0x10,

    // Digits
    Digit0: 0x30,
    Digit1: 0x31,
    Digit2: 0x32,
    Digit3: 0x33,
    Digit4: 0x34,
    Digit5: 0x35,
    Digit6: 0x36,
    Digit7: 0x37,
    Digit8: 0x38,
    Digit9: 0x39,

    // Letters
    A: 0x41,
    B: 0x42,
    C: 0x43,
    D: 0x44,
    E: 0x45,
    F: 0x46,
    G: 0x47,
    H: 0x48,
    I: 0x49,
    J: 0x4A,
    K: 0x4B,
    L: 0x4C,
    M: 0x4D,
    N: 0x4E,
    O: 0x4F,
    P: 0x50,
    Q: 0x51,
    R: 0x52,
    S: 0x53,
    T: 0x54,
    U: 0x55,
    V: 0x56,
    W: 0x57,
    X: 0x58,
    Y: 0x59,
    Z: 0x5A,

    // Navigation
    Home: 0x60,
    End: 0x61,
    PageUp: 0x62,
    PageDown: 0x63,
    ForwardDelete: 0x64,
    LeftArrow: 0x65,
    RightArrow: 0x66,
    UpArrow: 0x67,
    DownArrow: 0x68,

    // Function keys
    F1: 0x70,
    F2: 0x71,
    F3: 0x72,
    F4: 0x73,
    F5: 0x74,
    F6: 0x75,
    F7: 0x76,
    F8: 0x77,
    F9: 0x78,
    F10: 0x79,
    F11: 0x7A,
    F12: 0x7B,
    F13: 0x7C,
    F14: 0x7D,
    F15: 0x7E,
    F16: 0x7F,
    F17: 0x80,
    F18: 0x81,
    F19: 0x82,
    F20: 0x83,

    // Keypad
    Keypad0: 0x90,
    Keypad1: 0x91,
    Keypad2: 0x92,
    Keypad3: 0x93,
    Keypad4: 0x94,
    Keypad5: 0x95,
    Keypad6: 0x96,
    Keypad7: 0x97,
    Keypad8: 0x98,
    Keypad9: 0x99,
    KeypadDecimal: 0x9A,
    KeypadMultiply: 0x9B,
    KeypadPlus: 0x9C,
    KeypadClear: 0x9D,
    KeypadDivide: 0x9E,
    KeypadEnter: 0x9F,
    KeypadMinus: 0xA0,
    KeypadEquals: 0xA1,

    // Modifiers
    Control: 0xE0,
    Shift: 0xE1,
    Alt: 0xE2,
    Command: 0xE3,
    Function: 0xE4,

    // Mouse buttons are treated like keys
    MouseLeft: 0xF0,
    MouseMiddle: 0xF1,
    MouseRight: 0xF2
} as const);

/** Name of a canonical code, e.g. 'Shift' */
export type KeyName = keyof typeof Key;

/**
 * Check whether a string names a canonical code.
 */
export function isKeyName(name: string): name is KeyName {
    return Object.prototype.hasOwnProperty.call(Key, name);
}

const namesByCode = new Map<InputCode, KeyName>();
for (const [name, code] of Object.entries(Key)) {
    if (isKeyName(name)) namesByCode.set(code, name);
}

/**
 * Look up the name of a code.
 *
 * @returns The key name, or null if the code is not canonical
 */
export function codeName(code: InputCode): KeyName | null {
    return namesByCode.get(code) ?? null;
}

/**
 * Find the range a code belongs to, or null when it falls outside every range.
 */
export function rangeOf(code: InputCode): CodeRangeName | null {
    for (const range of CODE_RANGES) {
        if (code >= range.first && code <= range.last) {
            return range.name;
        }
    }
    return null;
}

/** True for Control, Shift, Alt, Command and Function */
export function isModifier(code: InputCode): boolean {
    return rangeOf(code) === 'modifier';
}

/** True for mouse buttons */
export function isMouseButton(code: InputCode): boolean {
    return rangeOf(code) === 'mouse';
}
