/**
 * Platform Keymaps
 *
 * Tables from native key, button and modifier codes to canonical codes.
 * The tables for the supported platforms live in ./keymaps/*.json.
 *
 * Keymap files use hex ('0x1F') or decimal ('2') strings for numeric
 * native codes; any other key is taken as a named code (browser
 * KeyboardEvent.code values such as 'KeyA').
 */

import { InputCode, Key, isKeyName } from '../core/codes';
import { NativeCode } from '../source/types';
import macosKeymap from './keymaps/macos.json';
import windowsKeymap from './keymaps/windows.json';
import browserKeymap from './keymaps/browser.json';

export type PlatformName = 'macos' | 'windows' | 'browser';

export const PLATFORM_NAMES: readonly PlatformName[] = ['macos', 'windows', 'browser'];

/** A modifier bit and the canonical modifier it stands for */
export interface ModifierBit {
    mask: number;
    code: InputCode;
}

export interface Keymap {
    platform: string;
    keys: ReadonlyMap<NativeCode, InputCode>;
    buttons: ReadonlyMap<NativeCode, InputCode>;
    modifiers: readonly ModifierBit[];
}

/** Keymap file layout: native code -> canonical key name */
export interface KeymapFile {
    platform: string;
    keys: Record<string, string>;
    buttons: Record<string, string>;
    modifiers: Record<string, string>;
}

const keymapFiles: Record<PlatformName, KeymapFile> = {
    macos: macosKeymap,
    windows: windowsKeymap,
    browser: browserKeymap
};

const loaded = new Map<PlatformName, Keymap>();

export function isPlatformName(value: unknown): value is PlatformName {
    return typeof value === 'string' && PLATFORM_NAMES.some(name => name === value);
}

/**
 * Parse a native code written as a keymap file key.
 */
export function parseNativeCode(text: string): NativeCode {
    if (/^0x[0-9a-f]+$/i.test(text) || /^\d+$/.test(text)) {
        return Number(text);
    }
    return text;
}

function resolveName(platform: string, table: string, name: string): InputCode {
    if (!isKeyName(name)) {
        throw new Error(`Keymap '${platform}' ${table}: unknown key name '${name}'`);
    }
    return Key[name];
}

function parseTable(platform: string, table: string, entries: Record<string, string>): Map<NativeCode, InputCode> {
    const result = new Map<NativeCode, InputCode>();
    for (const [native, name] of Object.entries(entries)) {
        result.set(parseNativeCode(native), resolveName(platform, table, name));
    }
    return result;
}

/**
 * Build a keymap from its file form.
 * Throws on unknown key names and on non-numeric modifier masks.
 */
export function parseKeymap(file: KeymapFile): Keymap {
    const modifiers: ModifierBit[] = [];
    for (const [mask, name] of Object.entries(file.modifiers)) {
        const bit = parseNativeCode(mask);
        if (typeof bit !== 'number' || bit === 0) {
            throw new Error(`Keymap '${file.platform}' modifiers: invalid mask '${mask}'`);
        }
        modifiers.push({ mask: bit, code: resolveName(file.platform, 'modifiers', name) });
    }

    return {
        platform: file.platform,
        keys: parseTable(file.platform, 'keys', file.keys),
        buttons: parseTable(file.platform, 'buttons', file.buttons),
        modifiers
    };
}

/**
 * Get the built-in keymap for a platform. Parsed once, then cached.
 */
export function loadKeymap(platform: PlatformName): Keymap {
    let keymap = loaded.get(platform);
    if (!keymap) {
        keymap = parseKeymap(keymapFiles[platform]);
        loaded.set(platform, keymap);
    }
    return keymap;
}
