/**
 * Relay message decoding
 *
 * Raw events arriving over a relay (see WebSocketEventSource) are JSON
 * objects with the same fields as RawEvent, or arrays of them:
 *
 *   { "kind": "keyDown", "code": "KeyA", "mods": 1, "x": 120, "y": 48 }
 */

import { RawEvent, isRawEventKind } from './types';

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isFiniteNumber(value: unknown): value is number {
    return typeof value === 'number' && Number.isFinite(value);
}

/**
 * Validate one decoded JSON value as a raw event.
 *
 * @returns The event, or null if any field has the wrong type
 */
export function decodeRawEvent(value: unknown): RawEvent | null {
    if (!isRecord(value)) return null;

    const { kind, code, mods, scroll, x, y } = value;
    if (!isRawEventKind(kind)) return null;

    const event: RawEvent = { kind };

    if (code !== undefined) {
        if (typeof code === 'string' || isFiniteNumber(code)) {
            event.code = code;
        } else {
            return null;
        }
    }
    if (mods !== undefined) {
        if (!isFiniteNumber(mods) || !Number.isInteger(mods)) return null;
        event.mods = mods;
    }
    if (scroll !== undefined) {
        if (!isFiniteNumber(scroll)) return null;
        event.scroll = scroll;
    }
    if (x !== undefined || y !== undefined) {
        if (!isFiniteNumber(x) || !isFiniteNumber(y)) return null;
        event.x = x;
        event.y = y;
    }

    return event;
}

/**
 * Parse a relay message holding one event or an array of events.
 * Invalid entries in an array are skipped and counted.
 */
export function decodeRelayMessage(text: string): { events: RawEvent[]; rejected: number } {
    let parsed: unknown;
    try {
        parsed = JSON.parse(text);
    } catch {
        return { events: [], rejected: 1 };
    }

    const values: unknown[] = Array.isArray(parsed) ? parsed : [parsed];
    const events: RawEvent[] = [];
    let rejected = 0;

    for (const value of values) {
        const event = decodeRawEvent(value);
        if (event) {
            events.push(event);
        } else {
            rejected++;
        }
    }

    return { events, rejected };
}
