/**
 * Input Snapshot
 *
 * The read-only view of input handed to the application once per tick.
 */

import { InputCode, codeName } from './codes';
import { KEY_RELEASED } from './constants';

/**
 * Input state at the end of one tick.
 *
 * `down` maps each held code to the number of ticks it has been held.
 * A negative duration means the code was released since the previous
 * snapshot; it appears that way exactly once and is then removed.
 */
export interface Snapshot {
    /** Pointer x in window coordinates */
    readonly mx: number;

    /** Pointer y in window coordinates */
    readonly my: number;

    /** Scroll accumulated since the previous snapshot */
    readonly scroll: number;

    /** True while the window has input focus */
    readonly focus: boolean;

    /** True if the window was resized or moved since the previous snapshot */
    readonly resized: boolean;

    /** Held and just-released codes with their durations; throws if modified */
    readonly down: ReadonlyMap<InputCode, number>;

    /** Number of snapshots published so far, including this one */
    readonly tick: number;
}

/**
 * Hold records copied into a snapshot. Frozen, and its mutators throw,
 * so a published snapshot stays as it was published.
 */
export class FrozenHoldMap extends Map<InputCode, number> {
    constructor(entries: Iterable<readonly [InputCode, number]>) {
        super();
        for (const [code, duration] of entries) {
            super.set(code, duration);
        }
        Object.freeze(this);
    }

    override set(): this {
        throw new Error('Snapshot: down is read-only');
    }

    override delete(): boolean {
        throw new Error('Snapshot: down is read-only');
    }

    override clear(): void {
        throw new Error('Snapshot: down is read-only');
    }
}

/**
 * Check whether a duration marks a release.
 */
export function isReleased(duration: number): boolean {
    return duration < 0;
}

/**
 * Ticks a code was held for. Works for both held and released durations.
 */
export function heldTicks(duration: number): number {
    return duration < 0 ? duration - KEY_RELEASED : duration;
}

/** True if the code is held in the snapshot */
export function isDown(snapshot: Snapshot, code: InputCode): boolean {
    const duration = snapshot.down.get(code);
    return duration !== undefined && duration >= 0;
}

/** True if the code was pressed during the tick this snapshot closes */
export function justPressed(snapshot: Snapshot, code: InputCode): boolean {
    return snapshot.down.get(code) === 0;
}

/** True if the code was released during the tick this snapshot closes */
export function justReleased(snapshot: Snapshot, code: InputCode): boolean {
    const duration = snapshot.down.get(code);
    return duration !== undefined && duration < 0;
}

/**
 * Readable listing of the down map for logging, in code order.
 *
 * @example
 * describeDown(snapshot); // 'A:2 Shift:5 MouseLeft:released(1)'
 */
export function describeDown(snapshot: Snapshot): string {
    const parts: string[] = [];
    const codes = [...snapshot.down.keys()].sort((a, b) => a - b);

    for (const code of codes) {
        const duration = snapshot.down.get(code) ?? 0;
        const name = codeName(code) ?? `0x${code.toString(16)}`;
        parts.push(isReleased(duration)
            ? `${name}:released(${heldTicks(duration)})`
            : `${name}:${duration}`);
    }

    return parts.join(' ');
}
