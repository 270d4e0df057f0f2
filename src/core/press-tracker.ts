/**
 * PressTracker - Live press state for one window
 *
 * Turns a stream of press/release edges into a map of what is currently
 * held and for how many ticks. Also owns the scalar input state that is
 * copied into each snapshot: pointer position, focus, and the one-shot
 * scroll and resized fields.
 *
 * Per-code state machine:
 *   Up -> press -> Down(0) -> advance -> Down(n + 1)
 *      -> release -> Down(n + KEY_RELEASED) -> publish -> Up
 *
 * An edge that would make a transition invisible to the consumer is
 * deferred until just after the next snapshot:
 * - a release for a code pressed since the last publish
 * - a press for a code released since the last publish
 */

import { InputCode } from './codes';
import { KEY_RELEASED } from './constants';
import { FrozenHoldMap } from './snapshot';

type Edge = 'press' | 'release';

export class PressTracker {
    /** Hold records: code -> duration in ticks (negative when released) */
    private down: Map<InputCode, number> = new Map();

    /** Codes pressed since the last publish; not advanced until the next tick */
    private fresh: Set<InputCode> = new Set();

    /** Edges held back until after the next publish, in arrival order per code */
    private deferred: Map<InputCode, Edge[]> = new Map();

    private _mx: number = 0;
    private _my: number = 0;
    private _scroll: number = 0;
    private _focus: boolean = true;
    private _resized: boolean = false;

    /**
     * Record a press edge.
     * Ignored while the window does not have focus, and when the code is
     * already held.
     */
    recordPress(code: InputCode): void {
        if (!this._focus) return;

        const pending = this.deferred.get(code);
        if (pending) {
            if (pending[pending.length - 1] === 'release') {
                pending.push('press');
            }
            return;
        }

        const duration = this.down.get(code);
        if (duration === undefined) {
            this.down.set(code, 0);
            this.fresh.add(code);
        } else if (duration < 0) {
            // Released this tick: the release must be published first.
            this.deferred.set(code, ['press']);
        }
    }

    /**
     * Record a release edge.
     * Ignored when the code is not held.
     */
    recordRelease(code: InputCode): void {
        const pending = this.deferred.get(code);
        if (pending) {
            if (pending[pending.length - 1] === 'press') {
                pending.push('release');
            }
            return;
        }

        const duration = this.down.get(code);
        if (duration === undefined || duration < 0) return;

        if (this.fresh.has(code)) {
            // Pressed and released within one tick: publish the press first.
            this.deferred.set(code, ['release']);
            return;
        }

        this.down.set(code, duration + KEY_RELEASED);
    }

    /**
     * Release every held code.
     * Used on focus loss and whenever release events may have been missed.
     */
    releaseAll(): void {
        for (const code of [...this.down.keys()]) {
            this.recordRelease(code);
        }
        for (const code of [...this.deferred.keys()]) {
            this.recordRelease(code);
        }
    }

    /**
     * Add one tick to every held code, except codes pressed since the last
     * publish. Released codes are not advanced.
     */
    advanceTick(): void {
        for (const [code, duration] of this.down) {
            if (duration >= 0 && !this.fresh.has(code)) {
                this.down.set(code, duration + 1);
            }
        }
    }

    /**
     * Copy the hold records for publishing.
     */
    copyDown(): ReadonlyMap<InputCode, number> {
        return new FrozenHoldMap(this.down);
    }

    /**
     * Remove released codes. Each release is published exactly once.
     */
    purgeReleased(): void {
        for (const [code, duration] of this.down) {
            if (duration < 0) {
                this.down.delete(code);
            }
        }
    }

    /**
     * Start a new tick: apply the edges deferred during the previous one.
     * Replayed edges follow the normal rules, so a replayed press followed
     * by a replayed release is deferred again.
     */
    replayDeferred(): void {
        this.fresh.clear();
        if (this.deferred.size === 0) return;

        const replay = [...this.deferred];
        this.deferred.clear();

        for (const [code, edges] of replay) {
            for (const edge of edges) {
                if (edge === 'press') {
                    this.recordPress(code);
                } else {
                    this.recordRelease(code);
                }
            }
        }
    }

    /**
     * Clear the scroll accumulator and resized flag after publishing.
     */
    resetOneShots(): void {
        this._scroll = 0;
        this._resized = false;
    }

    // ==========================================
    // Scalar state
    // ==========================================

    setPointer(x: number, y: number): void {
        this._mx = x;
        this._my = y;
    }

    addScroll(delta: number): void {
        this._scroll += delta;
    }

    markResized(): void {
        this._resized = true;
    }

    /**
     * The window lost focus (or was iconified). Nothing may stay held.
     */
    focusLost(): void {
        this._focus = false;
        this.releaseAll();
    }

    focusGained(): void {
        this._focus = true;
    }

    // ==========================================
    // Accessors
    // ==========================================

    /**
     * Current hold duration for a code, or undefined when not tracked.
     */
    duration(code: InputCode): number | undefined {
        return this.down.get(code);
    }

    /** Number of tracked codes (held or released this tick) */
    get size(): number {
        return this.down.size;
    }

    /** Number of codes with deferred edges */
    get deferredCount(): number {
        return this.deferred.size;
    }

    get mx(): number {
        return this._mx;
    }

    get my(): number {
        return this._my;
    }

    get scroll(): number {
        return this._scroll;
    }

    get focus(): boolean {
        return this._focus;
    }

    get resized(): boolean {
        return this._resized;
    }
}
