/**
 * EventNormalizer - Raw platform events to canonical edges
 *
 * Translates native key and button codes through the platform keymap and
 * feeds the resulting press/release edges into a PressTracker. Modifier
 * bitmasks are decomposed into individual modifier edges by comparing each
 * mask with the previously observed one, so modifiers share the same hold
 * duration bookkeeping as ordinary keys.
 *
 * Codes missing from the keymap are dropped: keyboard layouts and platform
 * key sets vary.
 */

import { InputCode } from '../core/codes';
import { PressTracker } from '../core/press-tracker';
import { NativeCode, RawEvent } from '../source/types';
import { Keymap } from './keymap';

export interface NormalizerOptions {
    /** Log dropped codes */
    debug?: boolean;

    /** Release every held code on resize or move */
    releaseOnResize?: boolean;
}

export class EventNormalizer {
    /** Last modifier mask seen */
    private mods: number = 0;

    private debug: boolean;
    private releaseOnResize: boolean;

    constructor(
        private keymap: Keymap,
        private tracker: PressTracker,
        options: NormalizerOptions = {}
    ) {
        this.debug = options.debug ?? false;
        this.releaseOnResize = options.releaseOnResize ?? false;
    }

    /**
     * Apply one raw event to the tracker.
     */
    apply(event: RawEvent): void {
        const tracker = this.tracker;

        if (event.x !== undefined && event.y !== undefined) {
            tracker.setPointer(event.x, event.y);
        }

        // Modifiers first so that e.g. Shift+A shows both held. Masks seen
        // without focus are ignored; the first mask after focus returns
        // presses whatever is still down.
        if (event.mods !== undefined && tracker.focus) {
            this.applyModifiers(event.mods);
        }

        switch (event.kind) {
            case 'keyDown': {
                const code = this.translate(this.keymap.keys, event.code, 'key');
                if (code !== null) tracker.recordPress(code);
                break;
            }
            case 'keyUp': {
                const code = this.translate(this.keymap.keys, event.code, 'key');
                if (code !== null) tracker.recordRelease(code);
                break;
            }
            case 'mouseDown': {
                const code = this.translate(this.keymap.buttons, event.code, 'button');
                if (code !== null) tracker.recordPress(code);
                break;
            }
            case 'mouseUp': {
                const code = this.translate(this.keymap.buttons, event.code, 'button');
                if (code !== null) tracker.recordRelease(code);
                break;
            }
            case 'scroll':
                if (event.scroll !== undefined) tracker.addScroll(event.scroll);
                break;
            case 'resized':
            case 'moved':
                tracker.markResized();
                if (this.releaseOnResize) {
                    tracker.releaseAll();
                    this.mods = 0;
                }
                break;
            case 'focusLost':
            case 'iconified':
                tracker.focusLost();
                this.mods = 0;
                break;
            case 'focusGained':
            case 'uniconified':
                tracker.focusGained();
                break;
            case 'reset':
                tracker.releaseAll();
                this.mods = 0;
                break;
            case 'mouseMove':
            case 'modifiers':
                break;
        }
    }

    /**
     * Synthesize modifier edges from the bits that changed since the last mask.
     */
    private applyModifiers(mods: number): void {
        const previous = this.mods;
        this.mods = mods;
        if (mods === previous) return;

        for (const { mask, code } of this.keymap.modifiers) {
            const was = (previous & mask) !== 0;
            const now = (mods & mask) !== 0;
            if (now && !was) {
                this.tracker.recordPress(code);
            } else if (!now && was) {
                this.tracker.recordRelease(code);
            }
        }
    }

    private translate(
        table: ReadonlyMap<NativeCode, InputCode>,
        native: NativeCode | undefined,
        what: 'key' | 'button'
    ): InputCode | null {
        if (native === undefined) return null;

        const code = table.get(native);
        if (code === undefined) {
            if (this.debug) {
                console.log(`[normalizer] No ${this.keymap.platform} mapping for ${what} ${String(native)}`);
            }
            return null;
        }
        return code;
    }
}
