/**
 * PullEventSource - Drain a native event queue at tick start
 *
 * For platforms where the application owns the loop and reads pending
 * events itself (a read-and-dispatch call that returns one event at a
 * time, or nothing). Some platforms require those reads to happen on the
 * thread that owns the window; calling drain() from the tick keeps them
 * there.
 */

import { DEFAULT_MAX_PER_DRAIN } from '../core/constants';
import { Pointer, RawEvent, RawEventSource } from './types';

/** Reads the next pending native event, or null when there are none */
export type ReadEvent = () => RawEvent | null;

/** Queries the current pointer position */
export type ReadCursor = () => Pointer | null;

export interface PullSourceOptions {
    /** Upper bound on events read per drain (default 1024) */
    maxPerDrain?: number;
}

export class PullEventSource implements RawEventSource {
    private maxPerDrain: number;

    constructor(
        private read: ReadEvent,
        private cursor: ReadCursor = () => null,
        options: PullSourceOptions = {}
    ) {
        this.maxPerDrain = options.maxPerDrain ?? DEFAULT_MAX_PER_DRAIN;
    }

    /**
     * Read pending events until the platform reports none, or until the
     * per-drain cap is reached. Events past the cap stay queued in the
     * platform for the next tick.
     */
    drain(): RawEvent[] {
        const events: RawEvent[] = [];

        while (events.length < this.maxPerDrain) {
            const event = this.read();
            if (event === null) return events;
            events.push(event);
        }

        console.warn(`[pull-source] Read cap of ${this.maxPerDrain} events reached, continuing next tick`);
        return events;
    }

    pointer(): Pointer | null {
        return this.cursor();
    }
}
