/**
 * SnapshotPublisher - Once-per-tick input snapshots
 *
 * Each poll() closes the current tick:
 * 1. Advance hold durations
 * 2. Copy the live state into a frozen snapshot
 * 3. Drop released codes from the live state
 * 4. Replay edges deferred during the tick
 * 5. Clear the one-shot scroll and resized fields
 *
 * Call poll() once per tick. Extra calls are harmless but split scroll and
 * resize information across the extra snapshots.
 */

import { PressTracker } from './press-tracker';
import { Snapshot } from './snapshot';

export class SnapshotPublisher {
    /** Snapshots published so far */
    private published: number = 0;

    constructor(private tracker: PressTracker) {}

    /**
     * Publish the current input state and start the next tick.
     */
    poll(): Snapshot {
        const tracker = this.tracker;

        tracker.advanceTick();
        this.published++;

        const snapshot: Snapshot = Object.freeze({
            mx: tracker.mx,
            my: tracker.my,
            scroll: tracker.scroll,
            focus: tracker.focus,
            resized: tracker.resized,
            down: tracker.copyDown(),
            tick: this.published
        });

        tracker.purgeReleased();
        tracker.replayDeferred();
        tracker.resetOneShots();

        return snapshot;
    }

    /** Number of snapshots published so far */
    get tick(): number {
        return this.published;
    }
}
