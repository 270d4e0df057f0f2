/**
 * EventQueue - Bounded buffer between an event producer and the tick
 *
 * Producers push at whatever rate the platform delivers; the consumer
 * drains the whole queue once at the start of each tick. When the queue
 * is full the oldest event is dropped and the overflow is remembered so
 * the consumer can resynchronize.
 */

import { DEFAULT_QUEUE_CAPACITY } from '../core/constants';

export class EventQueue<T> {
    private items: T[] = [];

    /** Events dropped since the last drain */
    private _dropped: number = 0;

    /**
     * @param capacity Maximum number of buffered events
     */
    constructor(private capacity: number = DEFAULT_QUEUE_CAPACITY) {
        if (!Number.isInteger(capacity) || capacity < 1) {
            throw new Error(`EventQueue capacity must be a positive integer, got ${capacity}`);
        }
    }

    /**
     * Append an event, dropping the oldest one when full.
     *
     * @returns False if an event had to be dropped
     */
    push(item: T): boolean {
        let kept = true;
        if (this.items.length >= this.capacity) {
            this.items.shift();
            this._dropped++;
            kept = false;
        }
        this.items.push(item);
        return kept;
    }

    /**
     * Take every buffered event, oldest first, and reset the drop count.
     */
    drain(): { items: T[]; dropped: number } {
        const items = this.items;
        const dropped = this._dropped;
        this.items = [];
        this._dropped = 0;
        return { items, dropped };
    }

    get size(): number {
        return this.items.length;
    }

    get dropped(): number {
        return this._dropped;
    }

    clear(): void {
        this.items = [];
        this._dropped = 0;
    }
}
