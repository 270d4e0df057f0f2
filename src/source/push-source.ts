/**
 * PushEventSource - Callback-driven event delivery
 *
 * For platforms that call back into the application whenever an event
 * happens (display-link timers, window procedures, DOM listeners).
 * Callbacks push into a bounded queue that the device drains at the start
 * of each tick, decoupling the producer's cadence from the tick rate.
 *
 * @example
 * const source = new PushEventSource();
 * platformOnEvent((ev, data) => {
 *     const raw = decodeMacosEvent(ev, data);
 *     if (raw) source.push(raw);
 * });
 * const device = new Device(source, { platform: 'macos' });
 */

import { EventQueue } from './event-queue';
import {
    ImmediateHandler,
    Pointer,
    RawEvent,
    RawEventSource,
    WindowEvent
} from './types';

export interface PushSourceOptions {
    /** Maximum events buffered between drains (default 256) */
    queueCapacity?: number;
}

export class PushEventSource implements RawEventSource {
    private queue: EventQueue<RawEvent>;
    private immediate: ImmediateHandler | null = null;
    private cursor: Pointer | null = null;
    private closed: boolean = false;

    /** Whether the overflow warning was printed since the last drain */
    private warned: boolean = false;

    constructor(options: PushSourceOptions = {}) {
        this.queue = new EventQueue(options.queueCapacity);
    }

    /**
     * Buffer an event for the next tick.
     */
    push(event: RawEvent): void {
        if (this.closed) {
            throw new Error('PushEventSource: push after close');
        }

        if (event.x !== undefined && event.y !== undefined) {
            this.cursor = { x: event.x, y: event.y };
        }

        if (!this.queue.push(event) && !this.warned) {
            this.warned = true;
            console.warn('[push-source] Event queue full, dropping oldest events');
        }
    }

    /**
     * Deliver a resize or move notification right away. Falls back to the
     * queue when no immediate handler is attached.
     */
    pushImmediate(event: WindowEvent): void {
        if (this.immediate) {
            this.immediate(event);
        } else {
            this.push(event);
        }
    }

    /**
     * Record the pointer position without generating an event.
     */
    movePointer(x: number, y: number): void {
        this.cursor = { x, y };
    }

    drain(): RawEvent[] {
        const { items, dropped } = this.queue.drain();
        this.warned = false;

        if (dropped > 0) {
            // Dropped events may include releases: start clean.
            console.warn(`[push-source] Dropped ${dropped} events, releasing held input`);
            return [{ kind: 'reset' }, ...items];
        }
        return items;
    }

    pointer(): Pointer | null {
        return this.cursor;
    }

    setImmediateHandler(handler: ImmediateHandler | null): void {
        this.immediate = handler;
    }

    close(): void {
        this.closed = true;
        this.immediate = null;
        this.queue.clear();
    }

    /** Events waiting for the next drain */
    get pending(): number {
        return this.queue.size;
    }
}
