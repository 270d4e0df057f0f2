/**
 * Device - Input for one window
 *
 * Wires a raw event source through the normalizer into the press tracker
 * and publishes one snapshot per update(). All of it runs on the event
 * loop thread; producers only ever touch the source.
 *
 * @example
 * const source = new PushEventSource();
 * window.addEventListener('keydown', e => {
 *     const raw = decodeBrowserEvent(e);
 *     if (raw) source.push(raw);
 * });
 *
 * const device = new Device(source, { platform: 'browser' });
 * device.onResize(() => renderer.resize());
 *
 * setInterval(() => {
 *     const input = device.update();
 *     if (justPressed(input, Key.Space)) player.jump();
 * }, 1000 / 60);
 */

import { PressTracker } from '../core/press-tracker';
import { SnapshotPublisher } from '../core/publisher';
import { Snapshot, describeDown } from '../core/snapshot';
import { Keymap, loadKeymap } from '../normalize/keymap';
import { EventNormalizer } from '../normalize/normalizer';
import { RawEventSource, WindowEvent } from '../source/types';
import { DeviceConfig, DEFAULT_DEVICE_CONFIG } from './config';

export type ResizeListener = (event: WindowEvent) => void;

export class Device {
    private config: DeviceConfig;
    private keymap: Keymap;
    private tracker: PressTracker;
    private normalizer: EventNormalizer;
    private publisher: SnapshotPublisher;

    /** Resize/move listeners */
    private resizeListeners: Set<ResizeListener> = new Set();

    private _latest: Snapshot | null = null;
    private updating: boolean = false;
    private disposed: boolean = false;

    constructor(private source: RawEventSource, config: Partial<DeviceConfig> = {}) {
        this.config = { ...DEFAULT_DEVICE_CONFIG, ...config };

        const platform = this.config.platform;
        this.keymap = typeof platform === 'string' ? loadKeymap(platform) : platform;

        this.tracker = new PressTracker();
        this.normalizer = new EventNormalizer(this.keymap, this.tracker, {
            debug: this.config.debug,
            releaseOnResize: this.config.releaseOnResize
        });
        this.publisher = new SnapshotPublisher(this.tracker);

        source.setImmediateHandler?.(this.handleImmediate);
    }

    /**
     * Apply every pending event and publish the input state for this tick.
     * Call exactly once per tick.
     */
    update(): Snapshot {
        if (this.disposed) {
            throw new Error('Device: update after dispose');
        }
        if (this.updating) {
            throw new Error('Device: update() called re-entrantly');
        }

        this.updating = true;
        try {
            for (const event of this.source.drain()) {
                this.normalizer.apply(event);
            }

            const pointer = this.source.pointer();
            if (pointer) {
                this.tracker.setPointer(pointer.x, pointer.y);
            }

            const snapshot = this.publisher.poll();
            this._latest = snapshot;

            if (this.config.debug && snapshot.down.size > 0) {
                console.log(`[device] tick ${snapshot.tick}: ${describeDown(snapshot)}`);
            }
            return snapshot;
        } finally {
            this.updating = false;
        }
    }

    /**
     * Listen for resize and move notifications as they happen, outside the
     * tick. The event is also applied to the next snapshot.
     *
     * @returns Function that removes the listener
     */
    onResize(listener: ResizeListener): () => void {
        this.resizeListeners.add(listener);
        return () => {
            this.resizeListeners.delete(listener);
        };
    }

    /**
     * Detach from the source and close it.
     */
    dispose(): void {
        if (this.disposed) return;
        this.disposed = true;

        this.source.setImmediateHandler?.(null);
        this.source.close?.();
        this.resizeListeners.clear();
    }

    private handleImmediate = (event: WindowEvent): void => {
        this.normalizer.apply(event);

        for (const listener of [...this.resizeListeners]) {
            listener(event);
        }
    };

    /** Last published snapshot, or null before the first update */
    get latest(): Snapshot | null {
        return this._latest;
    }

    /** Keymap in use */
    get platform(): string {
        return this.keymap.platform;
    }

    /** Number of snapshots published */
    get tick(): number {
        return this.publisher.tick;
    }
}
