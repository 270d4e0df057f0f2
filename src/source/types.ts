/**
 * Raw Event Types
 *
 * The contract between a platform event producer and the normalizer.
 */

/**
 * Raw event kinds.
 *
 * `reset` is emitted by a source that may have lost release events
 * (buffer overflow, relay disconnect); every held code is released.
 */
export type RawEventKind =
    | 'keyDown'
    | 'keyUp'
    | 'mouseDown'
    | 'mouseUp'
    | 'mouseMove'
    | 'scroll'
    | 'modifiers'
    | 'resized'
    | 'moved'
    | 'iconified'
    | 'uniconified'
    | 'focusGained'
    | 'focusLost'
    | 'reset';

export const RAW_EVENT_KINDS: readonly RawEventKind[] = [
    'keyDown',
    'keyUp',
    'mouseDown',
    'mouseUp',
    'mouseMove',
    'scroll',
    'modifiers',
    'resized',
    'moved',
    'iconified',
    'uniconified',
    'focusGained',
    'focusLost',
    'reset'
];

/** Platform key or button code: numeric on native platforms, a name in browsers */
export type NativeCode = number | string;

/**
 * One raw notification from the platform.
 * Fields that do not apply to the kind are left out.
 */
export interface RawEvent {
    kind: RawEventKind;

    /** Native key code (key events) or button code (mouse events) */
    code?: NativeCode;

    /** Full modifier bitmask at the time of the event */
    mods?: number;

    /** Scroll amount (scroll events) */
    scroll?: number;

    /** Pointer position, when the platform reports it with the event */
    x?: number;
    y?: number;
}

/** Window notifications that are delivered immediately instead of once per tick */
export type WindowEventKind = 'resized' | 'moved';

export interface WindowEvent extends RawEvent {
    kind: WindowEventKind;
}

export type ImmediateHandler = (event: WindowEvent) => void;

/** Pointer position in window coordinates */
export interface Pointer {
    x: number;
    y: number;
}

/**
 * Producer of raw events, drained once at the start of each tick.
 */
export interface RawEventSource {
    /**
     * Return every event received since the previous drain. Never blocks;
     * an empty array means no input.
     */
    drain(): RawEvent[];

    /**
     * Current pointer position, or null when the source cannot tell.
     */
    pointer(): Pointer | null;

    /**
     * Register the handler for resize and move notifications that must be
     * serviced immediately. Pass null to detach.
     */
    setImmediateHandler?(handler: ImmediateHandler | null): void;

    /** Release the source's resources */
    close?(): void;
}

export function isRawEventKind(value: unknown): value is RawEventKind {
    return typeof value === 'string' && RAW_EVENT_KINDS.some(kind => kind === value);
}

export function isWindowEvent(event: RawEvent): event is WindowEvent {
    return event.kind === 'resized' || event.kind === 'moved';
}
