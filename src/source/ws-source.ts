/**
 * WebSocketEventSource - Raw events relayed over a WebSocket
 *
 * Lets the window (a native helper process or a browser page) run apart
 * from the application: the front-end forwards each raw event as JSON and
 * the application drains them once per tick like any other push source.
 * Resize and move notifications are delivered immediately.
 *
 * A dropped connection may swallow release events, so a disconnect
 * releases everything that was held.
 *
 * @example
 * const source = await WebSocketEventSource.listen({ port: 8420 });
 * const device = new Device(source, { platform: 'browser' });
 */

import type { EventEmitter } from 'events';
import WebSocket, { WebSocketServer } from 'ws';
import { decodeRelayMessage } from './decode';
import { PushEventSource, PushSourceOptions } from './push-source';
import { ImmediateHandler, Pointer, RawEvent, RawEventSource, isWindowEvent } from './types';

/** The part of a WebSocket the source listens to */
export type MessageSocket = Pick<EventEmitter, 'on' | 'off'>;

/** A socket the source may close when it is replaced */
export type RelaySocket = MessageSocket & { close(): void };

/** The part of a WebSocketServer the source uses */
export type RelayServer = Pick<EventEmitter, 'on' | 'once' | 'off'> & { close(): void };

export interface ListenOptions extends PushSourceOptions {
    port: number;
    host?: string;
}

/**
 * Convert a ws message payload to text.
 */
function messageText(data: unknown): string | null {
    if (typeof data === 'string') return data;
    if (Buffer.isBuffer(data)) return data.toString('utf8');
    if (data instanceof ArrayBuffer) return Buffer.from(data).toString('utf8');
    if (Array.isArray(data)) {
        const parts: unknown[] = data;
        if (parts.every((part): part is Buffer => Buffer.isBuffer(part))) {
            return Buffer.concat(parts).toString('utf8');
        }
    }
    return null;
}

export class WebSocketEventSource implements RawEventSource {
    private source: PushEventSource;
    private socket: MessageSocket | null = null;
    private server: RelayServer | null = null;
    private closed: boolean = false;

    /** Messages or array entries that failed validation */
    private _rejected: number = 0;

    /** Closes the connection this source opened itself (connect/listen) */
    private hangUp: (() => void) | null = null;

    constructor(options: PushSourceOptions = {}) {
        this.source = new PushEventSource(options);
    }

    /**
     * Accept front-end connections on a port. A new connection replaces
     * the current one.
     */
    static listen(options: ListenOptions): Promise<WebSocketEventSource> {
        const relay = new WebSocketEventSource(options);
        return relay.serve(new WebSocketServer({ port: options.port, host: options.host }), options.port);
    }

    /**
     * Take connections from a server. Resolves once it is listening and
     * rejects if it fails to start.
     */
    serve(server: RelayServer, port: number): Promise<WebSocketEventSource> {
        if (this.closed) {
            throw new Error('WebSocketEventSource: serve after close');
        }
        this.server = server;

        server.on('connection', (ws: RelaySocket) => {
            if (this.closed) {
                ws.close();
                return;
            }
            this.hangUp?.();
            this.attach(ws);
            this.hangUp = () => ws.close();
        });

        return new Promise((resolve, reject) => {
            const onStartError = (err: Error): void => {
                console.error('[ws-source] Failed to listen:', err.message);
                reject(err);
            };
            server.once('error', onStartError);
            server.once('listening', () => {
                server.off('error', onStartError);
                server.on('error', (err: Error) => {
                    console.error('[ws-source] Server error:', err.message);
                });
                console.log(`[ws-source] Listening on port ${port}`);
                resolve(this);
            });
        });
    }

    /**
     * Connect to a front-end that serves raw events.
     */
    static connect(url: string, options: PushSourceOptions = {}): WebSocketEventSource {
        const relay = new WebSocketEventSource(options);
        const ws = new WebSocket(url);
        relay.attach(ws);
        relay.hangUp = () => ws.close();
        return relay;
    }

    /**
     * Start reading events from a socket. Replacing an attached socket
     * releases everything it held.
     */
    attach(socket: MessageSocket): void {
        if (this.closed) {
            throw new Error('WebSocketEventSource: attach after close');
        }
        const replaced = this.socket !== null;
        this.detach();
        if (replaced) {
            // The old socket's close handler is gone, so release here.
            console.warn('[ws-source] Relay replaced, releasing held input');
            this.source.push({ kind: 'reset' });
        }

        this.socket = socket;
        socket.on('message', this.onMessage);
        socket.on('close', this.onClose);
        socket.on('error', this.onError);
    }

    /**
     * Stop reading from the current socket without closing it.
     */
    detach(): void {
        const socket = this.socket;
        if (!socket) return;

        socket.off('message', this.onMessage);
        socket.off('close', this.onClose);
        socket.off('error', this.onError);
        this.socket = null;
    }

    private onMessage = (data: unknown): void => {
        const text = messageText(data);
        if (text === null) {
            this._rejected++;
            console.warn('[ws-source] Ignoring message with unsupported payload type');
            return;
        }

        const { events, rejected } = decodeRelayMessage(text);
        if (rejected > 0) {
            this._rejected += rejected;
            console.warn(`[ws-source] Ignoring ${rejected} malformed event(s)`);
        }

        for (const event of events) {
            this.forward(event);
        }
    };

    private onClose = (): void => {
        this.detach();
        this.hangUp = null;
        if (!this.closed) {
            console.warn('[ws-source] Relay disconnected, releasing held input');
            this.source.push({ kind: 'reset' });
        }
    };

    private onError = (err: Error): void => {
        console.error('[ws-source] Relay error:', err.message);
    };

    private forward(event: RawEvent): void {
        if (isWindowEvent(event)) {
            this.source.pushImmediate(event);
        } else {
            this.source.push(event);
        }
    }

    drain(): RawEvent[] {
        return this.source.drain();
    }

    pointer(): Pointer | null {
        return this.source.pointer();
    }

    setImmediateHandler(handler: ImmediateHandler | null): void {
        this.source.setImmediateHandler(handler);
    }

    /**
     * Close the connection (if this source opened it) and the server.
     */
    close(): void {
        if (this.closed) return;
        this.closed = true;

        this.detach();
        this.hangUp?.();
        this.hangUp = null;
        this.server?.close();
        this.server = null;
        this.source.close();
    }

    /** True while a socket is attached */
    get connected(): boolean {
        return this.socket !== null;
    }

    /** Count of messages or entries rejected by validation */
    get rejected(): number {
        return this._rejected;
    }
}
