import type { LootRequest, ReplyTarget } from '../loot/types';

/**
 * Adapter connection state.
 */
export type AdapterStatus = 'disconnected' | 'connecting' | 'connected' | 'error';

/**
 * Payload carried by each adapter event.
 */
export interface AdapterEvents {
    request: LootRequest;
    error: Error;
    status: AdapterStatus;
}

type HandlerMap = { [K in keyof AdapterEvents]: Array<(payload: AdapterEvents[K]) => void> };

/**
 * Base class for chat adapters.
 * Subclasses implement connect(), disconnect() and reply(), and emit a
 * 'request' event for every recognized loot lookup.
 */
export abstract class BaseChannelAdapter {
    private _status: AdapterStatus = 'disconnected';
    private handlers: HandlerMap = { request: [], error: [], status: [] };

    /** Current connection status */
    get status(): AdapterStatus {
        return this._status;
    }

    protected setStatus(status: AdapterStatus) {
        if (status === this._status) return;
        this._status = status;
        this.emit('status', status);
    }

    abstract connect(): Promise<void>;
    abstract disconnect(): Promise<void>;

    /**
     * Deliver reply text to the request's origin. Implementations log
     * delivery failures and resolve to false instead of throwing.
     */
    abstract reply(target: ReplyTarget, content: string): Promise<boolean>;

    // ── Event system ───────────────────────────────────────────────

    on<K extends keyof AdapterEvents>(event: K, handler: (payload: AdapterEvents[K]) => void): void {
        this.handlers[event].push(handler);
    }

    protected emit<K extends keyof AdapterEvents>(event: K, payload: AdapterEvents[K]): void {
        this.handlers[event].forEach(h => h(payload));
    }
}
