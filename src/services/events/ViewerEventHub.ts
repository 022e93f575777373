import { Service, Token } from 'typedi';
import { DisplayState, FileDropPayload, ListSnapshot, NotificationPayload } from '../../types/display';
import { Logger } from '../logging/Logger';
import { FileDropSink } from '../viewer/ExportAdapter';

export interface NotificationPublisher {
    showNotification(payload: NotificationPayload): void;
}

export const NotificationPublisherToken = new Token<NotificationPublisher>('notification-publisher');

export interface ViewerEvents {
    'list-changed': ListSnapshot;
    'display-changed': DisplayState;
    'show-notification': NotificationPayload;
    'file-drop': FileDropPayload;
}

export type ViewerEventName = keyof ViewerEvents;

/** Events describing current state; the latest of each is replayed to new clients. */
type StateEventName = 'list-changed' | 'display-changed';

/** The parts of an HTTP request/response pair a stream needs; express supplies both. */
export interface SseRequest {
    on(event: 'close', listener: () => void): unknown;
    removeListener(event: 'close', listener: () => void): unknown;
}

export interface SseResponse {
    setHeader(name: string, value: string): unknown;
    flushHeaders?(): void;
    write(chunk: string): boolean;
    end(): unknown;
}

interface Subscriber {
    readonly response: SseResponse;
    readonly heartbeat: NodeJS.Timeout;
    readonly detach: () => void;
}

const HEARTBEAT_MS = 25000;
const RETRY_MS = 5000;

export function formatFrame<E extends ViewerEventName>(event: E, data: ViewerEvents[E]): string {
    return `event: ${event}\ndata: ${JSON.stringify(data)}\n\n`;
}

/** Server-sent-event fan-out of everything the viewer surface renders. */
@Service()
export class ViewerEventHub implements NotificationPublisher, FileDropSink {
    private readonly subscribers = new Map<number, Subscriber>();
    private readonly latest = new Map<StateEventName, string>();
    private readonly logger: Logger;
    private nextSubscriberId = 1;

    constructor(logger: Logger) {
        this.logger = logger.child('sse');
    }

    get clientCount(): number {
        return this.subscribers.size;
    }

    addClient(request: SseRequest, response: SseResponse): void {
        response.setHeader('Content-Type', 'text/event-stream');
        response.setHeader('Cache-Control', 'no-cache');
        response.setHeader('Connection', 'keep-alive');
        response.flushHeaders?.();

        const id = this.nextSubscriberId;
        this.nextSubscriberId += 1;
        const onClose = () => this.disconnect(id);
        request.on('close', onClose);
        this.subscribers.set(id, {
            response,
            heartbeat: setInterval(() => this.send(id, ': keep-alive\n\n'), HEARTBEAT_MS),
            detach: () => request.removeListener('close', onClose),
        });

        this.send(id, `retry: ${RETRY_MS}\n\n`);
        for (const frame of this.latest.values()) {
            this.send(id, frame);
        }
    }

    emitListChanged(snapshot: ListSnapshot): void {
        this.publishState('list-changed', snapshot);
    }

    emitDisplayChanged(state: DisplayState): void {
        this.publishState('display-changed', state);
    }

    showNotification(payload: NotificationPayload): void {
        this.broadcast(formatFrame('show-notification', payload));
    }

    beginFileDrop(paths: string[]): void {
        this.broadcast(formatFrame('file-drop', { paths: [...paths] }));
    }

    closeAll(): void {
        for (const id of [...this.subscribers.keys()]) {
            this.disconnect(id);
        }
    }

    private publishState<E extends StateEventName>(event: E, data: ViewerEvents[E]): void {
        const frame = formatFrame(event, data);
        this.latest.set(event, frame);
        this.broadcast(frame);
    }

    private broadcast(frame: string): void {
        for (const id of [...this.subscribers.keys()]) {
            this.send(id, frame);
        }
    }

    private send(id: number, chunk: string): void {
        const subscriber = this.subscribers.get(id);
        if (!subscriber) {
            return;
        }
        try {
            subscriber.response.write(chunk);
        } catch (error: unknown) {
            this.logger.warn(`Dropping event stream ${id} after a failed write`, error);
            this.disconnect(id);
        }
    }

    private disconnect(id: number): void {
        const subscriber = this.subscribers.get(id);
        if (!subscriber) {
            return;
        }
        this.subscribers.delete(id);
        clearInterval(subscriber.heartbeat);
        subscriber.detach();
        try {
            subscriber.response.end();
        } catch (error: unknown) {
            this.logger.warn(`Failed to close event stream ${id}`, error);
        }
    }
}
