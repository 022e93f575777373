import { Inject, Service } from 'typedi';
import { ViewerConfig, ViewerConfigToken } from '../../config/viewerConfig';
import { LoadCancelledError } from '../../errors/ViewerErrors';
import { DisplayFields, DisplayState, LoadSessionStatus } from '../../types/display';
import { FullMessage, MessageEntry } from '../../types/message';
import { formatDisplayDate } from '../../utils/text';
import { ContentLoad, ContentLoader, ContentLoaderToken } from '../loader/ContentLoader';
import { Logger } from '../logging/Logger';
import { UiQueue } from '../queue/UiQueue';
import { HtmlMaterializer } from './HtmlMaterializer';

export const LOADING_TITLE = 'Loading...';

export type DisplayListener = (state: DisplayState) => void;

interface LoadSession {
    readonly id: number;
    readonly entry: MessageEntry;
    status: LoadSessionStatus;
    load: ContentLoad | null;
}

const EMPTY_FIELDS: DisplayFields = {
    from: '',
    to: '',
    cc: '',
    bcc: '',
    date: '',
    subject: '',
};

/**
 * Owns what the content pane shows. Every selection change starts a new load
 * session with a larger id; completions are matched against the active id and
 * dropped when they belong to a superseded session, whatever order they
 * arrive in.
 */
@Service()
export class SelectionLoadCoordinator {
    private readonly logger: Logger;
    private readonly neutralTitle: string;
    private readonly displayListeners = new Set<DisplayListener>();
    private nextSessionId = 1;
    private active: LoadSession | null = null;
    private state: DisplayState;

    constructor(
        @Inject(ContentLoaderToken) private readonly loader: ContentLoader,
        private readonly materializer: HtmlMaterializer,
        private readonly queue: UiQueue,
        @Inject(ViewerConfigToken) config: ViewerConfig,
        logger: Logger,
    ) {
        this.logger = logger.child('coordinator');
        this.neutralTitle = config.appTitle;
        this.state = this.idleState();
    }

    get activeSessionId(): number | null {
        return this.active?.id ?? null;
    }

    get activeStatus(): LoadSessionStatus | null {
        return this.active?.status ?? null;
    }

    snapshot(): DisplayState {
        return cloneState(this.state);
    }

    onDisplayChanged(listener: DisplayListener): () => void {
        this.displayListeners.add(listener);
        return () => {
            this.displayListeners.delete(listener);
        };
    }

    select(entry: MessageEntry | null): void {
        this.supersede();

        if (entry === null) {
            this.publish(this.idleState());
            return;
        }

        const session: LoadSession = {
            id: this.nextSessionId,
            entry,
            status: 'pending',
            load: null,
        };
        this.nextSessionId += 1;
        this.active = session;

        this.publish({
            ...this.idleState(),
            phase: 'loading',
            sessionId: session.id,
            entryId: entry.id,
            title: LOADING_TITLE,
            loading: true,
        });

        let load: ContentLoad;
        try {
            load = this.loader.get(entry);
        } catch (error: unknown) {
            this.fail(session.id, error);
            return;
        }
        session.load = load;

        load.result.then(
            (message) => {
                this.queue.post(() => this.deliver(session.id, message), `deliver#${session.id}`);
            },
            (error: unknown) => {
                this.queue.post(() => this.fail(session.id, error), `fail#${session.id}`);
            },
        );
    }

    private supersede(): void {
        const previous = this.active;
        if (!previous) {
            return;
        }
        this.active = null;
        if (previous.status === 'pending') {
            previous.status = 'cancelled';
        }
        previous.load?.cancel();
        this.releaseRender(previous.id);
    }

    private releaseRender(sessionId: number): void {
        this.materializer.release(renderKey(sessionId)).catch((error: unknown) => {
            this.logger.warn(`Failed to release render for session ${sessionId}`, error);
        });
    }

    private deliver(sessionId: number, message: FullMessage): void {
        const session = this.active;
        if (!session || session.id !== sessionId || session.status !== 'pending') {
            this.logger.debug(`Dropping delivery for superseded session ${sessionId}`);
            return;
        }
        session.status = 'delivered';

        const isHtml = message.body.kind === 'html';
        const plainText =
            isHtml && message.plainText !== undefined && message.plainText !== message.body.text
                ? message.plainText
                : null;

        this.publish({
            phase: 'rendered',
            sessionId,
            entryId: session.entry.id,
            title: message.subject,
            loading: false,
            contentEnabled: true,
            deleteEnabled: true,
            forwardEnabled: true,
            headers: message.headers.map((header) => header.line).join('\n'),
            fields: {
                from: message.from,
                to: message.to,
                cc: message.cc,
                bcc: message.bcc,
                date: formatDisplayDate(message.date),
                subject: message.subject,
            },
            body: { ...message.body },
            plainText,
            htmlFile: null,
            tabs: { body: true, plainText: plainText !== null },
        });

        if (isHtml) {
            this.materialize(sessionId, message);
        }
    }

    private materialize(sessionId: number, message: FullMessage): void {
        this.materializer.materialize(renderKey(sessionId), message).then(
            (htmlFile) => {
                this.queue.post(() => {
                    if (this.active?.id !== sessionId) {
                        // Superseded mid-write: the earlier release may have run before these files existed.
                        this.releaseRender(sessionId);
                        return;
                    }
                    this.publish({ ...this.state, htmlFile });
                }, `materialized#${sessionId}`);
            },
            (error: unknown) => {
                this.logger.error(`Failed to write rendered message for session ${sessionId}`, error);
            },
        );
    }

    private fail(sessionId: number, error: unknown): void {
        const session = this.active;
        if (!session || session.id !== sessionId || session.status !== 'pending') {
            if (!(error instanceof LoadCancelledError)) {
                this.logger.debug(`Ignoring failure for superseded session ${sessionId}`);
            }
            return;
        }
        session.status = 'failed';

        this.logger.warn(`Unable to load message "${session.entry.id}"`, error);
        this.publish({
            ...this.idleState(),
            phase: 'failed',
            sessionId,
            entryId: session.entry.id,
            deleteEnabled: true,
        });
    }

    private idleState(): DisplayState {
        return {
            phase: 'idle',
            sessionId: null,
            entryId: null,
            title: this.neutralTitle,
            loading: false,
            contentEnabled: false,
            deleteEnabled: false,
            forwardEnabled: false,
            headers: '',
            fields: { ...EMPTY_FIELDS },
            body: null,
            plainText: null,
            htmlFile: null,
            tabs: { body: false, plainText: false },
        };
    }

    private publish(state: DisplayState): void {
        this.state = state;
        for (const listener of [...this.displayListeners]) {
            listener(cloneState(state));
        }
    }
}

export function renderKey(sessionId: number): string {
    return `session-${sessionId}`;
}

function cloneState(state: DisplayState): DisplayState {
    return {
        ...state,
        fields: { ...state.fields },
        body: state.body ? { ...state.body } : null,
        tabs: { ...state.tabs },
    };
}
