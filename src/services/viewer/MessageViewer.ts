import { Inject, Service } from 'typedi';
import { DisplayState, ListSnapshot } from '../../types/display';
import { FullMessage, MessageEntry } from '../../types/message';
import { truncate } from '../../utils/text';
import { NotificationPublisher, NotificationPublisherToken } from '../events/ViewerEventHub';
import { ContentLoad, ContentLoader, ContentLoaderToken } from '../loader/ContentLoader';
import { Logger } from '../logging/Logger';
import { UiQueue } from '../queue/UiQueue';
import { MessageRepository, MessageRepositoryToken } from '../repository/MessageRepository';
import { DeletionGuard, DeletionOutcome } from './DeletionGuard';
import { ListSynchronizer } from './ListSynchronizer';
import { SelectionLoadCoordinator } from './SelectionLoadCoordinator';

export const NOTIFICATION_TITLE = 'New Message Received';
export const NOTIFICATION_DURATION_MS = 5000;
export const NOTIFICATION_FIELD_LIMIT = 50;

/**
 * Wires the repository, the live list and the content coordinator together.
 * Repository callbacks arrive from background contexts and are re-posted onto
 * the UI queue before anything reads or writes list state.
 */
@Service()
export class MessageViewer {
    private readonly logger: Logger;
    private subscriptions: Array<() => void> = [];
    private running = false;

    constructor(
        @Inject(MessageRepositoryToken) private readonly repository: MessageRepository,
        @Inject(ContentLoaderToken) private readonly loader: ContentLoader,
        @Inject(NotificationPublisherToken) private readonly notifier: NotificationPublisher,
        private readonly queue: UiQueue,
        private readonly list: ListSynchronizer,
        private readonly coordinator: SelectionLoadCoordinator,
        private readonly guard: DeletionGuard,
        logger: Logger,
    ) {
        this.logger = logger.child('viewer');
    }

    get isRunning(): boolean {
        return this.running;
    }

    async start(): Promise<void> {
        if (this.running) {
            return;
        }
        this.running = true;

        this.subscriptions = [
            this.list.onSelectionChanged((entry) => this.coordinator.select(entry)),
            this.repository.onNewMessage((entry) => {
                this.queue.post(() => this.addNewMessage(entry), `new-message:${entry.id}`);
            }),
            this.repository.onRefreshNeeded(() => {
                void this.refresh();
            }),
        ];

        await this.refresh();
        await this.queue.run(() => {
            // After a restart the list may keep its selection while the display was cleared.
            const selected = this.list.selectedEntry;
            if (selected && this.coordinator.activeSessionId === null) {
                this.coordinator.select(selected);
            }
        }, 'restore-display');
    }

    stop(): void {
        for (const unsubscribe of this.subscriptions) {
            unsubscribe();
        }
        this.subscriptions = [];
        this.coordinator.select(null);
        this.running = false;
    }

    /** Reloads every entry from the repository and replaces the list. */
    async refresh(): Promise<void> {
        const ticket = await this.queue.run(() => this.list.beginRefresh(), 'refresh-begin');
        try {
            const entries = await this.repository.loadAll();
            await this.queue.run(() => {
                const before = this.list.items().map((entry) => entry.id);
                this.list.reset(entries, ticket);
                this.evictMissing(before);
            }, 'refresh');
        } catch (error: unknown) {
            this.logger.error('Failed to refresh message list', error);
            this.queue.post(() => this.list.endRefresh(ticket), 'refresh-abandon');
        }
    }

    select(id: string | null): Promise<boolean> {
        return this.queue.run(() => this.list.select(id), 'select');
    }

    toggle(id: string): Promise<boolean> {
        return this.queue.run(() => this.list.toggle(id), 'toggle');
    }

    selectMostRecent(): Promise<void> {
        return this.queue.run(() => this.list.selectMostRecent(), 'select-most-recent');
    }

    async deleteSelected(): Promise<DeletionOutcome> {
        const outcome = await this.guard.deleteSelected();
        for (const id of [...outcome.deleted, ...outcome.missing]) {
            this.loader.evict(id);
        }
        return outcome;
    }

    listSnapshot(): ListSnapshot {
        return this.list.snapshot();
    }

    displaySnapshot(): DisplayState {
        return this.coordinator.snapshot();
    }

    private evictMissing(previousIds: string[]): void {
        for (const id of previousIds) {
            if (!this.list.find(id)) {
                this.loader.evict(id);
            }
        }
    }

    private addNewMessage(entry: MessageEntry): void {
        if (!this.list.insert(entry)) {
            return;
        }

        let load: ContentLoad;
        try {
            load = this.loader.get(entry);
        } catch (error: unknown) {
            this.logger.warn(`Unable to load new message "${entry.id}" for notification`, error);
            return;
        }

        load.result.then(
            (message) => {
                this.queue.post(() => this.notify(message), `notify:${entry.id}`);
            },
            (error: unknown) => {
                this.logger.warn(`Unable to load new message "${entry.id}" for notification`, error);
            },
        );
    }

    private notify(message: FullMessage): void {
        this.notifier.showNotification({
            title: NOTIFICATION_TITLE,
            body: `From: ${truncate(message.from, NOTIFICATION_FIELD_LIMIT)}\nSubject: ${truncate(message.subject, NOTIFICATION_FIELD_LIMIT)}`,
            durationMs: NOTIFICATION_DURATION_MS,
        });
    }
}
