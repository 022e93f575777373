import fs from 'node:fs';
import path from 'node:path';
import { randomUUID } from 'node:crypto';
import { Inject, Service } from 'typedi';
import { ViewerConfig, ViewerConfigToken } from '../../config/viewerConfig';
import { MessageNotFoundError } from '../../errors/ViewerErrors';
import { MessageEntry } from '../../types/message';
import { Logger } from '../logging/Logger';
import { MessageRepository, NewMessageListener, RefreshNeededListener } from './MessageRepository';

const MESSAGE_EXTENSION = '.eml';

/**
 * One `.eml` file per message under the configured root. The capture service
 * drops files into the directory; `start()` watches it for arrivals and
 * removals made by other processes.
 */
@Service()
export class FileMessageRepository implements MessageRepository {
    private readonly root: string;
    private readonly logger: Logger;
    private readonly known = new Set<string>();
    // One set per running loadAll, collecting ids announced while it reads.
    private readonly announcedDuringLoad = new Set<Set<string>>();
    private readonly newMessageListeners = new Set<NewMessageListener>();
    private readonly refreshListeners = new Set<RefreshNeededListener>();
    private watcher: fs.FSWatcher | null = null;

    constructor(@Inject(ViewerConfigToken) config: ViewerConfig, logger: Logger) {
        this.root = config.messageRoot;
        this.logger = logger.child('repository');
        ensureDirectory(this.root);
    }

    get directory(): string {
        return this.root;
    }

    async loadAll(): Promise<MessageEntry[]> {
        const announced = new Set<string>();
        this.announcedDuringLoad.add(announced);
        try {
            const names = (await fs.promises.readdir(this.root)).filter(isMessageFile);
            const entries: MessageEntry[] = [];
            for (const name of names) {
                const entry = await this.readEntry(name);
                if (entry) {
                    entries.push(entry);
                }
            }

            this.known.clear();
            for (const entry of entries) {
                this.known.add(entry.id);
            }
            for (const id of announced) {
                this.known.add(id);
            }
            return entries;
        } finally {
            this.announcedDuringLoad.delete(announced);
        }
    }

    async delete(entry: MessageEntry): Promise<void> {
        try {
            await fs.promises.unlink(this.resolvePath(entry.id));
        } catch (error: unknown) {
            if (isMissingFileError(error)) {
                this.forget(entry.id);
                throw new MessageNotFoundError(entry.id);
            }
            throw error;
        }
        this.forget(entry.id);
        this.logger.debug(`Deleted message ${entry.id}`);
    }

    /** Stores a raw RFC 822 message and announces it like any other arrival. */
    async save(raw: string | Buffer): Promise<MessageEntry> {
        const name = `${timestampName(new Date())}-${randomUUID().slice(0, 8)}${MESSAGE_EXTENSION}`;
        this.remember(name);
        try {
            await fs.promises.writeFile(this.resolvePath(name), raw, { flag: 'wx' });
        } catch (error: unknown) {
            this.forget(name);
            throw error;
        }

        const entry = await this.readEntry(name);
        if (!entry) {
            this.forget(name);
            throw new MessageNotFoundError(name);
        }
        this.emitNewMessage(entry);
        return entry;
    }

    onNewMessage(listener: NewMessageListener): () => void {
        this.newMessageListeners.add(listener);
        return () => {
            this.newMessageListeners.delete(listener);
        };
    }

    onRefreshNeeded(listener: RefreshNeededListener): () => void {
        this.refreshListeners.add(listener);
        return () => {
            this.refreshListeners.delete(listener);
        };
    }

    start(): void {
        if (this.watcher) {
            return;
        }
        this.watcher = fs.watch(this.root, (_eventType, fileName) => {
            this.reconcile(fileName).catch((error: unknown) => {
                this.logger.error(`Failed to reconcile ${fileName ?? '<unknown>'}`, error);
            });
        });
        this.watcher.on('error', (error) => {
            this.logger.error('Message directory watcher failed', error);
        });
        this.logger.info(`Watching ${this.root}`);
    }

    stop(): void {
        this.watcher?.close();
        this.watcher = null;
    }

    /**
     * Brings a single file in line with what listeners have been told: an
     * unseen file is a new message, a vanished known file needs a refresh.
     */
    async reconcile(fileName: string | null): Promise<void> {
        if (fileName === null) {
            this.emitRefreshNeeded();
            return;
        }
        if (!isMessageFile(fileName)) {
            return;
        }

        const entry = await this.readEntry(fileName);
        if (entry && !this.known.has(entry.id)) {
            this.remember(entry.id);
            this.emitNewMessage(entry);
        } else if (!entry && this.known.has(fileName)) {
            this.forget(fileName);
            this.emitRefreshNeeded();
        }
    }

    private remember(id: string): void {
        this.known.add(id);
        for (const announced of this.announcedDuringLoad) {
            announced.add(id);
        }
    }

    private forget(id: string): void {
        this.known.delete(id);
        for (const announced of this.announcedDuringLoad) {
            announced.delete(id);
        }
    }

    private async readEntry(name: string): Promise<MessageEntry | null> {
        const file = this.resolvePath(name);
        try {
            const stats = await fs.promises.stat(file);
            if (!stats.isFile()) {
                return null;
            }
            return {
                id: name,
                displayName: name,
                modifiedAt: stats.mtime,
                size: stats.size,
                file,
            };
        } catch (error: unknown) {
            if (isMissingFileError(error)) {
                return null;
            }
            throw error;
        }
    }

    private resolvePath(name: string): string {
        return path.join(this.root, path.basename(name));
    }

    private emitNewMessage(entry: MessageEntry): void {
        for (const listener of [...this.newMessageListeners]) {
            listener(entry);
        }
    }

    private emitRefreshNeeded(): void {
        for (const listener of [...this.refreshListeners]) {
            listener();
        }
    }
}

function isMessageFile(name: string): boolean {
    return name.toLowerCase().endsWith(MESSAGE_EXTENSION);
}

// Structural: errors raised by Node core may come from another realm.
function isMissingFileError(error: unknown): boolean {
    return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

function ensureDirectory(dir: string): void {
    if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
    }
}

function timestampName(date: Date): string {
    const pad = (value: number, width = 2) => String(value).padStart(width, '0');
    return [
        date.getFullYear(),
        pad(date.getMonth() + 1),
        pad(date.getDate()),
        pad(date.getHours()),
        pad(date.getMinutes()),
        pad(date.getSeconds()),
        pad(date.getMilliseconds(), 3),
    ].join('');
}
