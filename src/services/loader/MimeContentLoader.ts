import fs from 'node:fs';
import { simpleParser } from 'mailparser';
import { Inject, Service } from 'typedi';
import { ViewerConfig, ViewerConfigToken } from '../../config/viewerConfig';
import { ContentLoadError, LoadCancelledError } from '../../errors/ViewerErrors';
import { FullMessage, MessageEntry } from '../../types/message';
import { toFullMessage } from '../../utils/mime';
import { Logger } from '../logging/Logger';
import { ContentLoad, ContentLoader } from './ContentLoader';

/**
 * Reads `.eml` files and parses them with mailparser. Parsed messages are kept
 * in a small most-recently-used cache keyed by entry id.
 */
@Service()
export class MimeContentLoader implements ContentLoader {
    private readonly cache = new Map<string, FullMessage>();
    private readonly cacheSize: number;
    private readonly logger: Logger;

    constructor(@Inject(ViewerConfigToken) config: ViewerConfig, logger: Logger) {
        this.cacheSize = config.contentCacheSize;
        this.logger = logger.child('loader');
    }

    get(entry: MessageEntry): ContentLoad {
        const controller = new AbortController();
        return {
            result: this.load(entry, controller.signal),
            cancel: () => controller.abort(),
        };
    }

    evict(entryId: string): void {
        this.cache.delete(entryId);
    }

    private async load(entry: MessageEntry, signal: AbortSignal): Promise<FullMessage> {
        const cached = this.cache.get(entry.id);
        if (cached) {
            this.remember(entry.id, cached);
            return cached;
        }

        if (!entry.file) {
            throw new ContentLoadError('io', entry.id, {
                cause: new Error('Entry has no backing file'),
            });
        }

        let raw: Buffer;
        try {
            raw = await fs.promises.readFile(entry.file, { signal });
        } catch (error: unknown) {
            if (signal.aborted) {
                throw new LoadCancelledError(entry.id);
            }
            throw new ContentLoadError('io', entry.id, { cause: error });
        }

        if (signal.aborted) {
            throw new LoadCancelledError(entry.id);
        }

        let message: FullMessage;
        try {
            message = toFullMessage(await simpleParser(raw, { skipImageLinks: true }));
        } catch (error: unknown) {
            throw new ContentLoadError('parse', entry.id, { cause: error });
        }

        if (signal.aborted) {
            throw new LoadCancelledError(entry.id);
        }

        this.remember(entry.id, message);
        this.logger.debug(`Loaded message ${entry.id}`);
        return message;
    }

    private remember(entryId: string, message: FullMessage): void {
        if (this.cacheSize <= 0) {
            return;
        }
        this.cache.delete(entryId);
        this.cache.set(entryId, message);
        while (this.cache.size > this.cacheSize) {
            const oldest = this.cache.keys().next();
            if (oldest.done) {
                break;
            }
            this.cache.delete(oldest.value);
        }
    }
}
