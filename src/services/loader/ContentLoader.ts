import { Token } from 'typedi';
import { FullMessage, MessageEntry } from '../../types/message';

/**
 * One in-flight fetch. `cancel()` may be called any number of times, including
 * after `result` has settled.
 */
export interface ContentLoad {
    readonly result: Promise<FullMessage>;
    cancel(): void;
}

export interface ContentLoader {
    get(entry: MessageEntry): ContentLoad;
    /** Forgets anything cached for the entry. */
    evict(entryId: string): void;
}

export const ContentLoaderToken = new Token<ContentLoader>('content-loader');
