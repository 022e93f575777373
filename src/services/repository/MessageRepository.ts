import { Token } from 'typedi';
import { MessageEntry } from '../../types/message';

export type NewMessageListener = (entry: MessageEntry) => void;

export type RefreshNeededListener = () => void;

/**
 * Store of captured messages. Listeners may be invoked from any background
 * context; consumers re-post onto their own queue before touching state.
 */
export interface MessageRepository {
    loadAll(): Promise<MessageEntry[]>;
    /** Rejects with `MessageNotFoundError` when the entry is already gone. */
    delete(entry: MessageEntry): Promise<void>;
    onNewMessage(listener: NewMessageListener): () => void;
    onRefreshNeeded(listener: RefreshNeededListener): () => void;
}

export const MessageRepositoryToken = new Token<MessageRepository>('message-repository');
