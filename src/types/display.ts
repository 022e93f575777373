import { MessageBody } from './message';

export type DisplayPhase = 'idle' | 'loading' | 'rendered' | 'failed';

export type LoadSessionStatus = 'pending' | 'delivered' | 'cancelled' | 'failed';

export interface DisplayFields {
    from: string;
    to: string;
    cc: string;
    bcc: string;
    date: string;
    subject: string;
}

export interface DisplayTabs {
    body: boolean;
    plainText: boolean;
}

export interface DisplayState {
    phase: DisplayPhase;
    sessionId: number | null;
    entryId: string | null;
    title: string;
    loading: boolean;
    contentEnabled: boolean;
    deleteEnabled: boolean;
    forwardEnabled: boolean;
    headers: string;
    fields: DisplayFields;
    body: MessageBody | null;
    plainText: string | null;
    htmlFile: string | null;
    tabs: DisplayTabs;
}

export interface ListSnapshot {
    entries: ListEntryView[];
    selectedIndex: number | null;
    selectedIds: string[];
}

export interface ListEntryView {
    id: string;
    displayName: string;
    modifiedAt: string;
    size: number;
    exportable: boolean;
}

export interface NotificationPayload {
    title: string;
    body: string;
    durationMs: number;
}

export interface FileDropPayload {
    paths: string[];
}
