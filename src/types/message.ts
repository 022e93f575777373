export interface MessageEntry {
    /** Identity token: the file name inside the repository root. */
    readonly id: string;
    readonly displayName: string;
    readonly modifiedAt: Date;
    readonly size: number;
    /** Absolute backing path, used for drag export. */
    readonly file?: string;
}

export interface MessageHeader {
    key: string;
    line: string;
}

export type BodyKind = 'html' | 'text';

export interface MessageBody {
    kind: BodyKind;
    text: string;
}

export interface InlineResource {
    contentId: string;
    contentType: string;
    content: Buffer;
}

export interface MessageAddressing {
    from: string;
    to: string;
    cc: string;
    bcc: string;
    date: Date | null;
}

export interface FullMessage extends MessageAddressing {
    headers: MessageHeader[];
    subject: string;
    body: MessageBody;
    plainText?: string;
    inlineResources: InlineResource[];
}

export function sameEntry(a: MessageEntry | null, b: MessageEntry | null): boolean {
    if (a === null || b === null) {
        return a === b;
    }
    return a.id === b.id;
}
