export type ContentLoadErrorKind = 'io' | 'parse';

export class MessageNotFoundError extends Error {
    constructor(readonly entryId: string) {
        super(`Message ${entryId} no longer exists`);
        this.name = 'MessageNotFoundError';
    }
}

export class ContentLoadError extends Error {
    constructor(
        readonly kind: ContentLoadErrorKind,
        readonly entryId: string,
        options?: { cause?: unknown },
    ) {
        super(`Unable to ${kind === 'io' ? 'read' : 'parse'} message ${entryId}`, options);
        this.name = 'ContentLoadError';
    }
}

export class LoadCancelledError extends Error {
    constructor(readonly entryId: string) {
        super(`Load of message ${entryId} was cancelled`);
        this.name = 'LoadCancelledError';
    }
}

export class ConfigError extends Error {
    constructor(readonly issues: string[]) {
        super(`Invalid configuration: ${issues.join('; ')}`);
        this.name = 'ConfigError';
    }
}

export function describeError(error: unknown): string {
    if (error instanceof Error && error.message) {
        return error.message;
    }
    if (typeof error === 'string') {
        return error;
    }
    return 'unknown error';
}
