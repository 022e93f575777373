import { Inject, Service, Token } from 'typedi';
import { MessageEntry } from '../../types/message';

export const DRAG_THRESHOLD = 10;

export interface Point {
    x: number;
    y: number;
}

export interface EntryHitTester {
    entryAt(point: Point): MessageEntry | null;
}

export interface FileDropSink {
    beginFileDrop(paths: string[]): void;
}

export const EntryHitTesterToken = new Token<EntryHitTester>('entry-hit-tester');

export const FileDropSinkToken = new Token<FileDropSink>('file-drop-sink');

export type ExportSkipReason = 'no-origin' | 'scroll-control' | 'below-threshold' | 'no-entry' | 'no-file';

export type ExportOutcome =
    | { kind: 'tracking' }
    | { kind: 'started'; path: string }
    | { kind: 'skipped'; reason: ExportSkipReason };

export interface PointerMoveOptions {
    overScrollControl?: boolean;
}

/** Turns a drag that starts on a list row into a file-drop of that row's message file. */
@Service()
export class ExportAdapter {
    private origin: Point | null = null;

    constructor(
        @Inject(EntryHitTesterToken) private readonly hitTester: EntryHitTester,
        @Inject(FileDropSinkToken) private readonly sink: FileDropSink,
    ) {}

    get dragOrigin(): Point | null {
        return this.origin ? { ...this.origin } : null;
    }

    pointerDown(point: Point): ExportOutcome {
        if (this.origin === null) {
            this.origin = { ...point };
        }
        return { kind: 'tracking' };
    }

    pointerMove(point: Point, options: PointerMoveOptions = {}): ExportOutcome {
        const origin = this.origin;
        if (origin === null) {
            return { kind: 'skipped', reason: 'no-origin' };
        }
        if (options.overScrollControl) {
            return { kind: 'skipped', reason: 'scroll-control' };
        }
        if (Math.hypot(point.x - origin.x, point.y - origin.y) < DRAG_THRESHOLD) {
            return { kind: 'skipped', reason: 'below-threshold' };
        }

        this.origin = null;
        const entry = this.hitTester.entryAt(origin);
        if (entry === null) {
            return { kind: 'skipped', reason: 'no-entry' };
        }
        const file = entry.file?.trim();
        if (!file) {
            return { kind: 'skipped', reason: 'no-file' };
        }

        this.sink.beginFileDrop([file]);
        return { kind: 'started', path: file };
    }

    pointerUp(): ExportOutcome {
        this.origin = null;
        return { kind: 'skipped', reason: 'no-origin' };
    }
}
