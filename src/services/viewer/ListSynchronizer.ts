import { Service } from 'typedi';
import { ListSnapshot } from '../../types/display';
import { MessageEntry, sameEntry } from '../../types/message';

export type SelectionListener = (entry: MessageEntry | null) => void;

export type ListChangeListener = (snapshot: ListSnapshot) => void;

export interface CapturedSelection {
    entries: MessageEntry[];
    anchorIndex: number | null;
}

/** Handed out when a refresh starts reading the repository; passed back to `reset`. */
export interface RefreshTicket {
    readonly id: number;
    readonly revision: number;
}

interface JournalChange {
    readonly revision: number;
    readonly kind: 'insert' | 'remove';
    readonly entry: MessageEntry;
}

/**
 * Ordered, observable list of message entries plus its selection.
 *
 * Entries stay sorted by modification time (ascending, ties in arrival order)
 * and ids are unique. Only the UI queue calls into this class.
 */
@Service()
export class ListSynchronizer {
    private entries: MessageEntry[] = [];
    private selectedIndex: number | null = null;
    private readonly extraSelection = new Set<string>();
    private readonly selectionListeners = new Set<SelectionListener>();
    private readonly changeListeners = new Set<ListChangeListener>();
    // Inserts and removals made while a refresh is reading the repository.
    private journal: JournalChange[] = [];
    private readonly openRefreshes = new Map<number, number>();
    private revision = 0;
    private nextTicketId = 1;

    get length(): number {
        return this.entries.length;
    }

    get selectedEntry(): MessageEntry | null {
        return this.selectedIndex === null ? null : this.entries[this.selectedIndex] ?? null;
    }

    get selectedPosition(): number | null {
        return this.selectedIndex;
    }

    items(): readonly MessageEntry[] {
        return this.entries;
    }

    find(id: string): MessageEntry | undefined {
        return this.entries.find((entry) => entry.id === id);
    }

    onSelectionChanged(listener: SelectionListener): () => void {
        this.selectionListeners.add(listener);
        return () => {
            this.selectionListeners.delete(listener);
        };
    }

    onChanged(listener: ListChangeListener): () => void {
        this.changeListeners.add(listener);
        return () => {
            this.changeListeners.delete(listener);
        };
    }

    /**
     * Marks the start of a repository read. Changes applied after this point are
     * replayed over the snapshot given to `reset`, since the read may predate them.
     */
    beginRefresh(): RefreshTicket {
        const ticket: RefreshTicket = { id: this.nextTicketId, revision: this.revision };
        this.nextTicketId += 1;
        this.openRefreshes.set(ticket.id, ticket.revision);
        return ticket;
    }

    /** Closes a ticket whose snapshot will never arrive. */
    endRefresh(ticket: RefreshTicket): void {
        this.openRefreshes.delete(ticket.id);
        if (this.openRefreshes.size === 0) {
            this.journal = [];
        }
    }

    reset(entries: readonly MessageEntry[], ticket: RefreshTicket | null = null): void {
        const previous = this.selectedEntry;
        const previousIndex = this.selectedIndex;

        const unique = new Map<string, MessageEntry>();
        for (const entry of entries) {
            if (!unique.has(entry.id)) {
                unique.set(entry.id, entry);
            }
        }
        if (ticket) {
            for (const change of this.journal) {
                if (change.revision <= ticket.revision) {
                    continue;
                }
                if (change.kind === 'remove') {
                    unique.delete(change.entry.id);
                } else if (!unique.has(change.entry.id)) {
                    unique.set(change.entry.id, change.entry);
                }
            }
            this.endRefresh(ticket);
        }

        this.entries = stableSortByModified([...unique.values()]);
        this.extraSelection.clear();
        this.selectedIndex = this.pickIndex(previousIndex);
        this.commit(previous);
    }

    /** Returns false when an entry with the same id is already listed. */
    insert(entry: MessageEntry): boolean {
        if (this.entries.some((existing) => existing.id === entry.id)) {
            return false;
        }

        const previous = this.selectedEntry;
        const position = upperBound(this.entries, entry.modifiedAt.getTime());
        this.entries.splice(position, 0, entry);
        this.record('insert', entry);
        if (this.selectedIndex !== null && position <= this.selectedIndex) {
            this.selectedIndex += 1;
        }
        this.commit(previous);
        return true;
    }

    remove(entries: Iterable<MessageEntry>, anchorIndex: number | null = this.selectedIndex): void {
        const doomed = new Set<string>();
        for (const entry of entries) {
            doomed.add(entry.id);
        }
        if (doomed.size === 0) {
            return;
        }

        const previous = this.selectedEntry;
        const removed = this.entries.filter((entry) => doomed.has(entry.id));
        if (removed.length === 0) {
            return;
        }
        this.entries = this.entries.filter((entry) => !doomed.has(entry.id));
        for (const entry of removed) {
            this.record('remove', entry);
        }

        for (const id of doomed) {
            this.extraSelection.delete(id);
        }
        this.selectedIndex = this.pickIndex(anchorIndex);
        if (this.selectedIndex === null) {
            this.extraSelection.clear();
        }
        this.commit(previous);
    }

    /** Makes `id` the only selected entry; `null` clears the selection. */
    select(id: string | null): boolean {
        const previous = this.selectedEntry;
        if (id === null) {
            this.selectedIndex = null;
            this.extraSelection.clear();
            this.commit(previous);
            return true;
        }

        const index = this.entries.findIndex((entry) => entry.id === id);
        if (index < 0) {
            return false;
        }
        this.selectedIndex = index;
        this.extraSelection.clear();
        this.commit(previous);
        return true;
    }

    /**
     * Adds `id` to, or drops it from, the multi-selection. The primary entry only
     * changes when the selection was empty or the primary itself is toggled off.
     */
    toggle(id: string): boolean {
        const index = this.entries.findIndex((entry) => entry.id === id);
        if (index < 0) {
            return false;
        }

        const previous = this.selectedEntry;
        if (this.selectedIndex === null) {
            this.selectedIndex = index;
        } else if (this.selectedIndex === index) {
            const next = this.firstExtraIndex();
            this.selectedIndex = next;
            if (next !== null) {
                this.extraSelection.delete(this.entries[next].id);
            }
        } else if (this.extraSelection.has(id)) {
            this.extraSelection.delete(id);
        } else {
            this.extraSelection.add(id);
        }
        this.commit(previous);
        return true;
    }

    selectMostRecent(): void {
        const previous = this.selectedEntry;
        this.selectedIndex = this.entries.length > 0 ? this.entries.length - 1 : null;
        this.extraSelection.clear();
        this.commit(previous);
    }

    captureSelection(): CapturedSelection {
        if (this.selectedIndex === null) {
            return { entries: [], anchorIndex: null };
        }
        const selected = this.selectedIds();
        return {
            entries: this.entries.filter((entry) => selected.has(entry.id)),
            anchorIndex: this.selectedIndex,
        };
    }

    snapshot(): ListSnapshot {
        const selected = this.selectedIds();
        return {
            entries: this.entries.map((entry) => ({
                id: entry.id,
                displayName: entry.displayName,
                modifiedAt: entry.modifiedAt.toISOString(),
                size: entry.size,
                exportable: Boolean(entry.file?.trim()),
            })),
            selectedIndex: this.selectedIndex,
            selectedIds: this.entries.filter((entry) => selected.has(entry.id)).map((entry) => entry.id),
        };
    }

    // Keep the ordinal position if it is still in range, else fall back to the last entry.
    private pickIndex(anchorIndex: number | null): number | null {
        if (this.entries.length === 0) {
            return null;
        }
        if (anchorIndex !== null && anchorIndex >= 0 && anchorIndex < this.entries.length) {
            return anchorIndex;
        }
        return this.entries.length - 1;
    }

    private record(kind: JournalChange['kind'], entry: MessageEntry): void {
        if (this.openRefreshes.size === 0) {
            return;
        }
        this.revision += 1;
        this.journal.push({ revision: this.revision, kind, entry });
    }

    private firstExtraIndex(): number | null {
        const index = this.entries.findIndex((entry) => this.extraSelection.has(entry.id));
        return index < 0 ? null : index;
    }

    private selectedIds(): Set<string> {
        const ids = new Set(this.extraSelection);
        const primary = this.selectedEntry;
        if (primary) {
            ids.add(primary.id);
        }
        return ids;
    }

    private commit(previous: MessageEntry | null): void {
        const current = this.selectedEntry;
        if (!sameEntry(previous, current)) {
            for (const listener of [...this.selectionListeners]) {
                listener(current);
            }
        }
        if (this.changeListeners.size > 0) {
            const snapshot = this.snapshot();
            for (const listener of [...this.changeListeners]) {
                listener(snapshot);
            }
        }
    }
}

function upperBound(entries: readonly MessageEntry[], time: number): number {
    let low = 0;
    let high = entries.length;
    while (low < high) {
        const mid = (low + high) >>> 1;
        if (entries[mid].modifiedAt.getTime() <= time) {
            low = mid + 1;
        } else {
            high = mid;
        }
    }
    return low;
}

function stableSortByModified(entries: MessageEntry[]): MessageEntry[] {
    return entries
        .map((entry, order) => ({ entry, order }))
        .sort((a, b) => a.entry.modifiedAt.getTime() - b.entry.modifiedAt.getTime() || a.order - b.order)
        .map(({ entry }) => entry);
}
