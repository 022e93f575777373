import { Inject, Service } from 'typedi';
import { ViewerConfig, ViewerConfigToken } from '../../config/viewerConfig';
import { MessageEntry } from '../../types/message';
import { EntryHitTester, Point } from './ExportAdapter';
import { ListSynchronizer } from './ListSynchronizer';

/** Maps a point in list coordinates to the row drawn there (fixed row height). */
@Service()
export class RowHitTester implements EntryHitTester {
    private scrollTop = 0;
    private readonly rowHeight: number;

    constructor(
        private readonly list: ListSynchronizer,
        @Inject(ViewerConfigToken) config: ViewerConfig,
    ) {
        this.rowHeight = config.rowHeight;
    }

    setScrollTop(value: number): void {
        this.scrollTop = Math.max(0, value);
    }

    entryAt(point: Point): MessageEntry | null {
        if (point.y < 0 || point.x < 0) {
            return null;
        }
        const row = Math.floor((point.y + this.scrollTop) / this.rowHeight);
        return this.list.items()[row] ?? null;
    }
}
