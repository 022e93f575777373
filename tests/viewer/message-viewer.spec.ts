import { NOTIFICATION_DURATION_MS, NOTIFICATION_TITLE } from '../../src/services/viewer/MessageViewer';
import { DisplayPhase } from '../../src/types/display';
import { MessageEntry } from '../../src/types/message';
import { deferred, makeEntry, makeMessage, settle, waitFor } from '../helpers/fakes';
import { buildViewer } from '../helpers/viewerHarness';

describe('MessageViewer', () => {
    const m1 = makeEntry('m1', 1);
    const m2 = makeEntry('m2', 2);
    const m3 = makeEntry('m3', 3);

    it('loads the list on start and shows the most recent message', async () => {
        const { queue, loader, viewer } = buildViewer([m2, m1]);

        await viewer.start();

        expect(viewer.listSnapshot().entries.map((entry) => entry.id)).toEqual(['m1', 'm2']);
        expect(viewer.listSnapshot().selectedIndex).toBe(1);
        expect(viewer.displaySnapshot().phase).toBe('loading');

        loader.latest('m2').deferred.resolve(makeMessage({ subject: 'Second' }));
        await settle(queue);

        expect(viewer.displaySnapshot().phase).toBe('rendered');
        expect(viewer.displaySnapshot().title).toBe('Second');
        expect(viewer.isRunning).toBe(true);
    });

    it('inserts a new arrival without moving the selection and raises a notification', async () => {
        const { queue, loader, repository, notifier, viewer } = buildViewer([m1, m2]);
        await viewer.start();

        repository.arrive(m3);
        await settle(queue);

        expect(viewer.listSnapshot().entries.map((entry) => entry.id)).toEqual(['m1', 'm2', 'm3']);
        expect(viewer.listSnapshot().selectedIds).toEqual(['m2']);
        expect(notifier.notifications).toEqual([]);

        loader.latest('m3').deferred.resolve(makeMessage({ from: 'f'.repeat(60), subject: 's'.repeat(55) }));
        await settle(queue);

        expect(notifier.notifications).toEqual([
            {
                title: NOTIFICATION_TITLE,
                body: `From: ${'f'.repeat(50)}\nSubject: ${'s'.repeat(50)}`,
                durationMs: NOTIFICATION_DURATION_MS,
            },
        ]);
        expect(NOTIFICATION_DURATION_MS).toBe(5000);
    });

    it('keeps short notification fields as they are', async () => {
        const { queue, loader, repository, notifier, viewer } = buildViewer([m1]);
        await viewer.start();

        repository.arrive(m2);
        await settle(queue);
        loader.latest('m2').deferred.resolve(makeMessage({ from: 'ops@example.test', subject: 'Report' }));
        await settle(queue);

        expect(notifier.notifications.map((payload) => payload.body)).toEqual([
            'From: ops@example.test\nSubject: Report',
        ]);
    });

    it('ignores an arrival whose id is already listed', async () => {
        const { queue, loader, repository, notifier, viewer } = buildViewer([m1, m2]);
        await viewer.start();

        repository.arrive(makeEntry('m1', 9));
        await settle(queue);

        expect(viewer.listSnapshot().entries).toHaveLength(2);
        expect(loader.loadsFor('m1')).toEqual([]);
        expect(notifier.notifications).toEqual([]);
    });

    it('skips the notification when the new message cannot be loaded', async () => {
        const { queue, loader, repository, notifier, viewer } = buildViewer([m1]);
        await viewer.start();

        repository.arrive(m2);
        await settle(queue);
        loader.latest('m2').deferred.reject(new Error('unreadable'));
        await settle(queue);

        expect(viewer.listSnapshot().entries.map((entry) => entry.id)).toEqual(['m1', 'm2']);
        expect(notifier.notifications).toEqual([]);
    });

    it('reloads the list when the repository asks for a refresh', async () => {
        const { repository, viewer } = buildViewer([m1, m2]);
        await viewer.start();
        repository.entries.set('m3', m3);

        repository.announceRefresh();
        await waitFor(() => viewer.listSnapshot().entries.length === 3);

        expect(repository.loadAllCalls).toBe(2);
        expect(viewer.listSnapshot().selectedIds).toEqual(['m2']);
    });

    it('keeps a message that arrives while a refresh is reading the repository', async () => {
        const { queue, repository, viewer } = buildViewer([m1]);
        await viewer.start();
        const listing = deferred<MessageEntry[]>();
        repository.loadAll = () => listing.promise;

        const refreshing = viewer.refresh();
        await settle(queue);
        repository.arrive(m2);
        await settle(queue);
        expect(viewer.listSnapshot().entries.map((entry) => entry.id)).toEqual(['m1', 'm2']);

        listing.resolve([m1]);
        await refreshing;

        expect(viewer.listSnapshot().entries.map((entry) => entry.id)).toEqual(['m1', 'm2']);
    });

    it('keeps a deletion made while a refresh is reading the repository', async () => {
        const { queue, repository, viewer } = buildViewer([m1, m2]);
        await viewer.start();
        const listing = deferred<MessageEntry[]>();
        const loadAll = repository.loadAll.bind(repository);
        repository.loadAll = () => listing.promise;

        const refreshing = viewer.refresh();
        await settle(queue);
        repository.loadAll = loadAll;
        await viewer.deleteSelected();
        listing.resolve([m1, m2]);
        await refreshing;

        expect(viewer.listSnapshot().entries.map((entry) => entry.id)).toEqual(['m1']);
    });

    it('drops cached content of deleted and vanished messages', async () => {
        const { loader, repository, viewer } = buildViewer([m1, m2, m3]);
        await viewer.start();

        await viewer.deleteSelected();
        expect(loader.evictions).toEqual(['m3']);

        repository.entries.delete('m1');
        await viewer.refresh();
        expect(loader.evictions).toEqual(['m3', 'm1']);
    });

    it('logs and survives a failed refresh', async () => {
        const { repository, viewer } = buildViewer([m1]);
        repository.loadAll = async () => {
            throw new Error('store offline');
        };

        await expect(viewer.refresh()).resolves.toBeUndefined();
        expect(viewer.listSnapshot().entries).toEqual([]);
    });

    it('loads the entry chosen by the user and cancels the previous load', async () => {
        const { loader, viewer } = buildViewer([m1, m2]);
        await viewer.start();

        await expect(viewer.select('m1')).resolves.toBe(true);

        expect(viewer.displaySnapshot().entryId).toBe('m1');
        expect(viewer.displaySnapshot().phase).toBe('loading');
        expect(loader.latest('m2').cancelCount).toBe(1);
    });

    it('selects the most recent entry on request', async () => {
        const { viewer } = buildViewer([m1, m2, m3]);
        await viewer.start();
        await viewer.select('m1');

        await viewer.selectMostRecent();

        expect(viewer.listSnapshot().selectedIds).toEqual(['m3']);
        expect(viewer.displaySnapshot().entryId).toBe('m3');
    });

    it('toggles extra entries into the selection', async () => {
        const { viewer } = buildViewer([m1, m2, m3]);
        await viewer.start();

        await expect(viewer.toggle('m1')).resolves.toBe(true);

        expect(viewer.listSnapshot().selectedIds).toEqual(['m1', 'm3']);
    });

    it('disables every action once the last message is deleted', async () => {
        const { queue, loader, viewer } = buildViewer([m1]);
        await viewer.start();
        loader.latest('m1').deferred.resolve(makeMessage());
        await settle(queue);
        expect(viewer.displaySnapshot().deleteEnabled).toBe(true);

        const outcome = await viewer.deleteSelected();

        expect(outcome.deleted).toEqual(['m1']);
        const state = viewer.displaySnapshot();
        expect(state.phase).toBe('idle');
        expect(state.deleteEnabled).toBe(false);
        expect(state.forwardEnabled).toBe(false);
        expect(state.contentEnabled).toBe(false);
        expect(viewer.listSnapshot()).toEqual({ entries: [], selectedIndex: null, selectedIds: [] });
    });

    it('keeps publishing display changes after a restart', async () => {
        const { queue, loader, coordinator, viewer } = buildViewer([m1]);
        const phases: DisplayPhase[] = [];
        coordinator.onDisplayChanged((state) => phases.push(state.phase));
        await viewer.start();

        viewer.stop();
        await viewer.start();
        loader.latest('m1').deferred.resolve(makeMessage());
        await settle(queue);

        expect(phases).toEqual(['loading', 'idle', 'loading', 'rendered']);
        expect(viewer.displaySnapshot().entryId).toBe('m1');
    });

    it('detaches from the repository on stop', async () => {
        const { repository, viewer } = buildViewer([m1]);
        await viewer.start();
        expect(repository.listenerCount).toBe(2);

        viewer.stop();

        expect(repository.listenerCount).toBe(0);
        expect(viewer.isRunning).toBe(false);
    });
});
