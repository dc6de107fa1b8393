import { describe, it, expect, vi } from 'vitest';
import { FeedCoordinator, toResults } from '../src/FeedCoordinator';
import { FetchResult, FeedSource } from '../src/FeedFetcher';
import { FeedIngestor } from '../src/FeedIngestor';
import { FeedDescriptor } from '../src/types';
import {
    buildZip,
    encodeFeed,
    failed,
    FakeStorage,
    GatedSource,
    nextTick,
    payload,
    ScriptedSource,
    tripUpdateEntity,
    vehicleEntity,
} from './helpers';

const A: FeedDescriptor = { url: 'https://example.com/a/trip_updates', kind: 'trip_updates' };
const B: FeedDescriptor = { url: 'https://example.com/b/trip_updates', kind: 'trip_updates' };
const C: FeedDescriptor = { url: 'https://example.com/c/trip_updates', kind: 'trip_updates' };
const VP: FeedDescriptor = { url: 'https://example.com/a/vehicle_positions', kind: 'vehicle_positions' };
const STATIC: FeedDescriptor = { url: 'https://example.com/gtfs.zip', kind: 'static' };

const tripFeed = payload(encodeFeed([tripUpdateEntity('e1', 'T1')]));

function setup(responses: Record<string, FetchResult>) {
    const source = new ScriptedSource(responses);
    const storage = new FakeStorage();
    const ingestor = new FeedIngestor(source, storage);
    return { source, storage, ingestor, coordinator: new FeedCoordinator(ingestor) };
}

describe('FeedCoordinator', () => {
    it('should report each feed independently', async () => {
        const { storage, coordinator } = setup({
            [A.url]: failed({ kind: 'timeout', message: 'timed out' }),
            [B.url]: tripFeed,
            [C.url]: tripFeed,
        });

        const results = await coordinator.ingestRealtimeFeeds([A, B, C]);

        expect(results).toEqual({ [A.url]: false, [B.url]: true, [C.url]: true });
        expect(storage.realtimeCalls.map((call) => call.feedUrl).sort()).toEqual([B.url, C.url]);
    });

    it('should start every feed before any finishes', async () => {
        const started: string[] = [];
        let release: () => void = () => undefined;
        const gate = new Promise<void>((resolve) => {
            release = resolve;
        });
        const source: FeedSource = {
            fetch: async (url) => {
                started.push(url);
                await gate;
                return tripFeed;
            },
        };
        const coordinator = new FeedCoordinator(new FeedIngestor(source, new FakeStorage()));

        const pending = coordinator.ingestRealtimeFeeds([A, B, C]);
        await nextTick();

        expect(started).toEqual([A.url, B.url, C.url]);
        release();
        expect(await pending).toEqual({ [A.url]: true, [B.url]: true, [C.url]: true });
    });

    it('should record a task that rejects as unexpected for that feed only', async () => {
        const { ingestor, coordinator } = setup({ [B.url]: tripFeed });
        const original = ingestor.realtimeOutcome.bind(ingestor);
        vi.spyOn(ingestor, 'realtimeOutcome').mockImplementation(async (descriptor) => {
            if (descriptor.url === A.url) {
                throw new Error('boom');
            }
            return original(descriptor);
        });

        const outcomes = await coordinator.runRealtime([A, B]);

        expect(outcomes).toEqual([
            { descriptor: A, succeeded: false, error: 'unexpected' },
            { descriptor: B, succeeded: true },
        ]);
    });

    it('should only run descriptors of the selected kinds', async () => {
        const { source, coordinator } = setup({
            [A.url]: tripFeed,
            [VP.url]: payload(encodeFeed([vehicleEntity('v1', 'bus_1')])),
        });

        const results = await coordinator.ingestRealtimeFeeds([A, VP], ['vehicle_positions']);

        expect(results).toEqual({ [VP.url]: true });
        expect(source.calls).toEqual([VP.url]);
    });

    it('should return an empty mapping for an empty feed list', async () => {
        const { coordinator } = setup({});

        expect(await coordinator.ingestRealtimeFeeds([])).toEqual({});
        expect(await coordinator.ingestStaticFeeds([])).toEqual({});
    });

    it('should not start real-time feeds until static ingestion has finished', async () => {
        const source = new GatedSource(
            { [STATIC.url]: payload(buildZip({ 'stops.txt': 'stop_id\nS1\n' })), [A.url]: tripFeed },
            STATIC.url,
        );
        const storage = new FakeStorage();
        const coordinator = new FeedCoordinator(new FeedIngestor(source, storage));

        const pending = coordinator.ingestAll([STATIC], [A]);
        await nextTick();

        expect(source.started).toEqual([STATIC.url]);
        source.release();
        expect(await pending).toEqual({ [STATIC.url]: true, [A.url]: true });
        expect(source.started).toEqual([STATIC.url, A.url]);
        expect(storage.staticCalls).toHaveLength(1);
        expect(storage.realtimeCalls).toHaveLength(1);
    });

    it('should still ingest real-time feeds when a static feed fails', async () => {
        const { coordinator } = setup({ [A.url]: tripFeed });

        expect(await coordinator.ingestAll([STATIC], [A])).toEqual({ [STATIC.url]: false, [A.url]: true });
    });
});

describe('toResults', () => {
    it('should keep one entry per URL with the last outcome winning', () => {
        expect(
            toResults([
                { descriptor: A, succeeded: true },
                { descriptor: A, succeeded: false, error: 'network' },
            ]),
        ).toEqual({ [A.url]: false });
    });
});
