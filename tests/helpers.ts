import AdmZip from 'adm-zip';
import { Writer } from 'protobufjs';
import { FetchResult, FeedSource } from '../src/FeedFetcher';
import { FeedEntityType, FeedHeaderType, FeedMessageType } from '../src/GTFSRealtime';
import { Failure, RealtimeSnapshot, StaticSnapshot, StorageService } from '../src/types';

export const HEADER = { gtfsRealtimeVersion: '2.0', timestamp: 1760760000 };

export function encodeFeed(entity: object[], header: object = HEADER): Buffer {
    const message = FeedMessageType.fromObject({ header, entity });
    return Buffer.from(FeedMessageType.encode(message).finish());
}

export function encodeEntity(entity: object): Uint8Array {
    return FeedEntityType.encode(FeedEntityType.fromObject(entity)).finish();
}

// Builds a FeedMessage from raw entity payloads so malformed entities can be embedded
export function encodeFeedWithRawEntities(entities: Uint8Array[], header: object = HEADER): Buffer {
    const writer = Writer.create();
    writer.uint32((1 << 3) | 2).bytes(FeedHeaderType.encode(FeedHeaderType.fromObject(header)).finish());
    for (const entity of entities) {
        writer.uint32((2 << 3) | 2).bytes(entity);
    }
    return Buffer.from(writer.finish());
}

export function tripUpdateEntity(id: string, tripId: string): object {
    return {
        id,
        tripUpdate: {
            trip: { tripId, routeId: 'R1', directionId: 1, startTime: '08:15:00', startDate: '20261018' },
            vehicle: { id: 'toyama_tram-5007' },
            timestamp: 1760759990,
            delay: 90,
        },
    };
}

export function vehicleEntity(id: string, vehicleId: string): object {
    return {
        id,
        vehicle: {
            trip: { tripId: 'T9', routeId: 'R2' },
            vehicle: { id: vehicleId },
            position: { latitude: 36.5, longitude: 137.25, bearing: 90, speed: 12.5 },
            currentStopSequence: 4,
            currentStatus: 'STOPPED_AT',
            timestamp: 1760759995,
        },
    };
}

export function buildZip(files: Record<string, string>): Buffer {
    const zip = new AdmZip();
    for (const [name, content] of Object.entries(files)) {
        zip.addFile(name, Buffer.from(content, 'utf-8'));
    }
    return zip.toBuffer();
}

export function payload(bytes: Buffer): FetchResult {
    return { ok: true, payload: { bytes, capturedAt: new Date('2026-10-18T03:00:00Z') } };
}

export function failed(failure: Failure): FetchResult {
    return { ok: false, failure };
}

// Answers each URL from a table; unknown URLs fail with a 404
export class ScriptedSource implements FeedSource {
    readonly calls: string[] = [];

    constructor(
        private readonly responses: Record<string, FetchResult>,
        private readonly onFetch?: (url: string) => void,
    ) {}

    async fetch(url: string): Promise<FetchResult> {
        this.calls.push(url);
        this.onFetch?.(url);
        return this.responses[url] ?? failed({ kind: 'http_status', status: 404, message: 'not found' });
    }
}

// Holds fetches of one URL until release() is called; records the order fetches start in
export class GatedSource implements FeedSource {
    readonly started: string[] = [];
    private open: () => void = () => undefined;
    private readonly gate = new Promise<void>((resolve) => {
        this.open = resolve;
    });

    constructor(
        private readonly responses: Record<string, FetchResult>,
        private readonly gatedUrl: string,
    ) {}

    release(): void {
        this.open();
    }

    async fetch(url: string): Promise<FetchResult> {
        this.started.push(url);
        if (url === this.gatedUrl) {
            await this.gate;
        }
        return this.responses[url] ?? failed({ kind: 'http_status', status: 404, message: 'not found' });
    }
}

export function nextTick(): Promise<void> {
    return new Promise<void>((resolve) => setImmediate(resolve));
}

export interface RealtimeStoreCall {
    parsed: RealtimeSnapshot;
    feedUrl: string;
    rawBytes: Buffer;
    captureTimestamp: string;
    feedName?: string;
}

export interface StaticStoreCall {
    tables: StaticSnapshot;
    feedUrl: string;
    rawBytes: Buffer;
    captureTimestamp: string;
    feedName?: string;
}

export class FakeStorage implements StorageService {
    readonly realtimeCalls: RealtimeStoreCall[] = [];
    readonly staticCalls: StaticStoreCall[] = [];
    result = true;

    async storeRealtime(
        parsed: RealtimeSnapshot,
        feedUrl: string,
        rawBytes: Buffer,
        captureTimestamp: string,
        feedName?: string,
    ): Promise<boolean> {
        this.realtimeCalls.push({ parsed, feedUrl, rawBytes, captureTimestamp, feedName });
        return this.result;
    }

    async storeStatic(
        tables: StaticSnapshot,
        feedUrl: string,
        rawBytes: Buffer,
        captureTimestamp: string,
        feedName?: string,
    ): Promise<boolean> {
        this.staticCalls.push({ tables, feedUrl, rawBytes, captureTimestamp, feedName });
        return this.result;
    }
}
