import { describeError, FeedError, toFailure } from './Errors';
import { FeedSource } from './FeedFetcher';
import { inferAgency, parseRealtime } from './GTFSRealtime';
import { countRows, parseStatic } from './GTFSStatic';
import { Logger, logger as rootLogger } from './Logger';
import { FeedDescriptor, FeedMetadata, IngestOutcome, RealtimeSnapshot, StaticSnapshot, StorageService } from './types';

// Whole-second ISO-8601 in UTC, e.g. 2026-10-18T04:05:06Z
export function formatCaptureTimestamp(date: Date): string {
    return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

function metadataFor(descriptor: FeedDescriptor): FeedMetadata {
    return descriptor.name ? { feedUrl: descriptor.url, feedName: descriptor.name } : { feedUrl: descriptor.url };
}

/**
 * Runs fetch → parse → annotate → store for a single feed. Nothing thrown on the way
 * leaves this class: every failure is logged with the feed's url, kind and name and
 * reported as an unsuccessful outcome.
 */
export class FeedIngestor {
    private readonly logger: Logger;

    constructor(
        private readonly source: FeedSource,
        private readonly storage: StorageService,
        logger: Logger = rootLogger,
    ) {
        this.logger = logger.child({ component: 'ingestor' });
    }

    async ingestRealtime(descriptor: FeedDescriptor, captureTimestamp?: string): Promise<boolean> {
        return (await this.realtimeOutcome(descriptor, captureTimestamp)).succeeded;
    }

    async ingestStatic(descriptor: FeedDescriptor, captureTimestamp?: string): Promise<boolean> {
        return (await this.staticOutcome(descriptor, captureTimestamp)).succeeded;
    }

    async realtimeOutcome(descriptor: FeedDescriptor, captureTimestamp?: string): Promise<IngestOutcome> {
        return this.guard(descriptor, async (log) => {
            const fetched = await this.source.fetch(descriptor.url);
            if (!fetched.ok) {
                throw new FeedError(fetched.failure.kind, fetched.failure.message, fetched.failure.status);
            }
            const timestamp = captureTimestamp ?? formatCaptureTimestamp(fetched.payload.capturedAt);

            const bytes = fetched.payload.bytes;
            const parsed = parseRealtime(bytes, descriptor.kind);
            if (!parsed.ok) {
                throw new FeedError(parsed.failure.kind, parsed.failure.message);
            }
            if (parsed.skippedEntities > 0) {
                log.warn('Skipped malformed entities', { skipped: parsed.skippedEntities });
            }
            if (parsed.message.records.length === 0) {
                throw new FeedError('empty_result', 'Feed decoded to zero records');
            }

            const metadata = metadataFor(descriptor);
            const agency = inferAgency(parsed.message.records);
            if (agency) {
                metadata.agency = agency;
            }
            const snapshot: RealtimeSnapshot = { ...parsed.message, metadata };

            await this.store('real-time snapshot', () =>
                this.storage.storeRealtime(snapshot, descriptor.url, bytes, timestamp, descriptor.name),
            );
            log.info('Stored real-time snapshot', {
                records: snapshot.records.length,
                bytes: bytes.length,
                captureTimestamp: timestamp,
            });
        });
    }

    async staticOutcome(descriptor: FeedDescriptor, captureTimestamp?: string): Promise<IngestOutcome> {
        return this.guard(descriptor, async (log) => {
            const fetched = await this.source.fetch(descriptor.url);
            if (!fetched.ok) {
                throw new FeedError(fetched.failure.kind, fetched.failure.message, fetched.failure.status);
            }
            const timestamp = captureTimestamp ?? formatCaptureTimestamp(fetched.payload.capturedAt);

            const bytes = fetched.payload.bytes;
            const parsed = await parseStatic(bytes);
            if (!parsed.ok) {
                throw new FeedError(parsed.failure.kind, parsed.failure.message);
            }
            const tableNames = Object.keys(parsed.tables);
            if (tableNames.length === 0) {
                throw new FeedError('empty_result', 'Archive contains none of the GTFS tables');
            }
            if (parsed.ignoredFiles.length > 0) {
                log.debug('Ignored archive files', { files: parsed.ignoredFiles });
            }

            const snapshot: StaticSnapshot = { tables: parsed.tables, metadata: metadataFor(descriptor) };
            await this.store('static tables', () =>
                this.storage.storeStatic(snapshot, descriptor.url, bytes, timestamp, descriptor.name),
            );
            log.info('Stored static tables', {
                tables: tableNames,
                rows: countRows(parsed.tables),
                captureTimestamp: timestamp,
            });
        });
    }

    private async store(what: string, call: () => Promise<boolean>): Promise<void> {
        let stored: boolean;
        try {
            stored = await call();
        } catch (error) {
            throw new FeedError('store_failed', `Storing ${what} threw: ${describeError(error)}`);
        }
        if (!stored) {
            throw new FeedError('store_failed', `Storage rejected the ${what}`);
        }
    }

    private async guard(descriptor: FeedDescriptor, work: (log: Logger) => Promise<void>): Promise<IngestOutcome> {
        const log = this.logger.child({ url: descriptor.url, kind: descriptor.kind, name: descriptor.name });
        try {
            await work(log);
            return { descriptor, succeeded: true };
        } catch (error) {
            const failure = toFailure(error, 'unexpected');
            log.error('Ingestion failed', {
                error: failure.kind,
                status: failure.status,
                detail: describeError(error),
            });
            return { descriptor, succeeded: false, error: failure.kind };
        }
    }
}
