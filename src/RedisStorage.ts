import { createClient } from 'redis';
import { describeError } from './Errors';
import { Logger, logger as rootLogger } from './Logger';
import { RealtimeSnapshot, STATIC_TABLE_NAMES, StaticSnapshot, StorageService } from './types';

// Key layout
//   gtfs:rt:<kind>:<feed>:<captureTimestamp>        JSON snapshot (expires after snapshotTtlSeconds)
//   gtfs:rt:<kind>:<feed>:<captureTimestamp>:raw    raw protobuf, when archiveRawProtobuf is on
//   gtfs:rt:<kind>:<feed>:latest                    JSON snapshot of the most recent capture
//   gtfs:rt:<kind>:<feed>:snapshots                 sorted set of capture timestamps by epoch seconds,
//                                                   trimmed to the TTL window when snapshots expire
//   gtfs:static:<feed>:<table>                      { columns, rows } per GTFS table
//   gtfs:static:<feed>:manifest                     capture info and row counts
//   gtfs:static:<feed>:raw                          raw ZIP, when archiveRawStaticZip is on

export type RedisClient = ReturnType<typeof createClient>;

export interface KeyWrite {
    key: string;
    value: string | Buffer;
    ttlSeconds?: number;
}

export interface IndexWrite {
    key: string;
    score: number;
    member: string;
}

// Drops index members scored at or below maxScore
export interface IndexTrim {
    key: string;
    maxScore: number;
}

export interface SnapshotBatch {
    set: KeyWrite[];
    index?: IndexWrite[];
    trim?: IndexTrim[];
    remove?: string[];
}

// Applies a batch atomically
export interface SnapshotWriter {
    commit(batch: SnapshotBatch): Promise<void>;
}

export interface RedisStorageOptions {
    archiveRawProtobuf: boolean;
    archiveRawStaticZip: boolean;
    snapshotTtlSeconds: number;
}

export function createRedisWriter(client: RedisClient): SnapshotWriter {
    return {
        async commit(batch: SnapshotBatch): Promise<void> {
            const transaction = client.multi();
            for (const write of batch.set) {
                if (write.ttlSeconds !== undefined && write.ttlSeconds > 0) {
                    transaction.set(write.key, write.value, { EX: write.ttlSeconds });
                } else {
                    transaction.set(write.key, write.value);
                }
            }
            for (const entry of batch.index ?? []) {
                transaction.zAdd(entry.key, { score: entry.score, value: entry.member });
            }
            for (const trim of batch.trim ?? []) {
                transaction.zRemRangeByScore(trim.key, '-inf', trim.maxScore);
            }
            for (const key of batch.remove ?? []) {
                transaction.del(key);
            }
            await transaction.exec();
        },
    };
}

export async function connectRedis(url: string, logger: Logger = rootLogger): Promise<RedisClient> {
    const client = createClient({ url });
    client.on('error', (err) => logger.error('Redis Client Error', { error: describeError(err) }));
    await client.connect();
    return client;
}

// Feed name when configured, otherwise host and path of the URL
export function feedKey(feedUrl: string, feedName?: string): string {
    let source = feedName;
    if (!source) {
        try {
            const url = new URL(feedUrl);
            source = `${url.host}${url.pathname}`;
        } catch {
            source = feedUrl;
        }
    }
    return source.replace(/[^A-Za-z0-9]+/g, '_').replace(/^_+|_+$/g, '').toLowerCase();
}

function epochSeconds(captureTimestamp: string): number {
    const parsed = Date.parse(captureTimestamp);
    return Math.floor((Number.isNaN(parsed) ? Date.now() : parsed) / 1000);
}

export class RedisStorage implements StorageService {
    private readonly logger: Logger;

    constructor(
        private readonly writer: SnapshotWriter,
        private readonly options: RedisStorageOptions,
        logger: Logger = rootLogger,
    ) {
        this.logger = logger.child({ component: 'redis-storage' });
    }

    async storeRealtime(
        parsed: RealtimeSnapshot,
        feedUrl: string,
        rawBytes: Buffer,
        captureTimestamp: string,
        feedName?: string,
    ): Promise<boolean> {
        const base = `gtfs:rt:${parsed.feedType}:${feedKey(feedUrl, feedName)}`;
        const ttlSeconds = this.options.snapshotTtlSeconds;
        const document = JSON.stringify({ captureTimestamp, ...parsed });

        const set: KeyWrite[] = [
            { key: `${base}:${captureTimestamp}`, value: document, ttlSeconds },
            { key: `${base}:latest`, value: document },
        ];
        if (this.options.archiveRawProtobuf) {
            set.push({ key: `${base}:${captureTimestamp}:raw`, value: rawBytes, ttlSeconds });
        }

        const indexKey = `${base}:snapshots`;
        const score = epochSeconds(captureTimestamp);
        const batch: SnapshotBatch = { set, index: [{ key: indexKey, score, member: captureTimestamp }] };
        if (ttlSeconds > 0) {
            batch.trim = [{ key: indexKey, maxScore: score - ttlSeconds }];
        }
        return this.commit(feedUrl, batch);
    }

    async storeStatic(
        tables: StaticSnapshot,
        feedUrl: string,
        rawBytes: Buffer,
        captureTimestamp: string,
        feedName?: string,
    ): Promise<boolean> {
        const base = `gtfs:static:${feedKey(feedUrl, feedName)}`;
        const set: KeyWrite[] = [];
        const remove: string[] = [];
        const rowCounts: Record<string, number> = {};

        for (const name of STATIC_TABLE_NAMES) {
            const table = tables.tables[name];
            if (table) {
                set.push({ key: `${base}:${name}`, value: JSON.stringify(table) });
                rowCounts[name] = table.rows.length;
            } else {
                // Drop what an earlier archive left behind
                remove.push(`${base}:${name}`);
            }
        }

        set.push({
            key: `${base}:manifest`,
            value: JSON.stringify({ captureTimestamp, metadata: tables.metadata, tables: rowCounts }),
        });
        if (this.options.archiveRawStaticZip) {
            set.push({ key: `${base}:raw`, value: rawBytes });
        } else {
            remove.push(`${base}:raw`);
        }

        return this.commit(feedUrl, { set, remove });
    }

    private async commit(feedUrl: string, batch: SnapshotBatch): Promise<boolean> {
        try {
            await this.writer.commit(batch);
            return true;
        } catch (error) {
            this.logger.error('Error storing data in Redis', { url: feedUrl, error: describeError(error) });
            return false;
        }
    }
}
