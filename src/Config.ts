import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { FeedDescriptor, FeedKind, RealtimeKind } from './types';

// Settings come from ./config.json (or --config), then environment variables override them

const FeedEntrySchema = z.object({
    url: z.string().url(),
    name: z.string().min(1).optional(),
});

const ClockTimeSchema = z.string().regex(/^([01]\d|2[0-3]):[0-5]\d$/, 'expected HH:MM');

function isTimeZone(timeZone: string): boolean {
    try {
        new Intl.DateTimeFormat('en-GB', { timeZone });
        return true;
    } catch {
        return false;
    }
}

const TimeZoneSchema = z.string().min(1).refine(isTimeZone, 'unknown IANA time zone');

export const QuietHoursSchema = z.object({
    enabled: z.boolean().default(true),
    start: ClockTimeSchema.default('00:00'),
    end: ClockTimeSchema.default('04:59'),
    timeZone: TimeZoneSchema.default('Asia/Tokyo'),
});
export type QuietHoursConfig = z.infer<typeof QuietHoursSchema>;

export const RealtimeKindSchema = z.enum(['trip_updates', 'vehicle_positions']);

export const AppConfigSchema = z.object({
    redisUrl: z.string().default('redis://localhost:6379'),
    userAgent: z.string().min(1).default('gtfs-feed-ingest/0.1'),
    apiKeyHeader: z.string().min(1).default('Ocp-Apim-Subscription-Key'),
    apiKey: z.string().optional(),
    fetchTimeoutMs: z.number().int().positive().default(30_000),
    intervalSeconds: z.number().positive().default(20),
    includeStaticOnFirstCycle: z.boolean().default(true),
    realtimeKinds: z.array(RealtimeKindSchema).min(1).default(['trip_updates', 'vehicle_positions']),
    quietHours: QuietHoursSchema.default({}),
    archiveRawProtobuf: z.boolean().default(false),
    archiveRawStaticZip: z.boolean().default(false),
    snapshotTtlSeconds: z.number().int().min(0).default(0),
    statusPort: z.number().int().min(0).max(65535).optional(),
    feeds: z
        .object({
            static: z.array(FeedEntrySchema).default([]),
            tripUpdates: z.array(FeedEntrySchema).default([]),
            vehiclePositions: z.array(FeedEntrySchema).default([]),
        })
        .default({}),
});
export type AppConfig = z.infer<typeof AppConfigSchema>;

export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigError';
    }
}

function toInt(value: string | undefined): number | undefined {
    if (!value) return undefined;
    const parsed = Number.parseInt(value, 10);
    return Number.isFinite(parsed) ? parsed : undefined;
}

function toBool(value: string | undefined): boolean | undefined {
    if (!value) return undefined;
    const normalized = value.trim().toLowerCase();
    if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
    if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
    return undefined;
}

function readConfigFile(configPath: string, required: boolean): Record<string, unknown> {
    const absolutePath = path.resolve(configPath);
    if (!fs.existsSync(absolutePath)) {
        if (required) {
            throw new ConfigError(`Config file not found: ${absolutePath}`);
        }
        return {};
    }

    let parsed: unknown;
    try {
        parsed = JSON.parse(fs.readFileSync(absolutePath, 'utf-8'));
    } catch (error) {
        throw new ConfigError(`Config file ${absolutePath} is not valid JSON: ${String(error)}`);
    }
    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
        throw new ConfigError(`Config file ${absolutePath} must contain a JSON object`);
    }
    return Object.fromEntries(Object.entries(parsed));
}

function envOverrides(env: NodeJS.ProcessEnv): Record<string, unknown> {
    const overrides: Record<string, unknown> = {
        redisUrl: env.REDIS_URL,
        apiKey: env.GTFS_API_KEY,
        fetchTimeoutMs: toInt(env.FETCH_TIMEOUT_MS),
        intervalSeconds: toInt(env.INTERVAL_SECONDS),
        statusPort: toInt(env.STATUS_PORT),
        archiveRawProtobuf: toBool(env.ARCHIVE_RAW_PROTOBUF),
        archiveRawStaticZip: toBool(env.ARCHIVE_RAW_STATIC_ZIP),
    };
    return Object.fromEntries(Object.entries(overrides).filter(([, value]) => value !== undefined));
}

export function parseConfig(input: unknown): AppConfig {
    const result = AppConfigSchema.safeParse(input);
    if (!result.success) {
        const issues = result.error.issues
            .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
            .join('; ');
        throw new ConfigError(`Invalid configuration: ${issues}`);
    }
    return result.data;
}

/**
 * Loads configuration. An explicit path must exist; without one, ./config.json is used
 * when present and defaults otherwise.
 */
export function loadConfig(configPath?: string, env: NodeJS.ProcessEnv = process.env): AppConfig {
    const fileConfig = readConfigFile(configPath ?? './config.json', configPath !== undefined);
    return parseConfig({ ...fileConfig, ...envOverrides(env) });
}

function toDescriptors(entries: AppConfig['feeds']['static'], kind: FeedKind): FeedDescriptor[] {
    return entries.map((entry) => (entry.name ? { url: entry.url, kind, name: entry.name } : { url: entry.url, kind }));
}

export function staticDescriptors(config: AppConfig): FeedDescriptor[] {
    return toDescriptors(config.feeds.static, 'static');
}

export function realtimeDescriptors(config: AppConfig): FeedDescriptor[] {
    return [
        ...toDescriptors(config.feeds.tripUpdates, 'trip_updates'),
        ...toDescriptors(config.feeds.vehiclePositions, 'vehicle_positions'),
    ];
}

export function parseKinds(raw: string): RealtimeKind[] {
    const kinds = raw
        .split(',')
        .map((kind) => kind.trim())
        .filter((kind) => kind.length > 0);
    const result = z.array(RealtimeKindSchema).min(1).safeParse(kinds);
    if (!result.success) {
        throw new ConfigError(`Unknown real-time kinds: ${raw}`);
    }
    return result.data;
}
