// Feeds
export type RealtimeKind = 'trip_updates' | 'vehicle_positions';
export type FeedKind = 'static' | RealtimeKind;

export const REALTIME_KINDS: readonly RealtimeKind[] = ['trip_updates', 'vehicle_positions'];

export interface FeedDescriptor {
    readonly url: string;
    readonly kind: FeedKind;
    readonly name?: string;
}

export type Clock = () => Date;

// capturedAt is when the request was issued
export interface RawPayload {
    bytes: Buffer;
    capturedAt: Date;
}

export interface FeedMetadata {
    feedUrl: string;
    feedName?: string;
    agency?: string; // Only on real-time snapshots, inferred from vehicle ids
}

// Real-time records
export interface TripUpdateRecord {
    type: 'trip_update';
    entityId: string;
    tripId?: string;
    routeId?: string;
    directionId?: number;
    startTime?: string;
    startDate?: string;
    vehicleId?: string;
    timestamp?: number;
    delaySeconds?: number;
}

export interface VehiclePositionRecord {
    type: 'vehicle_position';
    entityId: string;
    vehicleId: string;
    tripId?: string;
    routeId?: string;
    directionId?: number;
    startTime?: string;
    startDate?: string;
    currentStopSequence?: number;
    currentStatus?: string;
    timestamp?: number;
    latitude?: number;
    longitude?: number;
    bearing?: number;
    speed?: number;
}

export type RealtimeRecord = TripUpdateRecord | VehiclePositionRecord;

export interface ParsedRealtimeMessage {
    feedType: RealtimeKind;
    headerTimestamp?: number;
    version: string;
    records: RealtimeRecord[];
}

export interface RealtimeSnapshot extends ParsedRealtimeMessage {
    metadata: FeedMetadata;
}

// Static tables
export type StaticTableName =
    | 'agency'
    | 'stops'
    | 'routes'
    | 'trips'
    | 'stop_times'
    | 'calendar'
    | 'calendar_dates';

export const STATIC_TABLE_NAMES: readonly StaticTableName[] = [
    'agency',
    'stops',
    'routes',
    'trips',
    'stop_times',
    'calendar',
    'calendar_dates',
];

export interface CSVRow {
    [column: string]: string;
}

export interface StaticTable {
    columns: string[];
    rows: CSVRow[];
}

// A table is only present when the archive contained its file
export type ParsedStaticTables = Partial<Record<StaticTableName, StaticTable>>;

export interface StaticSnapshot {
    tables: ParsedStaticTables;
    metadata: FeedMetadata;
}

// Results
export type ErrorKind =
    | 'network'
    | 'timeout'
    | 'http_status'
    | 'decode'
    | 'unsupported_kind'
    | 'empty_result'
    | 'store_failed'
    | 'unexpected';

export interface Failure {
    kind: ErrorKind;
    message: string;
    status?: number;
}

export interface IngestOutcome {
    descriptor: FeedDescriptor;
    succeeded: boolean;
    error?: ErrorKind;
}

// Keyed by feed URL
export type FeedResults = Record<string, boolean>;

export interface CycleReport {
    cycle: number;
    startedAt: Date;
    finishedAt: Date;
    skipped?: 'quiet_hours';
    outcomes: IngestOutcome[];
}

export interface StorageService {
    storeRealtime(
        parsed: RealtimeSnapshot,
        feedUrl: string,
        rawBytes: Buffer,
        captureTimestamp: string,
        feedName?: string,
    ): Promise<boolean>;
    storeStatic(
        tables: StaticSnapshot,
        feedUrl: string,
        rawBytes: Buffer,
        captureTimestamp: string,
        feedName?: string,
    ): Promise<boolean>;
}
