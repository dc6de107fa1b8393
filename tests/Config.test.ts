import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import {
    ConfigError,
    loadConfig,
    parseConfig,
    parseKinds,
    realtimeDescriptors,
    staticDescriptors,
} from '../src/Config';

describe('parseConfig', () => {
    it('should fill in defaults for an empty object', () => {
        const config = parseConfig({});

        expect(config.intervalSeconds).toBe(20);
        expect(config.fetchTimeoutMs).toBe(30_000);
        expect(config.includeStaticOnFirstCycle).toBe(true);
        expect(config.realtimeKinds).toEqual(['trip_updates', 'vehicle_positions']);
        expect(config.quietHours).toEqual({ enabled: true, start: '00:00', end: '04:59', timeZone: 'Asia/Tokyo' });
        expect(config.archiveRawProtobuf).toBe(false);
        expect(config.archiveRawStaticZip).toBe(false);
        expect(config.statusPort).toBeUndefined();
        expect(config.feeds).toEqual({ static: [], tripUpdates: [], vehiclePositions: [] });
    });

    it('should reject a non-positive interval', () => {
        expect(() => parseConfig({ intervalSeconds: -1 })).toThrow(ConfigError);
        expect(() => parseConfig({ intervalSeconds: -1 })).toThrow(/^Invalid configuration: intervalSeconds: /);
    });

    it('should reject a malformed quiet-hours boundary', () => {
        expect(() => parseConfig({ quietHours: { start: '25:00' } })).toThrow(
            'Invalid configuration: quietHours.start: expected HH:MM',
        );
    });

    it('should reject a quiet-hours time zone that does not exist', () => {
        expect(() => parseConfig({ quietHours: { timeZone: 'Mars/Olympus_Mons' } })).toThrow(
            'Invalid configuration: quietHours.timeZone: unknown IANA time zone',
        );
    });

    it('should accept a valid quiet-hours time zone', () => {
        expect(parseConfig({ quietHours: { timeZone: 'Europe/Berlin' } }).quietHours.timeZone).toBe('Europe/Berlin');
    });

    it('should reject a feed entry without a valid URL', () => {
        expect(() => parseConfig({ feeds: { tripUpdates: [{ url: 'not a url' }] } })).toThrow(ConfigError);
    });
});

describe('loadConfig', () => {
    let dir: string;

    beforeEach(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'gtfs-config-'));
    });

    afterEach(() => {
        fs.rmSync(dir, { recursive: true, force: true });
    });

    it('should let environment variables override the file', () => {
        const file = path.join(dir, 'config.json');
        fs.writeFileSync(
            file,
            JSON.stringify({
                intervalSeconds: 10,
                redisUrl: 'redis://file:6379',
                feeds: { tripUpdates: [{ url: 'https://example.com/rt/trip_updates', name: 'city' }] },
            }),
        );

        const config = loadConfig(file, {
            INTERVAL_SECONDS: '30',
            REDIS_URL: 'redis://cache:6379',
            ARCHIVE_RAW_PROTOBUF: 'true',
            STATUS_PORT: '8081',
            GTFS_API_KEY: 'test-secret',
        });

        expect(config.intervalSeconds).toBe(30);
        expect(config.redisUrl).toBe('redis://cache:6379');
        expect(config.archiveRawProtobuf).toBe(true);
        expect(config.statusPort).toBe(8081);
        expect(config.apiKey).toBe('test-secret');
        expect(config.feeds.tripUpdates).toEqual([{ url: 'https://example.com/rt/trip_updates', name: 'city' }]);
    });

    it('should ignore environment values that do not parse', () => {
        const file = path.join(dir, 'config.json');
        fs.writeFileSync(file, JSON.stringify({ intervalSeconds: 10 }));

        const config = loadConfig(file, { INTERVAL_SECONDS: 'soon', ARCHIVE_RAW_STATIC_ZIP: 'maybe' });

        expect(config.intervalSeconds).toBe(10);
        expect(config.archiveRawStaticZip).toBe(false);
    });

    it('should fail when an explicit path does not exist', () => {
        expect(() => loadConfig(path.join(dir, 'missing.json'), {})).toThrow(ConfigError);
    });

    it('should fail on a file that is not a JSON object', () => {
        const file = path.join(dir, 'config.json');
        fs.writeFileSync(file, '[1, 2]');

        expect(() => loadConfig(file, {})).toThrow(`Config file ${file} must contain a JSON object`);
    });
});

describe('descriptors', () => {
    const config = parseConfig({
        feeds: {
            static: [{ url: 'https://example.com/gtfs.zip', name: 'city' }],
            tripUpdates: [{ url: 'https://example.com/rt/trip_updates' }],
            vehiclePositions: [{ url: 'https://example.com/rt/vehicle_positions', name: 'city' }],
        },
    });

    it('should build static descriptors', () => {
        expect(staticDescriptors(config)).toEqual([{ url: 'https://example.com/gtfs.zip', kind: 'static', name: 'city' }]);
    });

    it('should list trip updates before vehicle positions', () => {
        expect(realtimeDescriptors(config)).toEqual([
            { url: 'https://example.com/rt/trip_updates', kind: 'trip_updates' },
            { url: 'https://example.com/rt/vehicle_positions', kind: 'vehicle_positions', name: 'city' },
        ]);
    });
});

describe('parseKinds', () => {
    it('should split a comma-separated list', () => {
        expect(parseKinds('trip_updates, vehicle_positions')).toEqual(['trip_updates', 'vehicle_positions']);
    });

    it('should reject unknown kinds', () => {
        expect(() => parseKinds('alerts')).toThrow('Unknown real-time kinds: alerts');
    });
});
