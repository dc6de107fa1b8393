import * as http from 'http';
import { loadConfig, parseKinds, realtimeDescriptors, staticDescriptors } from './Config';
import { describeError } from './Errors';
import { FeedCoordinator } from './FeedCoordinator';
import { FeedFetcher } from './FeedFetcher';
import { FeedIngestor } from './FeedIngestor';
import { logger } from './Logger';
import { connectRedis, createRedisWriter, RedisClient, RedisStorage } from './RedisStorage';
import { CadenceLoop, ContinuousScheduler, IngestAllLoop } from './Scheduler';
import { closeServer, startStatusServer, StatusBoard } from './StatusServer';
import { CycleReport, FeedResults, RealtimeKind } from './types';

export type CommandName = 'once' | 'loop' | 'loop-all';

export interface ParsedCliArgs {
    command: CommandName;
    configPath?: string;
    kinds?: RealtimeKind[];
    intervalSeconds?: number;
}

const HELP_TEXT = `
Usage:
  gtfs-ingest <command> [options]

Commands:
  once       Ingest every configured feed once (static first), exit 0 when all succeeded
  loop       Ingest real-time feeds on a fixed cadence, honouring quiet hours
  loop-all   Ingest static and real-time feeds every cycle

Options:
  --config <path>       JSON config file (default ./config.json)
  --kinds <a,b>         Real-time kinds to ingest: trip_updates, vehicle_positions
  --interval <seconds>  Override the loop interval
  -h, --help            Show this help
`;

function optionValue(argv: string[], name: string): string | undefined {
    const index = argv.indexOf(name);
    return index >= 0 ? argv[index + 1] : undefined;
}

export function parseCliArgs(argv: string[]): ParsedCliArgs | 'help' {
    if (argv.includes('-h') || argv.includes('--help')) {
        return 'help';
    }

    const command = argv[0];
    if (command !== 'once' && command !== 'loop' && command !== 'loop-all') {
        return 'help';
    }

    const parsed: ParsedCliArgs = { command };
    const configPath = optionValue(argv, '--config');
    if (configPath) {
        parsed.configPath = configPath;
    }
    const kinds = optionValue(argv, '--kinds');
    if (kinds) {
        parsed.kinds = parseKinds(kinds);
    }
    const interval = Number(optionValue(argv, '--interval'));
    if (Number.isFinite(interval) && interval > 0) {
        parsed.intervalSeconds = interval;
    }
    return parsed;
}

// One-shot runs count as successful only when at least one feed ran and none failed
export function overallSuccess(results: FeedResults): boolean {
    const values = Object.values(results);
    return values.length > 0 && values.every(Boolean);
}

export async function runCli(argv: string[]): Promise<number> {
    const parsed = parseCliArgs(argv);
    if (parsed === 'help') {
        console.log(HELP_TEXT.trim());
        return 0;
    }

    const config = loadConfig(parsed.configPath);
    const log = logger.child({ component: 'cli' });
    const kinds = parsed.kinds ?? config.realtimeKinds;
    const intervalMs = (parsed.intervalSeconds ?? config.intervalSeconds) * 1000;
    const staticFeeds = staticDescriptors(config);
    const realtimeFeeds = realtimeDescriptors(config);

    const controller = new AbortController();
    const stop = (): void => {
        log.info('Stop signal received, finishing the current cycle');
        controller.abort();
    };
    process.once('SIGINT', stop);
    process.once('SIGTERM', stop);

    const fetcher = new FeedFetcher({
        timeoutMs: config.fetchTimeoutMs,
        userAgent: config.userAgent,
        apiKeyHeader: config.apiKeyHeader,
        apiKey: config.apiKey,
    });
    let redis: RedisClient | undefined;
    let server: http.Server | undefined;

    log.info('Command start', {
        command: parsed.command,
        staticFeeds: staticFeeds.length,
        realtimeFeeds: realtimeFeeds.length,
        kinds,
    });

    try {
        redis = await connectRedis(config.redisUrl, log);
        const storage = new RedisStorage(
            createRedisWriter(redis),
            {
                archiveRawProtobuf: config.archiveRawProtobuf,
                archiveRawStaticZip: config.archiveRawStaticZip,
                snapshotTtlSeconds: config.snapshotTtlSeconds,
            },
            log,
        );
        const coordinator = new FeedCoordinator(new FeedIngestor(fetcher, storage, log), log);

        if (parsed.command === 'once') {
            const results = await coordinator.ingestAll(staticFeeds, realtimeFeeds, kinds);
            console.log(JSON.stringify(results, null, 2));
            const succeeded = overallSuccess(results);
            log.info('Command complete', { command: parsed.command, succeeded });
            return succeeded ? 0 : 1;
        }

        const board = new StatusBoard();
        if (config.statusPort !== undefined) {
            server = await startStatusServer(board, config.statusPort, log);
        }

        const loopOptions = { intervalMs, logger: log, onCycle: (report: CycleReport) => board.record(report) };
        const loop: CadenceLoop =
            parsed.command === 'loop'
                ? new ContinuousScheduler(coordinator, {
                      ...loopOptions,
                      staticFeeds,
                      realtimeFeeds,
                      kinds,
                      includeStaticOnFirstCycle: config.includeStaticOnFirstCycle,
                      quietHours: config.quietHours.enabled ? config.quietHours : undefined,
                  })
                : new IngestAllLoop(coordinator, staticFeeds, realtimeFeeds, loopOptions);

        await loop.run(controller.signal);
        return 0;
    } finally {
        process.off('SIGINT', stop);
        process.off('SIGTERM', stop);
        fetcher.close();
        if (server) {
            await closeServer(server).catch((error: unknown) =>
                log.warn('Status server did not close cleanly', { error: describeError(error) }),
            );
        }
        if (redis) {
            await redis.quit().catch((error: unknown) =>
                log.warn('Redis client did not quit cleanly', { error: describeError(error) }),
            );
        }
    }
}
