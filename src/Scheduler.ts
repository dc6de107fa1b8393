import { describeError } from './Errors';
import { countSucceeded, FeedCoordinator } from './FeedCoordinator';
import { Logger, logger as rootLogger } from './Logger';
import { isQuietHours, QuietHoursWindow } from './QuietHours';
import { Clock, CycleReport, FeedDescriptor, IngestOutcome, RealtimeKind } from './types';

export type SchedulerState = 'idle' | 'running' | 'sleeping' | 'stopped';

export type Sleep = (ms: number, signal: AbortSignal) => Promise<void>;

// Resolves after ms, or as soon as the signal aborts
export const sleep: Sleep = (ms, signal) =>
    new Promise<void>((resolve) => {
        if (signal.aborted) {
            resolve();
            return;
        }
        const done = (): void => {
            clearTimeout(timer);
            signal.removeEventListener('abort', done);
            resolve();
        };
        const timer = setTimeout(done, ms);
        signal.addEventListener('abort', done, { once: true });
    });

export interface CycleResult {
    outcomes: IngestOutcome[];
    skipped?: 'quiet_hours';
}

export interface LoopOptions {
    intervalMs: number;
    clock?: Clock;
    sleep?: Sleep;
    logger?: Logger;
    onCycle?: (report: CycleReport) => void;
}

/**
 * Fixed-cadence loop: each cycle starts roughly intervalMs after the previous one
 * started, however long the cycle took. Errors inside a cycle are logged and the loop
 * carries on; only the abort signal ends it, and never in the middle of a cycle.
 */
export abstract class CadenceLoop {
    protected readonly clock: Clock;
    protected readonly logger: Logger;
    private readonly intervalMs: number;
    private readonly sleep: Sleep;
    private readonly onCycle?: (report: CycleReport) => void;
    private currentState: SchedulerState = 'idle';

    protected constructor(options: LoopOptions, component: string) {
        this.intervalMs = options.intervalMs;
        this.clock = options.clock ?? (() => new Date());
        this.sleep = options.sleep ?? sleep;
        this.logger = (options.logger ?? rootLogger).child({ component });
        this.onCycle = options.onCycle;
    }

    get state(): SchedulerState {
        return this.currentState;
    }

    protected abstract runCycle(cycle: number): Promise<CycleResult>;

    async run(signal: AbortSignal): Promise<void> {
        if (this.currentState === 'running' || this.currentState === 'sleeping') {
            throw new Error('Scheduler is already running');
        }

        this.logger.info('Scheduler started', { intervalMs: this.intervalMs });
        let cycle = 0;
        while (!signal.aborted) {
            cycle++;
            this.currentState = 'running';
            const startedAt = this.clock();

            try {
                const result = await this.runCycle(cycle);
                const report: CycleReport = { cycle, startedAt, finishedAt: this.clock(), outcomes: result.outcomes };
                if (result.skipped) {
                    report.skipped = result.skipped;
                    this.logger.info('Cycle skipped (quiet hours)', { cycle });
                } else {
                    this.logger.info('Cycle complete', {
                        cycle,
                        succeeded: countSucceeded(result.outcomes),
                        total: result.outcomes.length,
                        durationMs: report.finishedAt.getTime() - startedAt.getTime(),
                    });
                }
                this.onCycle?.(report);
            } catch (error) {
                this.logger.error('Cycle failed', { cycle, error: describeError(error) });
            }

            if (signal.aborted) break;

            const elapsed = this.clock().getTime() - startedAt.getTime();
            this.currentState = 'sleeping';
            await this.sleep(Math.max(0, this.intervalMs - elapsed), signal);
        }

        this.currentState = 'stopped';
        this.logger.info('Scheduler stopped', { cycles: cycle });
    }
}

export interface SchedulerOptions extends LoopOptions {
    staticFeeds: FeedDescriptor[];
    realtimeFeeds: FeedDescriptor[];
    kinds?: readonly RealtimeKind[];
    includeStaticOnFirstCycle: boolean;
    quietHours?: QuietHoursWindow;
}

/**
 * Real-time ingestion on a fixed cadence. Static feeds are ingested once, on the first
 * cycle that actually runs, when includeStaticOnFirstCycle is set. Cycles inside the
 * quiet-hours window fetch nothing but still wait out the interval.
 */
export class ContinuousScheduler extends CadenceLoop {
    private staticPending: boolean;

    constructor(
        private readonly coordinator: FeedCoordinator,
        private readonly options: SchedulerOptions,
    ) {
        super(options, 'scheduler');
        this.staticPending = options.includeStaticOnFirstCycle;
    }

    protected async runCycle(): Promise<CycleResult> {
        const { quietHours, staticFeeds, realtimeFeeds, kinds } = this.options;
        if (quietHours && isQuietHours(this.clock(), quietHours)) {
            return { outcomes: [], skipped: 'quiet_hours' };
        }

        if (this.staticPending) {
            this.staticPending = false;
            return { outcomes: await this.coordinator.runAll(staticFeeds, realtimeFeeds, kinds) };
        }
        return { outcomes: await this.coordinator.runRealtime(realtimeFeeds, kinds) };
    }
}

// Repeats static + real-time ingestion every cycle, with no kind filter or quiet hours
export class IngestAllLoop extends CadenceLoop {
    constructor(
        private readonly coordinator: FeedCoordinator,
        private readonly staticFeeds: FeedDescriptor[],
        private readonly realtimeFeeds: FeedDescriptor[],
        options: LoopOptions,
    ) {
        super(options, 'ingest-all-loop');
    }

    protected async runCycle(): Promise<CycleResult> {
        return { outcomes: await this.coordinator.runAll(this.staticFeeds, this.realtimeFeeds) };
    }
}
