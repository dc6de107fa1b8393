import { describeError } from './Errors';
import { FeedIngestor } from './FeedIngestor';
import { Logger, logger as rootLogger } from './Logger';
import { FeedDescriptor, FeedResults, IngestOutcome, RealtimeKind } from './types';

export function toResults(outcomes: IngestOutcome[]): FeedResults {
    const results: FeedResults = {};
    for (const outcome of outcomes) {
        results[outcome.descriptor.url] = outcome.succeeded;
    }
    return results;
}

export function countSucceeded(outcomes: IngestOutcome[]): number {
    return outcomes.filter((outcome) => outcome.succeeded).length;
}

/**
 * Runs one ingestion task per feed at the same time and waits for all of them.
 * A task that rejects is recorded as a failure for its own feed only.
 */
export class FeedCoordinator {
    private readonly logger: Logger;

    constructor(
        private readonly ingestor: FeedIngestor,
        logger: Logger = rootLogger,
    ) {
        this.logger = logger.child({ component: 'coordinator' });
    }

    async runStatic(descriptors: FeedDescriptor[]): Promise<IngestOutcome[]> {
        return this.fanOut(descriptors, (descriptor) => this.ingestor.staticOutcome(descriptor));
    }

    async runRealtime(descriptors: FeedDescriptor[], kinds?: readonly RealtimeKind[]): Promise<IngestOutcome[]> {
        const selected = kinds ? descriptors.filter((descriptor) => kinds.some((kind) => kind === descriptor.kind)) : descriptors;
        return this.fanOut(selected, (descriptor) => this.ingestor.realtimeOutcome(descriptor));
    }

    // Static first: real-time records are read against the static reference set
    async runAll(
        staticFeeds: FeedDescriptor[],
        realtimeFeeds: FeedDescriptor[],
        kinds?: readonly RealtimeKind[],
    ): Promise<IngestOutcome[]> {
        const staticOutcomes = await this.runStatic(staticFeeds);
        const failedStatic = staticOutcomes.length - countSucceeded(staticOutcomes);
        if (failedStatic > 0) {
            this.logger.warn('Static ingestion had failures, continuing with real-time feeds', { failed: failedStatic });
        }
        const realtimeOutcomes = await this.runRealtime(realtimeFeeds, kinds);
        return [...staticOutcomes, ...realtimeOutcomes];
    }

    async ingestStaticFeeds(descriptors: FeedDescriptor[]): Promise<FeedResults> {
        return toResults(await this.runStatic(descriptors));
    }

    async ingestRealtimeFeeds(descriptors: FeedDescriptor[], kinds?: readonly RealtimeKind[]): Promise<FeedResults> {
        return toResults(await this.runRealtime(descriptors, kinds));
    }

    async ingestAll(
        staticFeeds: FeedDescriptor[],
        realtimeFeeds: FeedDescriptor[],
        kinds?: readonly RealtimeKind[],
    ): Promise<FeedResults> {
        return toResults(await this.runAll(staticFeeds, realtimeFeeds, kinds));
    }

    private async fanOut(
        descriptors: FeedDescriptor[],
        task: (descriptor: FeedDescriptor) => Promise<IngestOutcome>,
    ): Promise<IngestOutcome[]> {
        // async wrapper so a synchronous throw from task() settles as a rejection
        const settled = await Promise.allSettled(descriptors.map(async (descriptor) => task(descriptor)));

        return settled.map((result, index): IngestOutcome => {
            if (result.status === 'fulfilled') {
                return result.value;
            }
            const descriptor = descriptors[index];
            this.logger.error('Ingestion task escaped its guard', {
                url: descriptor.url,
                kind: descriptor.kind,
                error: describeError(result.reason),
            });
            return { descriptor, succeeded: false, error: 'unexpected' };
        });
    }
}
