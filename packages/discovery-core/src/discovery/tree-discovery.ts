/**
 * Tree Discovery
 *
 * Breadth-first, depth-bounded expansion of a profile graph from a set of
 * seed usernames through the similar-profiles relation.
 *
 * Levels are processed strictly in order: every frontier node of a level is
 * expanded (under a concurrency limit) and joined before the next level
 * starts. URNs are marked seen before their full profile is fetched, so two
 * parents expanding concurrently never queue the same candidate twice.
 *
 * Cancellation is not an error path: `discover` resolves with whatever was
 * found so far, flagged `cancelled: true`.
 */

import { ErrorCode, ProfileGraphError } from '../errors';
import { LogCategory, nullLogger } from '../logger';
import type { Logger } from '../logger';
import {
    CancellationError,
    isCancellationError,
    raceCancellation,
} from '../runtime';
import type { CancellationToken } from '../runtime';
import { ConcurrencyLimiter } from '../concurrency/concurrency-limiter';
import { DEFAULT_ACTIVITY_LOG_SIZE, DEFAULT_MAX_CONCURRENCY } from '../config/defaults';
import { getCandidateHandle } from '../profile';
import type { ProfileRecord } from '../profile';
import type { ProfileGateway } from '../gateway';
import { ActivityLog } from './activity-log';
import { DiscoveryState } from './discovery-state';
import type {
    DiscoverOptions,
    DiscoveryObserver,
    DiscoveryReport,
    TreeDiscoveryOptions,
} from './types';

/** URNs are shortened to this length in log lines */
const URN_LOG_LENGTH = 20;

/** A similar-profile candidate whose URN this run has claimed */
interface ClaimedCandidate {
    handle: string;
    urn: string;
}

function shortUrn(urn: string): string {
    return `${urn.slice(0, URN_LOG_LENGTH)}...`;
}

export class TreeDiscovery {
    private readonly gateway: ProfileGateway;
    private readonly maxConcurrency: number;
    private readonly logger: Logger;
    private readonly observer?: DiscoveryObserver;
    private readonly activityLogSize: number;

    private state: DiscoveryState;
    private activityLog: ActivityLog;
    private cancelled = false;
    private running = false;

    constructor(options: TreeDiscoveryOptions) {
        this.gateway = options.gateway;
        this.maxConcurrency = options.maxConcurrency ?? DEFAULT_MAX_CONCURRENCY;
        this.logger = options.logger ?? nullLogger;
        this.observer = options.observer;
        this.activityLogSize = options.activityLogSize ?? DEFAULT_ACTIVITY_LOG_SIZE;

        if (!Number.isInteger(this.maxConcurrency) || this.maxConcurrency < 1) {
            throw new ProfileGraphError(`Invalid max concurrency: ${this.maxConcurrency}`, {
                code: ErrorCode.INPUT_INVALID,
            });
        }

        this.activityLog = new ActivityLog(this.logger, this.activityLogSize);
        this.state = new DiscoveryState(this.observer, this.activityLog);
    }

    /** Profiles recorded so far in the current (or last) run */
    get discoveredCount(): number {
        return this.state.discoveredCount;
    }

    /**
     * Report of everything recorded so far. Callable at any time; never throws.
     */
    snapshot(): DiscoveryReport {
        return this.state.snapshot(this.activityLog.lines(), this.cancelled);
    }

    /**
     * Discover profiles from seed usernames down to `maxDepth` levels.
     *
     * @param usernames Seed usernames, resolved in order
     * @param maxDepth Levels to expand below the seeds; 0 records the seeds only
     */
    async discover(
        usernames: string[],
        maxDepth: number,
        options: DiscoverOptions = {}
    ): Promise<DiscoveryReport> {
        if (!Number.isInteger(maxDepth) || maxDepth < 0) {
            throw new ProfileGraphError(`Invalid max depth: ${maxDepth}`, {
                code: ErrorCode.INPUT_INVALID,
            });
        }
        if (this.running) {
            throw new ProfileGraphError('A discovery run is already in progress', {
                code: ErrorCode.INPUT_INVALID,
            });
        }

        this.running = true;
        this.cancelled = false;
        this.activityLog = new ActivityLog(this.logger, this.activityLogSize);
        this.state = new DiscoveryState(this.observer, this.activityLog);

        const { cancellation } = options;
        const state = this.state;
        const log = this.activityLog;
        const gateway = this.gateway.withOptions({ logger: log, cancellation });
        const unsubscribe = cancellation?.onCancelled(() => state.seal()) ?? (() => {});

        log.info(LogCategory.DISCOVERY, `Starting discovery with ${usernames.length} usernames at depth ${maxDepth}`);

        try {
            const seeds = await this.resolveSeeds(usernames, state, gateway, log, cancellation);
            if (seeds.length === 0) {
                log.warn(LogCategory.DISCOVERY, 'No valid URNs found from provided usernames');
                return this.snapshot();
            }
            log.info(LogCategory.DISCOVERY, `Found ${seeds.length} starting profiles`);

            await this.expandLevels(seeds, maxDepth, state, gateway, log, cancellation);
        } catch (error) {
            if (!isCancellationError(error)) {
                throw error;
            }
            state.seal();
            this.cancelled = true;
            log.warn(LogCategory.DISCOVERY, 'Discovery interrupted, returning partial results');
        } finally {
            unsubscribe();
            this.running = false;
        }

        return this.snapshot();
    }

    // ========================================================================
    // Seeds
    // ========================================================================

    private async resolveSeeds(
        usernames: string[],
        state: DiscoveryState,
        gateway: ProfileGateway,
        log: Logger,
        cancellation?: CancellationToken
    ): Promise<ProfileRecord[]> {
        const seeds: ProfileRecord[] = [];

        for (const username of usernames) {
            cancellation?.throwIfCancelled();

            const result = await gateway.fetchFullProfile(username);
            if (!result.success) {
                if (result.code === ErrorCode.CANCELLED) {
                    throw new CancellationError();
                }
                state.addFailedUsername(username);
                log.error(LogCategory.DISCOVERY, `${username} -> ${result.error}`);
                continue;
            }

            const profile = result.data;
            if (!state.markSeen(profile.urn)) {
                log.warn(LogCategory.DISCOVERY, `${username} -> Already discovered`);
                continue;
            }

            const seed: ProfileRecord = { ...profile, depth_level: 0, source_urn: '' };
            state.addProfile(seed);
            seeds.push(seed);
            log.info(LogCategory.DISCOVERY, `${username} -> Full profile fetched`);
        }

        return seeds;
    }

    // ========================================================================
    // Levels
    // ========================================================================

    private async expandLevels(
        seeds: ProfileRecord[],
        maxDepth: number,
        state: DiscoveryState,
        gateway: ProfileGateway,
        log: Logger,
        cancellation?: CancellationToken
    ): Promise<void> {
        const limiter = new ConcurrencyLimiter(this.maxConcurrency);
        let currentFrontier = seeds;

        for (let level = 0; level < maxDepth && currentFrontier.length > 0; level++) {
            state.notify('onProgress', () => this.observer?.onProgress?.(level, maxDepth));
            log.info(LogCategory.DISCOVERY, `Processing depth level ${level + 1}/${maxDepth}`);

            const expansions = currentFrontier.map(
                item => () => this.expandNode(item, level, state, gateway, log, cancellation)
            );
            const children = await raceCancellation(limiter.all(expansions, cancellation), cancellation);

            const nextFrontier: ProfileRecord[] = children.flat();
            const completed = level + 1;

            log.info(LogCategory.DISCOVERY, `Depth ${completed} complete: Found ${nextFrontier.length} new profiles`);
            log.info(LogCategory.DISCOVERY, `Total discovered: ${state.discoveredCount}`);
            state.notify('onLevelComplete', () => this.observer?.onLevelComplete?.(completed, nextFrontier.length));
            state.notify('onProgress', () => this.observer?.onProgress?.(completed, maxDepth));

            currentFrontier = nextFrontier;
        }
    }

    /**
     * Expand one frontier node: look up similar profiles, claim the unseen
     * ones, fetch their full profiles and record them one level deeper.
     *
     * @returns the recorded children, which form part of the next frontier
     */
    private async expandNode(
        item: ProfileRecord,
        level: number,
        state: DiscoveryState,
        gateway: ProfileGateway,
        log: Logger,
        cancellation?: CancellationToken
    ): Promise<ProfileRecord[]> {
        const { urn } = item;

        const similar = await gateway.fetchSimilarProfiles(urn);
        if (!similar.success) {
            if (similar.code === ErrorCode.CANCELLED) {
                throw new CancellationError();
            }
            state.addFailedUrn(urn);
            log.error(LogCategory.DISCOVERY, `${shortUrn(urn)} -> ${similar.error}`);
            return [];
        }

        const claimed: ClaimedCandidate[] = [];
        for (const candidate of similar.data) {
            const handle = getCandidateHandle(candidate);
            if (handle && state.markSeen(candidate.urn)) {
                claimed.push({ handle, urn: candidate.urn });
            }
        }

        if (claimed.length === 0) {
            log.info(LogCategory.DISCOVERY, `${shortUrn(urn)} -> No new profiles (all seen before)`);
            return [];
        }

        cancellation?.throwIfCancelled();
        const outcomes = await gateway.fetchFullProfilesBatch(claimed.map(entry => entry.handle));
        cancellation?.throwIfCancelled();

        const children: ProfileRecord[] = [];
        outcomes.forEach((outcome, index) => {
            if (outcome.success && outcome.profile) {
                // The full profile may resolve to another URN than the candidate listed
                const resolvedUrn = outcome.profile.urn;
                if (resolvedUrn !== claimed[index]?.urn && !state.markSeen(resolvedUrn)) {
                    log.info(LogCategory.DISCOVERY, `${outcome.username} -> Already discovered as ${shortUrn(resolvedUrn)}`);
                    return;
                }
                const child: ProfileRecord = {
                    ...outcome.profile,
                    depth_level: level + 1,
                    source_urn: urn,
                };
                state.addProfile(child);
                children.push(child);
            } else {
                log.warn(
                    LogCategory.DISCOVERY,
                    `${outcome.username} -> Failed to fetch full profile: ${outcome.error ?? 'unknown error'}`
                );
            }
        });

        if (children.length > 0) {
            log.info(LogCategory.DISCOVERY, `${shortUrn(urn)} -> Fetched ${children.length} full profiles`);
        } else {
            log.warn(LogCategory.DISCOVERY, `${shortUrn(urn)} -> No profiles fetched`);
        }

        return children;
    }
}
