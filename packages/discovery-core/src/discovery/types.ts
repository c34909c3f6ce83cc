/**
 * Discovery Types
 */

import type { Logger } from '../logger';
import type { CancellationToken } from '../runtime';
import type { ProfileGateway } from '../gateway';
import type { ProfileRecord } from '../profile';

/**
 * Aggregate result of one discovery run
 */
export interface DiscoveryReport {
    /** All recorded profiles, in discovery order */
    profiles: ProfileRecord[];
    totalDiscovered: number;
    /** URNs seen during the run, including ones whose full fetch failed */
    uniqueUrns: number;
    /** Seed usernames that could not be resolved */
    failedUsernames: string[];
    /** URNs whose similar-profiles lookup failed */
    failedUrns: string[];
    /** Most recent log lines of the run */
    activityLog: string[];
    /** True when the run was interrupted and the report is partial */
    cancelled: boolean;
}

/**
 * Receives discovery events as they happen.
 * Called synchronously right after the state change it reports.
 */
export interface DiscoveryObserver {
    onProfileDiscovered?(record: ProfileRecord, totalDiscovered: number): void;
    onProgress?(completedLevels: number, maxDepth: number): void;
    onLevelComplete?(level: number, newProfiles: number): void;
}

/**
 * Options for TreeDiscovery
 */
export interface TreeDiscoveryOptions {
    gateway: ProfileGateway;
    /** Frontier nodes expanded at once within a level. Default: 10 */
    maxConcurrency?: number;
    logger?: Logger;
    observer?: DiscoveryObserver;
    /** Log lines kept for the report. Default: 30 */
    activityLogSize?: number;
}

/**
 * Per-run options of TreeDiscovery.discover
 */
export interface DiscoverOptions {
    cancellation?: CancellationToken;
}
