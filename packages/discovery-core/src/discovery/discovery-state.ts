/**
 * Discovery State
 *
 * Shared mutable state of one discovery run. Every mutation is a single
 * synchronous method, so under the event loop it is atomic with respect to
 * the concurrent expansions of a level, and the observer is notified inside
 * the same step.
 *
 * Once sealed (on cancellation) the state ignores writes; tasks that were
 * abandoned mid-flight cannot alter what the caller already holds.
 */

import { LogCategory, nullLogger } from '../logger';
import type { Logger } from '../logger';
import { getErrorMessage } from '../errors';
import type { ProfileRecord } from '../profile';
import type { DiscoveryObserver, DiscoveryReport } from './types';

export class DiscoveryState {
    private readonly profiles: ProfileRecord[] = [];
    private readonly seenUrns = new Set<string>();
    private readonly failedUsernames: string[] = [];
    private readonly failedUrns: string[] = [];
    private sealed = false;

    constructor(
        private readonly observer?: DiscoveryObserver,
        private readonly logger: Logger = nullLogger
    ) {}

    /**
     * Test-and-set on the seen set.
     * @returns true when the URN was not seen before (and now is)
     */
    markSeen(urn: string): boolean {
        if (this.sealed || this.hasSeen(urn)) {
            return false;
        }
        this.seenUrns.add(urn);
        return true;
    }

    hasSeen(urn: string): boolean {
        return this.seenUrns.has(urn);
    }

    /**
     * Append a record and notify the observer.
     * @returns false when the state is sealed and the record was dropped
     */
    addProfile(record: ProfileRecord): boolean {
        if (this.sealed) {
            return false;
        }
        this.profiles.push(record);
        const total = this.profiles.length;
        this.notify('onProfileDiscovered', () => this.observer?.onProfileDiscovered?.(record, total));
        return true;
    }

    addFailedUsername(username: string): void {
        if (!this.sealed) {
            this.failedUsernames.push(username);
        }
    }

    addFailedUrn(urn: string): void {
        if (!this.sealed) {
            this.failedUrns.push(urn);
        }
    }

    get discoveredCount(): number {
        return this.profiles.length;
    }

    get uniqueUrnCount(): number {
        return this.seenUrns.size;
    }

    seal(): void {
        this.sealed = true;
    }

    /**
     * Copy-on-read report. Safe to call while abandoned writers are still in flight.
     */
    snapshot(activityLog: string[], cancelled: boolean): DiscoveryReport {
        return {
            profiles: this.profiles.map(record => ({ ...record })),
            totalDiscovered: this.profiles.length,
            uniqueUrns: this.uniqueUrnCount,
            failedUsernames: [...this.failedUsernames],
            failedUrns: [...this.failedUrns],
            activityLog: [...activityLog],
            cancelled,
        };
    }

    /**
     * Run an observer callback; a failing observer never breaks the run.
     */
    notify(event: keyof DiscoveryObserver, callback: () => void): void {
        try {
            callback();
        } catch (error) {
            this.logger.warn(LogCategory.DISCOVERY, `Observer ${event} failed: ${getErrorMessage(error)}`);
        }
    }
}
