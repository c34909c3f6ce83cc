/**
 * Activity Log
 *
 * A Logger decorator keeping the most recent lines of a run in a bounded
 * buffer, so a report can carry them after the run.
 */

import type { Logger } from '../logger';
import { DEFAULT_ACTIVITY_LOG_SIZE } from '../config/defaults';

export class ActivityLog implements Logger {
    private buffer: string[] = [];

    constructor(
        private readonly inner: Logger,
        private readonly capacity: number = DEFAULT_ACTIVITY_LOG_SIZE
    ) {
        if (!Number.isInteger(capacity) || capacity < 1) {
            throw new Error('capacity must be at least 1');
        }
    }

    /** Debug lines go to the wrapped logger only */
    debug(category: string, message: string): void {
        this.inner.debug(category, message);
    }

    info(category: string, message: string): void {
        this.append(`[INFO] ${message}`);
        this.inner.info(category, message);
    }

    warn(category: string, message: string): void {
        this.append(`[WARN] ${message}`);
        this.inner.warn(category, message);
    }

    error(category: string, message: string, error?: Error): void {
        this.append(`[ERROR] ${message}`);
        this.inner.error(category, message, error);
    }

    /** Copy of the retained lines, oldest first */
    lines(): string[] {
        return [...this.buffer];
    }

    get size(): number {
        return this.buffer.length;
    }

    clear(): void {
        this.buffer = [];
    }

    private append(line: string): void {
        this.buffer.push(line);
        if (this.buffer.length > this.capacity) {
            this.buffer.shift();
        }
    }
}
