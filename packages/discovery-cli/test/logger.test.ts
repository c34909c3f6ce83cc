/**
 * Logger Tests
 *
 * Tests for CLI logger, colors and progress display.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { MockInstance } from 'vitest';
import {
    setColorEnabled,
    isColorEnabled,
    red,
    green,
    yellow,
    blue,
    cyan,
    gray,
    bold,
    SYMBOLS,
    ProgressDisplay,
    createCLILogger,
    setVerbosity,
    getVerbosity,
    printSuccess,
    printError,
    printWarning,
    printHeader,
    printKeyValue,
} from '../src/logger';

function written(spy: { mock: { calls: unknown[][] } }): string {
    return spy.mock.calls.map(call => String(call[0])).join('');
}

describe('Logger', () => {
    // ========================================================================
    // Color Functions
    // ========================================================================

    describe('Color Functions', () => {
        beforeEach(() => {
            setColorEnabled(true);
        });

        afterEach(() => {
            setColorEnabled(true);
        });

        it('should apply ANSI color codes when enabled', () => {
            expect(red('test')).toBe('\x1b[31mtest\x1b[0m');
            expect(green('ok')).toBe('\x1b[32mok\x1b[0m');
            expect(yellow('warn')).toBe('\x1b[33mwarn\x1b[0m');
        });

        it('should return plain text when colors are disabled', () => {
            setColorEnabled(false);
            expect(red('test')).toBe('test');
            expect(green('hello')).toBe('hello');
            expect(yellow('warn')).toBe('warn');
            expect(blue('info')).toBe('info');
            expect(cyan('data')).toBe('data');
            expect(gray('dim')).toBe('dim');
            expect(bold('strong')).toBe('strong');
        });

        it('should track color enabled state', () => {
            expect(isColorEnabled()).toBe(true);
            setColorEnabled(false);
            expect(isColorEnabled()).toBe(false);
        });
    });

    // ========================================================================
    // Progress Display
    // ========================================================================

    describe('ProgressDisplay', () => {
        let stderrSpy: MockInstance<Parameters<typeof process.stderr.write>, boolean>;

        beforeEach(() => {
            stderrSpy = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
            setColorEnabled(false);
        });

        afterEach(() => {
            stderrSpy.mockRestore();
            setColorEnabled(true);
        });

        it('should render bar, percentage, count and message', () => {
            const progress = new ProgressDisplay({ total: 4, label: 'Depth', width: 8 });
            const bar = SYMBOLS.barFilled.repeat(2) + SYMBOLS.barEmpty.repeat(6);
            expect(progress.format(1, '3 new profiles')).toBe(`Depth [${bar}] 25% (1/4) 3 new profiles`);
        });

        it('should respect showPercentage and showCount', () => {
            const progress = new ProgressDisplay({ total: 2, width: 4, showPercentage: false, showCount: false });
            const bar = SYMBOLS.barFilled.repeat(2) + SYMBOLS.barEmpty.repeat(2);
            expect(progress.format(1)).toBe(`Progress [${bar}]`);
        });

        it('should render zero total as complete', () => {
            const progress = new ProgressDisplay({ total: 0, width: 2 });
            expect(progress.format(0)).toBe(`Progress [${SYMBOLS.barFilled.repeat(2)}] 100% (0/0)`);
        });

        it('should write updates and completion', () => {
            const progress = new ProgressDisplay({ total: 10, label: 'MyTask' });
            progress.update(5);
            progress.complete();
            expect(written(stderrSpy)).toContain(`${SYMBOLS.success} MyTask complete\n`);
        });
    });

    // ========================================================================
    // CLI Logger
    // ========================================================================

    describe('createCLILogger', () => {
        let stderrSpy: MockInstance<Parameters<typeof process.stderr.write>, boolean>;

        beforeEach(() => {
            stderrSpy = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
            setVerbosity('normal');
            setColorEnabled(false);
        });

        afterEach(() => {
            stderrSpy.mockRestore();
            setVerbosity('normal');
            setColorEnabled(true);
        });

        it('should log info messages with their category', () => {
            createCLILogger().info('Discovery', 'alice -> Full profile fetched');
            expect(written(stderrSpy)).toBe('[Discovery] alice -> Full profile fetched\n');
        });

        it('should not log debug messages in normal verbosity', () => {
            createCLILogger().debug('Test', 'Debug message');
            expect(stderrSpy).not.toHaveBeenCalled();
        });

        it('should log debug messages in verbose mode', () => {
            setVerbosity('verbose');
            createCLILogger().debug('Test', 'Debug message');
            expect(written(stderrSpy)).toBe('[DEBUG] [Test] Debug message\n');
        });

        it('should not log info messages in quiet mode', () => {
            setVerbosity('quiet');
            createCLILogger().info('Test', 'Info message');
            expect(stderrSpy).not.toHaveBeenCalled();
        });

        it('should always log warnings and errors', () => {
            setVerbosity('quiet');
            const logger = createCLILogger();
            logger.warn('Gateway', 'Rate limit hit');
            logger.error('Gateway', 'Gave up');
            expect(written(stderrSpy)).toBe('[WARN] [Gateway] Rate limit hit\n[ERROR] [Gateway] Gave up\n');
        });

        it('should log error stack only in verbose mode', () => {
            const err = new Error('test error');
            createCLILogger().error('Test', 'Error occurred', err);
            expect(stderrSpy.mock.calls.length).toBe(1);

            setVerbosity('verbose');
            createCLILogger().error('Test', 'Error occurred', err);
            expect(stderrSpy.mock.calls.length).toBe(3);
        });
    });

    // ========================================================================
    // Verbosity
    // ========================================================================

    describe('Verbosity', () => {
        afterEach(() => {
            setVerbosity('normal');
        });

        it('should default to normal and be settable', () => {
            expect(getVerbosity()).toBe('normal');
            setVerbosity('verbose');
            expect(getVerbosity()).toBe('verbose');
        });
    });

    // ========================================================================
    // Print Helpers
    // ========================================================================

    describe('Print Helpers', () => {
        let stderrSpy: MockInstance<Parameters<typeof process.stderr.write>, boolean>;

        beforeEach(() => {
            stderrSpy = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
            setColorEnabled(false);
        });

        afterEach(() => {
            stderrSpy.mockRestore();
            setColorEnabled(true);
        });

        it('should prefix status symbols', () => {
            printSuccess('saved');
            printError('failed');
            printWarning('careful');
            expect(written(stderrSpy)).toBe(
                `${SYMBOLS.success} saved\n${SYMBOLS.error} failed\n${SYMBOLS.warning} careful\n`
            );
        });

        it('should print headers and key-value pairs', () => {
            printHeader('Profile Graph Discovery');
            printKeyValue('Depth', '3');
            expect(written(stderrSpy)).toBe('\nProfile Graph Discovery\n  Depth: 3\n');
        });
    });
});
