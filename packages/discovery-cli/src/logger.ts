/**
 * CLI Logger
 *
 * Colored stderr output with progress bar support for the
 * profile-graph CLI. `createCLILogger()` implements the discovery-core
 * Logger interface; the print helpers are for user-facing status lines.
 *
 * Cross-platform compatible (Linux/Mac/Windows).
 */

import type { Logger } from '@profile-graph/discovery-core';

// ============================================================================
// ANSI Color Codes
// ============================================================================

const COLORS = {
    reset: '\x1b[0m',
    bold: '\x1b[1m',

    red: '\x1b[31m',
    green: '\x1b[32m',
    yellow: '\x1b[33m',
    blue: '\x1b[34m',
    cyan: '\x1b[36m',
    gray: '\x1b[90m',
} as const;

// ============================================================================
// Color Helpers
// ============================================================================

let colorEnabled = true;

/**
 * Enable or disable colored output
 */
export function setColorEnabled(enabled: boolean): void {
    colorEnabled = enabled;
}

export function isColorEnabled(): boolean {
    return colorEnabled;
}

function colorize(color: string, text: string): string {
    if (!colorEnabled) { return text; }
    return `${color}${text}${COLORS.reset}`;
}

export function red(text: string): string { return colorize(COLORS.red, text); }
export function green(text: string): string { return colorize(COLORS.green, text); }
export function yellow(text: string): string { return colorize(COLORS.yellow, text); }
export function blue(text: string): string { return colorize(COLORS.blue, text); }
export function cyan(text: string): string { return colorize(COLORS.cyan, text); }
export function gray(text: string): string { return colorize(COLORS.gray, text); }
export function bold(text: string): string { return colorize(COLORS.bold, text); }

// ============================================================================
// Symbols (cross-platform)
// ============================================================================

const isWindows = process.platform === 'win32';

export const SYMBOLS = {
    success: isWindows ? '√' : '✓',
    error: isWindows ? '×' : '✗',
    warning: isWindows ? '‼' : '⚠',
    info: isWindows ? 'i' : 'ℹ',
    barFilled: isWindows ? '#' : '█',
    barEmpty: isWindows ? '-' : '░',
} as const;

// ============================================================================
// Progress Display
// ============================================================================

export interface ProgressDisplayOptions {
    total: number;
    label?: string;
    /** Bar width in characters. Default: 20 */
    width?: number;
    showPercentage?: boolean;
    showCount?: boolean;
}

/**
 * Progress bar over a known number of steps.
 * Redraws in place on a TTY, prints one line per update otherwise.
 */
export class ProgressDisplay {
    private readonly total: number;
    private readonly label: string;
    private readonly width: number;
    private readonly showPercentage: boolean;
    private readonly showCount: boolean;

    constructor(options: ProgressDisplayOptions) {
        this.total = Math.max(0, options.total);
        this.label = options.label ?? 'Progress';
        this.width = options.width ?? 20;
        this.showPercentage = options.showPercentage ?? true;
        this.showCount = options.showCount ?? true;
    }

    /**
     * Render the progress line without writing it
     */
    format(current: number, message?: string): string {
        const ratio = this.total > 0 ? Math.min(1, Math.max(0, current / this.total)) : 1;
        const filled = Math.round(ratio * this.width);
        const bar = SYMBOLS.barFilled.repeat(filled) + SYMBOLS.barEmpty.repeat(this.width - filled);

        const parts = [this.label, `[${cyan(bar)}]`];
        if (this.showPercentage) {
            parts.push(`${Math.round(ratio * 100)}%`);
        }
        if (this.showCount) {
            parts.push(`(${current}/${this.total})`);
        }
        if (message) {
            parts.push(gray(message));
        }
        return parts.join(' ');
    }

    update(current: number, message?: string): void {
        const line = this.format(current, message);
        if (process.stderr.isTTY) {
            process.stderr.write(`\r\x1b[K${line}`);
        } else {
            process.stderr.write(`${line}\n`);
        }
    }

    complete(message?: string): void {
        if (process.stderr.isTTY) {
            process.stderr.write('\r\x1b[K');
        }
        process.stderr.write(`${green(SYMBOLS.success)} ${message || `${this.label} complete`}\n`);
    }
}

// ============================================================================
// CLI Logger (implements discovery-core Logger interface)
// ============================================================================

export type VerbosityLevel = 'quiet' | 'normal' | 'verbose';

let verbosity: VerbosityLevel = 'normal';

export function setVerbosity(level: VerbosityLevel): void {
    verbosity = level;
}

export function getVerbosity(): VerbosityLevel {
    return verbosity;
}

/**
 * Create a discovery-core compatible Logger for CLI usage
 */
export function createCLILogger(): Logger {
    return {
        debug(category: string, message: string): void {
            if (verbosity === 'verbose') {
                process.stderr.write(`${gray(`[DEBUG] [${category}]`)} ${message}\n`);
            }
        },
        info(category: string, message: string): void {
            if (verbosity !== 'quiet') {
                process.stderr.write(`${blue(`[${category}]`)} ${message}\n`);
            }
        },
        warn(category: string, message: string): void {
            process.stderr.write(`${yellow(`[WARN] [${category}]`)} ${message}\n`);
        },
        error(category: string, message: string, error?: Error): void {
            process.stderr.write(`${red(`[ERROR] [${category}]`)} ${message}\n`);
            if (error && verbosity === 'verbose') {
                process.stderr.write(`${gray(error.stack || error.message)}\n`);
            }
        },
    };
}

// ============================================================================
// Print Helpers (user-facing output)
// ============================================================================

export function printSuccess(message: string): void {
    process.stderr.write(`${green(SYMBOLS.success)} ${message}\n`);
}

export function printError(message: string): void {
    process.stderr.write(`${red(SYMBOLS.error)} ${message}\n`);
}

export function printWarning(message: string): void {
    process.stderr.write(`${yellow(SYMBOLS.warning)} ${message}\n`);
}

export function printInfo(message: string): void {
    process.stderr.write(`${blue(SYMBOLS.info)} ${message}\n`);
}

/**
 * Print a header/title to stderr
 */
export function printHeader(title: string): void {
    process.stderr.write(`\n${bold(title)}\n`);
}

export function printKeyValue(key: string, value: string): void {
    process.stderr.write(`  ${gray(key + ':')} ${value}\n`);
}
