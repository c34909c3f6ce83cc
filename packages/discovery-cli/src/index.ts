#!/usr/bin/env node

/**
 * profile-graph CLI Entry Point
 *
 * Discovers professional-network profiles breadth-first through the
 * "similar profiles" relation, using @profile-graph/discovery-core.
 *
 * Usage:
 *   profile-graph discover <usernames...>   Run a discovery and export it
 *   profile-graph export <report.json>      Convert a JSON export
 *   profile-graph view <report.json>        Show an export as a table or tree
 *
 * Cross-platform compatible (Linux/Mac/Windows).
 */

import { createProgram, EXIT_CODES } from './cli';
import { printError } from './logger';

async function main(): Promise<void> {
    try {
        const program = createProgram();
        await program.parseAsync(process.argv);
    } catch (error) {
        if (error instanceof Error) {
            printError(error.message);
        } else {
            printError(String(error));
        }
        process.exit(EXIT_CODES.EXECUTION_ERROR);
    }
}

void main();
