/**
 * Process exit codes of the CLI
 */
export const EXIT_CODES = {
    SUCCESS: 0,
    EXECUTION_ERROR: 1,
    CONFIG_ERROR: 2,
    CANCELLED: 130,
} as const;
