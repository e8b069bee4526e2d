/**
 * Typed process exit codes for CLI outcomes.
 */
export const EXIT_OK = 0
export const EXIT_RUNTIME = 1
export const EXIT_USAGE = 2
/** `EX_CONFIG` from sysexits.h. */
export const EXIT_CONFIG = 78

/**
 * Supported exit code union for the CLI.
 */
export type ExitCode =
	| typeof EXIT_OK
	| typeof EXIT_RUNTIME
	| typeof EXIT_USAGE
	| typeof EXIT_CONFIG
