import { ConfigurationError, MissingDataError } from '../errors.js'
import {
	EXIT_CONFIG,
	EXIT_RUNTIME,
	EXIT_USAGE,
	type ExitCode,
} from './exit-codes.js'

/**
 * Stable machine-readable CLI error codes.
 */
export type CliErrorCode = 'E_USAGE' | 'E_RUNTIME' | 'E_MISSING_DATA' | 'E_CONFIG'

interface CliErrorOptions {
	readonly code: CliErrorCode
	readonly message: string
	readonly exitCode: ExitCode
	readonly name?: string
	readonly cause?: unknown
}

/**
 * Typed CLI error carrying a stable code and exit code.
 */
export class CliError extends Error {
	readonly code: CliErrorCode
	readonly exitCode: ExitCode
	override readonly name: string

	constructor(options: CliErrorOptions) {
		super(options.message, { cause: options.cause })
		this.code = options.code
		this.exitCode = options.exitCode
		this.name = options.name ?? 'CliError'
	}

	/**
	 * Build a usage error (`exit 2`).
	 */
	static usage(message: string): CliError {
		return new CliError({
			code: 'E_USAGE',
			message,
			exitCode: EXIT_USAGE,
			name: 'UsageError',
		})
	}

	/**
	 * Build a configuration error (`exit 78`).
	 */
	static config(message: string, cause?: unknown): CliError {
		return new CliError({
			code: 'E_CONFIG',
			message,
			exitCode: EXIT_CONFIG,
			name: 'ConfigurationError',
			cause,
		})
	}

	/**
	 * Build a missing-data error for unexpected git output (`exit 1`).
	 */
	static missingData(message: string, cause?: unknown): CliError {
		return new CliError({
			code: 'E_MISSING_DATA',
			message,
			exitCode: EXIT_RUNTIME,
			name: 'MissingDataError',
			cause,
		})
	}

	/**
	 * Build a generic runtime error (`exit 1`).
	 */
	static runtime(message: string, cause?: unknown): CliError {
		return new CliError({
			code: 'E_RUNTIME',
			message,
			exitCode: EXIT_RUNTIME,
			name: 'RuntimeError',
			cause,
		})
	}
}

/**
 * Normalize unknown thrown values into a `CliError`.
 */
export function toCliError(error: unknown): CliError {
	if (error instanceof CliError) {
		return error
	}
	if (error instanceof ConfigurationError) {
		return CliError.config(error.message, error)
	}
	if (error instanceof MissingDataError) {
		return CliError.missingData(error.message, error)
	}
	if (error instanceof Error) {
		return CliError.runtime(error.message || 'Unknown runtime error', error)
	}
	return CliError.runtime(String(error))
}
