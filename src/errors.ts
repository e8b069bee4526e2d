/**
 * Domain errors raised by the parser and the configuration layer.
 *
 * The CLI maps each of these onto a `CliError` with a stable code and
 * exit code (see `cli/errors.ts`).
 *
 * @module errors
 */

/**
 * Git output lacked a field every porcelain-v2 `--branch` stream carries.
 */
export class MissingDataError extends Error {
	/** Key (or line tag) that was expected but absent. */
	readonly key: string
	override readonly name = 'MissingDataError'

	constructor(message: string, key: string) {
		super(message)
		this.key = key
	}
}

/**
 * The environment or the config file cannot be used as given.
 */
export class ConfigurationError extends Error {
	override readonly name = 'ConfigurationError'

	constructor(message: string, options?: { readonly cause?: unknown }) {
		super(message, options)
	}
}
