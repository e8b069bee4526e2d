import type { Env } from '../../config/env.js'
import type { CliFlags } from '../args.js'
import type { Writer } from '../output.js'

/**
 * Shared command handler execution context.
 */
export interface CommandContext {
	readonly positional: readonly string[]
	readonly flags: CliFlags
	readonly cwd: string
	readonly env: Env
	/** Diagnostic output that must stay off stdout. */
	readonly stderr: Writer
}

/**
 * Structured command handler result consumed by the dispatcher.
 */
export interface CommandResult {
	/** Printed to stdout as-is, without a trailing newline. */
	readonly output: string
}

/**
 * Command handler function signature.
 */
export type CommandHandler = (context: CommandContext) => Promise<CommandResult>
