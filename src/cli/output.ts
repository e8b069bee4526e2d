import type { CommandName } from './commands.js'
import type { CliError } from './errors.js'

/** Sink for one stream of CLI output. */
export type Writer = (text: string) => void

export const stdoutWriter: Writer = (text) => {
	process.stdout.write(text)
}

export const stderrWriter: Writer = (text) => {
	process.stderr.write(text)
}

/**
 * Format a CLI error as the single stderr line users see.
 */
export function formatError(command: CommandName, error: CliError): string {
	return `${command}: ${error.message}\n`
}
