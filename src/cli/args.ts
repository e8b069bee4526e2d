import { type ParseArgsConfig, parseArgs } from 'node:util'
import { type CommandDef, GLOBAL_FLAGS } from './commands.js'
import { CliError } from './errors.js'

/**
 * Parsed CLI flag value: `true` for a bare flag, a string when one was given.
 */
export type CliFlagValue = string | boolean

/**
 * Parsed CLI flags keyed by long name (short aliases already resolved).
 */
export type CliFlags = Readonly<Record<string, CliFlagValue>>

type ParseArgsOptionsConfig = NonNullable<ParseArgsConfig['options']>

export interface ParsedArgs {
	readonly positional: readonly string[]
	readonly flags: CliFlags
}

/** Render a flag name the way a user types it. */
export function formatFlagName(name: string): string {
	return name.length === 1 ? `-${name}` : `--${name}`
}

function toParseArgsOptions(commandDef: CommandDef): ParseArgsOptionsConfig {
	const options: ParseArgsOptionsConfig = {}
	for (const [name, def] of Object.entries({
		...GLOBAL_FLAGS,
		...commandDef.flags,
	})) {
		options[name] = def.short
			? { type: def.kind, short: def.short }
			: { type: def.kind }
	}
	return options
}

/**
 * Split an argument vector into positionals and flags.
 *
 * Parsing is lenient: unknown flags are kept (as `true`, or their inline
 * `--flag=value`) and a string flag given without a value is `true`, so
 * `validateFlags` can report both with the command's usage line. A flag
 * given twice, under either of its names, is a usage error.
 */
export function parseCommandArgs(
	argv: readonly string[],
	commandDef: CommandDef,
): ParsedArgs {
	const { values, positionals, tokens } = parseArgs({
		args: [...argv],
		options: toParseArgsOptions(commandDef),
		strict: false,
		allowPositionals: true,
		tokens: true,
	})

	const seen = new Set<string>()
	for (const token of tokens) {
		if (token.kind !== 'option') {
			continue
		}
		if (seen.has(token.name)) {
			throw CliError.usage(
				`Flag ${token.rawName} may only be specified once`,
			)
		}
		seen.add(token.name)
	}

	const flags: Record<string, CliFlagValue> = {}
	for (const [name, value] of Object.entries(values)) {
		if (typeof value === 'string' || typeof value === 'boolean') {
			flags[name] = value
		}
	}

	return { positional: positionals, flags }
}
