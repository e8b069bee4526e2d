import { type CliFlags, type CliFlagValue, formatFlagName } from './args.js'
import { type CommandDef, type FlagDef, GLOBAL_FLAGS } from './commands.js'
import { CliError } from './errors.js'

interface ParsedCliInput {
	readonly positional: readonly string[]
	readonly flags: CliFlags
}

function assertFlagValueType(
	flagName: string,
	value: CliFlagValue,
	def: FlagDef,
): void {
	if (def.kind === 'boolean') {
		if (value !== true) {
			throw CliError.usage(
				`Invalid ${formatFlagName(flagName)} value: this flag does not take a value`,
			)
		}
		return
	}

	if (typeof value !== 'string') {
		throw CliError.usage(
			`Missing value for ${formatFlagName(def.short ?? flagName)} ${def.valueName ?? 'value'}`,
		)
	}
}

function validatePositionalArgs(
	positional: readonly string[],
	commandDef: CommandDef,
): void {
	const required = commandDef.positional.filter((arg) => arg.required)
	if (positional.length < required.length) {
		const missingNames = required
			.slice(positional.length)
			.map((arg) => `<${arg.name}>`)
			.join(', ')
		throw CliError.usage(
			`Missing required argument(s): ${missingNames}. Usage: ${commandDef.usage}`,
		)
	}

	if (positional.length > commandDef.positional.length) {
		throw CliError.usage(
			`Too many positional arguments. Usage: ${commandDef.usage}`,
		)
	}
}

/**
 * Validate flags and positionals against the command registry.
 */
export function validateFlags(
	parsed: ParsedCliInput,
	commandDef: CommandDef,
): void {
	const allowedFlags = new Map<string, FlagDef>([
		...Object.entries(GLOBAL_FLAGS),
		...Object.entries(commandDef.flags),
	])

	for (const [flagName, value] of Object.entries(parsed.flags)) {
		const flagDef = allowedFlags.get(flagName)
		if (!flagDef) {
			throw CliError.usage(
				`Unknown flag ${formatFlagName(flagName)}. Usage: ${commandDef.usage}`,
			)
		}
		assertFlagValueType(flagName, value, flagDef)
	}

	validatePositionalArgs(parsed.positional, commandDef)
}
