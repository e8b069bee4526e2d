import { formatFlagName } from './args.js'
import { type CommandDef, type FlagDef, GLOBAL_FLAGS } from './commands.js'

function formatFlag(name: string, def: FlagDef): string {
	const names = def.short
		? `${formatFlagName(def.short)}, ${formatFlagName(name)}`
		: formatFlagName(name)
	return def.kind === 'string' ? `${names} <${def.valueName ?? 'value'}>` : names
}

function formatFlags(flags: Readonly<Record<string, FlagDef>>): string[] {
	return Object.entries(flags)
		.sort(([a], [b]) => a.localeCompare(b))
		.map(([name, def]) => `  ${formatFlag(name, def)} - ${def.description}`)
}

/**
 * Generate help text for a command from the registry.
 */
export function generateHelpText(commandDef: CommandDef): string {
	const lines = [
		`Usage: ${commandDef.usage}`,
		'',
		commandDef.description,
		'',
		'Options:',
		...formatFlags({ ...GLOBAL_FLAGS, ...commandDef.flags }),
	]

	if (commandDef.positional.length > 0) {
		lines.push(
			'',
			'Arguments:',
			...commandDef.positional.map(
				(arg) =>
					`  ${arg.required ? '<' : '['}${arg.name}${arg.required ? '>' : ']'}`,
			),
		)
	}

	return lines.join('\n')
}
