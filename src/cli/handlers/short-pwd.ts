import { loadSettings } from '../../config/config.js'
import { readHome } from '../../config/env.js'
import { setLogLevel } from '../../logger/index.js'
import { truncatePath } from '../../path/truncate.js'
import { parseBooleanFlag, parseFullSegments } from '../parsers.js'
import type { CommandContext, CommandResult } from './types.js'

/**
 * Handle `short-pwd`.
 */
export async function handleShortPwd(
	context: CommandContext,
): Promise<CommandResult> {
	const debug = parseBooleanFlag(context.flags, 'debug')
	const noTilde = parseBooleanFlag(context.flags, 'no-tilde')
	const fullSegments = parseFullSegments(context.flags)

	const rawPath = context.positional[0] ?? context.cwd
	if (debug) {
		setLogLevel('debug')
		context.stderr(`${rawPath}\n`)
	}

	const settings = loadSettings(context.env)
	const homeTilde = !noTilde && settings.homeTilde

	return {
		output: truncatePath({
			path: rawPath,
			homeTilde,
			nFull: fullSegments ?? settings.fullSegments,
			home: homeTilde ? readHome(context.env) : undefined,
		}),
	}
}
