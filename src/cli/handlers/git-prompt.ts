import path from 'node:path'
import { loadSettings, resolveThemeSettings } from '../../config/config.js'
import { renderDecoration } from '../../decoration/render.js'
import { parseGitStatus } from '../../git/parse-status.js'
import { queryGitStatus } from '../../git/query-status.js'
import { parseStringFlag, parseThemeFlag } from '../parsers.js'
import type { CommandContext, CommandResult } from './types.js'

/**
 * Handle `git-prompt`.
 *
 * Outside a work tree (or without git) the output is empty.
 */
export async function handleGitPrompt(
	context: CommandContext,
): Promise<CommandResult> {
	const themeOverride = parseThemeFlag(context.flags)
	const directory = parseStringFlag(context.flags, 'directory')
	const settings = loadSettings(context.env)
	const { theme } = resolveThemeSettings(settings, context.env, themeOverride)

	const cwd = directory ? path.resolve(context.cwd, directory) : context.cwd
	const statusText = await queryGitStatus(cwd)
	if (statusText === null) {
		return { output: '' }
	}

	const summary = parseGitStatus(statusText, {
		hashChars: settings.hashChars,
		detachedPrefix: settings.detachedPrefix,
	})
	return { output: renderDecoration(summary, theme) }
}
