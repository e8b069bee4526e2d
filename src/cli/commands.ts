/**
 * Command registry for the two executables.
 *
 * Drives argument parsing, flag validation and help text.
 */

import { THEME_NAMES } from '../decoration/themes.js'

/** Executable names. */
export type CommandName = 'git-prompt' | 'short-pwd'

/**
 * Supported flag value kinds.
 */
export type FlagKind = 'boolean' | 'string'

/**
 * Flag schema for parsing, validation and help rendering.
 */
export interface FlagDef {
	readonly kind: FlagKind
	readonly description: string
	/** Single-letter alias, e.g. `n` for `-n`. */
	readonly short?: string
	/** Placeholder shown in help for string flags. */
	readonly valueName?: string
}

/**
 * Positional argument schema for usage checks.
 */
export interface PositionalDef {
	readonly name: string
	readonly required?: boolean
}

/**
 * Command metadata contract.
 */
export interface CommandDef {
	readonly command: CommandName
	readonly description: string
	readonly usage: string
	readonly positional: readonly PositionalDef[]
	readonly flags: Readonly<Record<string, FlagDef>>
}

function boolFlag(description: string, short?: string): FlagDef {
	return { kind: 'boolean', description, short }
}

function stringFlag(
	description: string,
	valueName: string,
	short?: string,
): FlagDef {
	return { kind: 'string', description, valueName, short }
}

/**
 * Flags accepted by every command.
 */
export const GLOBAL_FLAGS: Readonly<Record<string, FlagDef>> = {
	help: boolFlag('Show this help message', 'h'),
}

export const GIT_PROMPT_COMMAND: CommandDef = {
	command: 'git-prompt',
	description:
		'Print a prompt decoration with the Git branch, ahead/behind counts and change counts',
	usage: `git-prompt [--theme <${THEME_NAMES.join('|')}>] [-C <dir>] [-h]`,
	positional: [],
	flags: {
		theme: stringFlag('Style theme for the decoration', 'name'),
		directory: stringFlag(
			'Run git in <dir> instead of the current directory',
			'dir',
			'C',
		),
	},
}

export const SHORT_PWD_COMMAND: CommandDef = {
	command: 'short-pwd',
	description:
		'Print a directory path with $HOME collapsed to ~ and leading segments abbreviated',
	usage: 'short-pwd [--debug] [--no-tilde] [-n FULL_PATHS] [PATH]',
	positional: [{ name: 'PATH', required: false }],
	flags: {
		'full-paths': stringFlag(
			'Number of trailing directories kept at full width (default 1)',
			'FULL_PATHS',
			'n',
		),
		'no-tilde': boolFlag('Do not compress $HOME to ~'),
		debug: boolFlag('Print the raw PATH to stderr'),
	},
}
