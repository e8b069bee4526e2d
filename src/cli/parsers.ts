import { isThemeName, THEME_NAMES, type ThemeName } from '../decoration/themes.js'
import { type CliFlags, formatFlagName } from './args.js'
import { CliError } from './errors.js'

/**
 * Parse a boolean flag with strict "no value" semantics.
 */
export function parseBooleanFlag(flags: CliFlags, flagName: string): boolean {
	const value = flags[flagName]
	if (value === undefined) {
		return false
	}
	if (value === true) {
		return true
	}
	throw CliError.usage(
		`Invalid ${formatFlagName(flagName)} value: this flag does not take a value`,
	)
}

/**
 * Parse an optional string flag.
 */
export function parseStringFlag(
	flags: CliFlags,
	flagName: string,
): string | undefined {
	const value = flags[flagName]
	if (value === undefined) {
		return undefined
	}
	if (typeof value !== 'string') {
		throw CliError.usage(
			`Invalid ${formatFlagName(flagName)} value: expected a string`,
		)
	}
	return value
}

/**
 * Parse `-n FULL_PATHS` for `short-pwd`.
 */
export function parseFullSegments(flags: CliFlags): number | undefined {
	const value = parseStringFlag(flags, 'full-paths')
	if (value === undefined) {
		return undefined
	}
	if (!/^\d+$/.test(value)) {
		throw CliError.usage(
			`Invalid -n value "${value}": expected a non-negative integer`,
		)
	}
	return Number.parseInt(value, 10)
}

/**
 * Parse `--theme` for `git-prompt`.
 */
export function parseThemeFlag(flags: CliFlags): ThemeName | undefined {
	const value = parseStringFlag(flags, 'theme')
	if (value === undefined) {
		return undefined
	}
	if (!isThemeName(value)) {
		throw CliError.usage(
			`Invalid --theme value "${value}": expected one of ${THEME_NAMES.join(', ')}`,
		)
	}
	return value
}
