/**
 * Built-in decoration themes.
 *
 * The `zsh` theme uses the colour parameters from zsh's `colors` module and
 * is meant for a `PROMPT` with `prompt_subst` enabled. `bash` wraps raw ANSI
 * escapes in `\[ \]` so readline does not count them toward the line width.
 *
 * @module decoration/themes
 */

import type {
	DecorationGlyphs,
	DecorationStyles,
	DecorationTheme,
	ThemeOverrides,
} from './types.js'

/** Placeholder substituted with the styled text. */
export const TEXT_PLACEHOLDER = '{text}'

export const THEME_NAMES = ['zsh', 'bash', 'ansi', 'plain'] as const

export type ThemeName = (typeof THEME_NAMES)[number]

export const DEFAULT_THEME_NAME: ThemeName = 'zsh'

export const DEFAULT_GLYPHS: DecorationGlyphs = {
	ahead: '↑',
	behind: '↓',
	clean: '✓',
	staged: '•',
	modified: '+',
	untracked: '...',
}

const ESC = '\u001b'

function zshStyle(colour: string): string {
	return `\${fg_bold[${colour}]}${TEXT_PLACEHOLDER}\${reset_color}`
}

function ansiStyle(sgr: string): string {
	return `${ESC}[${sgr}m${TEXT_PLACEHOLDER}${ESC}[0m`
}

function bashStyle(sgr: string): string {
	return `\\[${ESC}[${sgr}m\\]${TEXT_PLACEHOLDER}\\[${ESC}[0m\\]`
}

const BOLD_MAGENTA = '1;35'
const BOLD_GREEN = '1;32'
const BOLD_BLUE = '1;34'

const ZSH_STYLES: DecorationStyles = {
	branch: zshStyle('magenta'),
	clean: zshStyle('green'),
	staged: zshStyle('magenta'),
	modified: zshStyle('blue'),
}

const ANSI_STYLES: DecorationStyles = {
	branch: ansiStyle(BOLD_MAGENTA),
	clean: ansiStyle(BOLD_GREEN),
	staged: ansiStyle(BOLD_MAGENTA),
	modified: ansiStyle(BOLD_BLUE),
}

const BASH_STYLES: DecorationStyles = {
	branch: bashStyle(BOLD_MAGENTA),
	clean: bashStyle(BOLD_GREEN),
	staged: bashStyle(BOLD_MAGENTA),
	modified: bashStyle(BOLD_BLUE),
}

const PLAIN_STYLES: DecorationStyles = {
	branch: TEXT_PLACEHOLDER,
	clean: TEXT_PLACEHOLDER,
	staged: TEXT_PLACEHOLDER,
	modified: TEXT_PLACEHOLDER,
}

export const THEMES: Readonly<Record<ThemeName, DecorationTheme>> = {
	zsh: { glyphs: DEFAULT_GLYPHS, styles: ZSH_STYLES },
	bash: { glyphs: DEFAULT_GLYPHS, styles: BASH_STYLES },
	ansi: { glyphs: DEFAULT_GLYPHS, styles: ANSI_STYLES },
	plain: { glyphs: DEFAULT_GLYPHS, styles: PLAIN_STYLES },
}

export function isThemeName(value: string): value is ThemeName {
	return THEME_NAMES.some((name) => name === value)
}

/**
 * Overlay config-file overrides on a built-in theme.
 */
export function resolveTheme(
	name: ThemeName,
	overrides: ThemeOverrides = {},
): DecorationTheme {
	const base = THEMES[name]
	return {
		glyphs: { ...base.glyphs, ...overrides.glyphs },
		styles: { ...base.styles, ...overrides.styles },
	}
}
