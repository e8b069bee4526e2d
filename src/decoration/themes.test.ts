import { describe, expect, test } from 'vitest'
import {
	DEFAULT_GLYPHS,
	isThemeName,
	resolveTheme,
	TEXT_PLACEHOLDER,
	THEME_NAMES,
	THEMES,
} from './themes.js'

describe('themes', () => {
	test('every built-in style template carries the placeholder', () => {
		for (const name of THEME_NAMES) {
			for (const template of Object.values(THEMES[name].styles)) {
				expect(template).toContain(TEXT_PLACEHOLDER)
			}
		}
	})

	test('zsh styles use prompt colour parameters', () => {
		expect(THEMES.zsh.styles.branch).toBe(
			'${fg_bold[magenta]}{text}${reset_color}',
		)
		expect(THEMES.zsh.styles.modified).toBe('${fg_bold[blue]}{text}${reset_color}')
	})

	test('isThemeName', () => {
		expect(isThemeName('bash')).toBe(true)
		expect(isThemeName('fish')).toBe(false)
	})

	test('resolveTheme without overrides returns the built-in values', () => {
		expect(resolveTheme('ansi')).toEqual(THEMES.ansi)
	})

	test('resolveTheme keeps glyphs that are not overridden', () => {
		const theme = resolveTheme('zsh', { glyphs: { untracked: '?' } })
		expect(theme.glyphs).toEqual({ ...DEFAULT_GLYPHS, untracked: '?' })
		expect(theme.styles).toEqual(THEMES.zsh.styles)
	})
})
