import { describe, expect, test } from 'vitest'
import type { StatusSummary } from '../git/types.js'
import {
	applyStyle,
	renderAheadBehind,
	renderDecoration,
	renderStatusMarker,
} from './render.js'
import { resolveTheme, THEMES } from './themes.js'

const CLEAN: StatusSummary = {
	branch: 'main',
	untracked: 0,
	staged: 0,
	modified: 0,
	ahead: 0,
	behind: 0,
}

describe('applyStyle', () => {
	test('substitutes every placeholder', () => {
		expect(applyStyle('<{text}|{text}>', 'x')).toBe('<x|x>')
	})

	test('inserts replacement patterns literally', () => {
		expect(applyStyle('[{text}]', "$&$'")).toBe("[$&$']")
	})
})

describe('renderAheadBehind', () => {
	test('empty when in sync', () => {
		expect(renderAheadBehind({ ahead: 0, behind: 0 })).toBe('')
	})

	test('ahead before behind', () => {
		expect(renderAheadBehind({ ahead: 2, behind: 3 })).toBe('↑2↓3')
	})

	test('only the non-zero side', () => {
		expect(renderAheadBehind({ ahead: 0, behind: 4 })).toBe('↓4')
		expect(renderAheadBehind({ ahead: 1, behind: 0 })).toBe('↑1')
	})
})

describe('renderStatusMarker', () => {
	test('clean glyph in the clean style', () => {
		expect(renderStatusMarker(CLEAN)).toBe('${fg_bold[green]}✓${reset_color}')
	})

	test('staged, modified, untracked in order without separators', () => {
		expect(
			renderStatusMarker(
				{ staged: 2, modified: 1, untracked: 3 },
				THEMES.plain,
			),
		).toBe('•2+1...')
	})

	test('absent parts contribute nothing', () => {
		expect(
			renderStatusMarker({ staged: 0, modified: 4, untracked: 0 }, THEMES.plain),
		).toBe('+4')
		expect(
			renderStatusMarker({ staged: 0, modified: 0, untracked: 1 }, THEMES.plain),
		).toBe('...')
	})

	test('styles staged and modified but not untracked', () => {
		expect(renderStatusMarker({ staged: 1, modified: 2, untracked: 1 })).toBe(
			'${fg_bold[magenta]}•1${reset_color}${fg_bold[blue]}+2${reset_color}...',
		)
	})
})

describe('renderDecoration', () => {
	test('clean branch, plain theme', () => {
		expect(renderDecoration(CLEAN, THEMES.plain)).toBe(' (main|✓)')
	})

	test('clean branch, default zsh theme', () => {
		expect(renderDecoration(CLEAN)).toBe(
			' (${fg_bold[magenta]}main${reset_color}|${fg_bold[green]}✓${reset_color})',
		)
	})

	test('everything at once, plain theme', () => {
		expect(
			renderDecoration(
				{
					branch: 'feature',
					untracked: 3,
					staged: 2,
					modified: 1,
					ahead: 4,
					behind: 5,
				},
				THEMES.plain,
			),
		).toBe(' (feature↑4↓5|•2+1...)')
	})

	test('ansi theme wraps the branch in SGR escapes', () => {
		expect(renderDecoration(CLEAN, THEMES.ansi)).toBe(
			' (\u001b[1;35mmain\u001b[0m|\u001b[1;32m✓\u001b[0m)',
		)
	})

	test('bash theme marks escapes as non-printing', () => {
		expect(renderDecoration({ ...CLEAN, branch: 'dev' }, THEMES.bash)).toBe(
			' (\\[\u001b[1;35m\\]dev\\[\u001b[0m\\]|\\[\u001b[1;32m\\]✓\\[\u001b[0m\\])',
		)
	})

	test('theme overrides replace individual glyphs and styles', () => {
		const theme = resolveTheme('plain', {
			glyphs: { clean: 'ok', ahead: '>' },
			styles: { branch: '<{text}>' },
		})
		expect(renderDecoration({ ...CLEAN, ahead: 1 }, theme)).toBe(' (<main>>1|ok)')
	})
})
