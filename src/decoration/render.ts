/**
 * Pure renderer for the Git status decoration.
 *
 * Output shape: ` (<branch><ahead><behind>|<status>)`, e.g.
 * ` (main↑2|•1+3...)`. No git calls and no terminal access.
 *
 * @module decoration/render
 */

import type { StatusSummary } from '../git/types.js'
import { TEXT_PLACEHOLDER, THEMES } from './themes.js'
import type { DecorationTheme } from './types.js'

/** Substitute every `{text}` placeholder in a style template. */
export function applyStyle(template: string, text: string): string {
	return template.split(TEXT_PLACEHOLDER).join(text)
}

function countMarker(glyph: string, count: number): string {
	return count > 0 ? `${glyph}${count}` : ''
}

/** Ahead marker followed by behind marker; empty when both are zero. */
export function renderAheadBehind(
	summary: Pick<StatusSummary, 'ahead' | 'behind'>,
	theme: DecorationTheme = THEMES.zsh,
): string {
	return (
		countMarker(theme.glyphs.ahead, summary.ahead) +
		countMarker(theme.glyphs.behind, summary.behind)
	)
}

/**
 * Clean glyph when nothing is staged, modified or untracked; otherwise the
 * staged, modified and untracked parts in that order, without separators.
 */
export function renderStatusMarker(
	summary: Pick<StatusSummary, 'staged' | 'modified' | 'untracked'>,
	theme: DecorationTheme = THEMES.zsh,
): string {
	const { glyphs, styles } = theme
	if (summary.untracked + summary.staged + summary.modified === 0) {
		return applyStyle(styles.clean, glyphs.clean)
	}

	let marker = ''
	if (summary.staged > 0) {
		marker += applyStyle(styles.staged, `${glyphs.staged}${summary.staged}`)
	}
	if (summary.modified > 0) {
		marker += applyStyle(
			styles.modified,
			`${glyphs.modified}${summary.modified}`,
		)
	}
	if (summary.untracked > 0) {
		marker += glyphs.untracked
	}
	return marker
}

/**
 * Render a status summary as a prompt decoration.
 *
 * @param summary - Parsed `git status` summary
 * @param theme - Glyphs and style templates; defaults to the zsh theme
 */
export function renderDecoration(
	summary: StatusSummary,
	theme: DecorationTheme = THEMES.zsh,
): string {
	const branch = applyStyle(theme.styles.branch, summary.branch)
	return ` (${branch}${renderAheadBehind(summary, theme)}|${renderStatusMarker(summary, theme)})`
}
