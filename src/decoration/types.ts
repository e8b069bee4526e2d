/** Glyphs placed in front of (or in place of) each count. */
export interface DecorationGlyphs {
	readonly ahead: string
	readonly behind: string
	readonly clean: string
	readonly staged: string
	readonly modified: string
	/** Emitted on its own, without a count, when any file is untracked. */
	readonly untracked: string
}

/**
 * Style templates. Each is opaque to the renderer apart from the `{text}`
 * placeholder, which receives the styled text.
 */
export interface DecorationStyles {
	readonly branch: string
	readonly clean: string
	readonly staged: string
	readonly modified: string
}

export interface DecorationTheme {
	readonly glyphs: DecorationGlyphs
	readonly styles: DecorationStyles
}

/** Partial glyph/style overlay, as read from the config file. */
export interface ThemeOverrides {
	readonly glyphs?: Partial<DecorationGlyphs>
	readonly styles?: Partial<DecorationStyles>
}
