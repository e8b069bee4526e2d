/**
 * Working-directory truncation for prompts.
 *
 * `/Users/alice/proj/src/lib` with two full segments becomes `~/p/src/lib`.
 *
 * @module path/truncate
 */

import { readHome } from '../config/env.js'
import { ConfigurationError } from '../errors.js'

export const HOME_TILDE = '~'

/** Trailing segments kept at full width by default. */
export const DEFAULT_FULL_SEGMENTS = 1

export interface TruncatePathOptions {
	/** Path to shorten; defaults to `process.cwd()`. */
	readonly path?: string
	/** Collapse the home directory to `~`. Default true. */
	readonly homeTilde?: boolean
	/** Trailing segments left unabbreviated. Default 1; 0 disables abbreviation. */
	readonly nFull?: number
	/** Home directory; defaults to `HOME`. */
	readonly home?: string
}

/**
 * Replace the first occurrence of `home` with `~`.
 *
 * This is a plain substring match, not anchored to the start of the path.
 */
export function collapseHome(path: string, home: string): string {
	if (home === '') {
		throw new ConfigurationError('home directory must not be empty')
	}
	return path.replace(home, HOME_TILDE)
}

function firstCharacter(segment: string): string {
	const codePoint = segment.codePointAt(0)
	return codePoint === undefined ? segment : String.fromCodePoint(codePoint)
}

/**
 * Cut every non-empty segment except the last `nFull` to its first
 * character. The empty segment in front of an absolute path stays empty.
 */
export function abbreviateSegments(path: string, nFull: number): string {
	if (!Number.isInteger(nFull) || nFull < 0) {
		throw new RangeError(
			`nFull must be a non-negative integer (got ${nFull})`,
		)
	}
	if (nFull === 0) {
		return path
	}

	const pieces = path.split('/')
	return pieces
		.map((piece, index) => {
			const fromEnd = pieces.length - index - 1
			return fromEnd >= nFull && piece ? firstCharacter(piece) : piece
		})
		.join('/')
}

/**
 * Shorten a directory path for display.
 *
 * @throws {ConfigurationError} If tilde collapsing is on and no home
 * directory is known
 */
export function truncatePath(options: TruncatePathOptions = {}): string {
	const {
		path = process.cwd(),
		homeTilde = true,
		nFull = DEFAULT_FULL_SEGMENTS,
	} = options

	const collapsed = homeTilde
		? collapseHome(path, options.home ?? readHome())
		: path
	return abbreviateSegments(collapsed, nFull)
}
