import { MissingDataError } from '../errors.js'
import { getLogger } from '../logger/index.js'
import type {
	AheadBehind,
	BranchInfo,
	BranchNameOptions,
	ChangeCounts,
	GroupedLines,
	StatusSummary,
} from './types.js'

/** Line tag of `# branch.*` headers. */
export const BRANCH_TAG = '#'

/** Line tag of untracked entries. */
export const UNTRACKED_TAG = '?'

/** Tags that never count toward staged/modified. */
export const DEFAULT_IGNORED_TAGS: readonly string[] = [BRANCH_TAG, UNTRACKED_TAG]

export const DEFAULT_HASH_CHARS = 7
export const DEFAULT_DETACHED_PREFIX = ':'

const AHEAD_BEHIND_TOKEN = /^[+-](\d+)$/

function warnMalformed(line: string, reason: string): void {
	getLogger('git/parse-status').warn(
		{ line, reason },
		'skipping malformed status line',
	)
}

/**
 * Bucket porcelain-v2 lines by their first character.
 */
export function groupLines(text: string): Map<string, string[]> {
	const grouped = new Map<string, string[]>()
	for (const rawLine of text.split('\n')) {
		const line = rawLine.endsWith('\r') ? rawLine.slice(0, -1) : rawLine
		if (!line) {
			continue
		}

		const tag = line.charAt(0)
		const bucket = grouped.get(tag)
		if (bucket) {
			bucket.push(line)
		} else {
			grouped.set(tag, [line])
		}
	}
	return grouped
}

/**
 * Parse `# branch.<key> <value>` lines into a key/value map.
 */
export function parseBranchInfo(
	branchLines: readonly string[],
): Map<string, string> {
	const info = new Map<string, string>()
	for (const line of branchLines) {
		const body = line.replace(/^# ?/, '')
		const [, key, value = ''] = /^(\S+)(?:\s+([\s\S]*))?$/.exec(body) ?? []
		if (!key) {
			warnMalformed(line, 'branch header without a key')
			continue
		}
		info.set(key, value)
	}
	return info
}

/**
 * Branch name for display; a detached HEAD (`branch.head` of `(detached)`)
 * becomes the prefix plus the first characters of `branch.oid`.
 *
 * @throws {MissingDataError} If `branch.head`, or `branch.oid` for a detached
 * HEAD, is missing
 */
export function resolveBranchName(
	info: BranchInfo,
	options: BranchNameOptions = {},
): string {
	const {
		hashChars = DEFAULT_HASH_CHARS,
		detachedPrefix = DEFAULT_DETACHED_PREFIX,
	} = options

	const head = info.get('branch.head')
	if (head === undefined) {
		throw new MissingDataError(
			'git did not report branch.head; unsupported git status output',
			'branch.head',
		)
	}
	if (!head.startsWith('(')) {
		return head
	}

	const oid = info.get('branch.oid')
	if (oid === undefined) {
		throw new MissingDataError(
			'git reported a detached HEAD without branch.oid',
			'branch.oid',
		)
	}
	return `${detachedPrefix}${oid.slice(0, hashChars)}`
}

/**
 * Read `branch.ab` (`+<ahead> -<behind>`).
 *
 * The sign characters are not checked: the first token is always ahead and
 * the second always behind, as git writes them.
 */
export function parseAheadBehind(info: BranchInfo): AheadBehind {
	const value = info.get('branch.ab')
	if (value === undefined) {
		return { ahead: 0, behind: 0 }
	}

	const tokens = value.trim().split(/\s+/)
	const ahead = AHEAD_BEHIND_TOKEN.exec(tokens[0] ?? '')?.[1]
	const behind = AHEAD_BEHIND_TOKEN.exec(tokens[1] ?? '')?.[1]
	if (tokens.length !== 2 || ahead === undefined || behind === undefined) {
		warnMalformed(`# branch.ab ${value}`, 'expected "+<ahead> -<behind>"')
		return { ahead: 0, behind: 0 }
	}

	return {
		ahead: Number.parseInt(ahead, 10),
		behind: Number.parseInt(behind, 10),
	}
}

/**
 * Position of the first changed column in an XY field: 0 for the index
 * (staged), 1 for the worktree (modified), -1 when neither changed.
 */
function firstChangedColumn(xy: string): number {
	if (xy.charAt(0) !== '.') {
		return 0
	}
	if (xy.charAt(1) !== '.') {
		return 1
	}
	return -1
}

/**
 * Count staged and modified entries across every non-ignored group.
 *
 * Each entry counts once: as staged when its index column changed,
 * otherwise as modified. Lines without a usable XY field are skipped.
 */
export function parseChangeCounts(
	grouped: GroupedLines,
	ignoredTags: readonly string[] = DEFAULT_IGNORED_TAGS,
): ChangeCounts {
	let staged = 0
	let modified = 0

	for (const [tag, lines] of grouped) {
		if (ignoredTags.includes(tag)) {
			continue
		}

		for (const line of lines) {
			const xy = line.split(/\s+/)[1]
			if (xy === undefined || xy.length !== 2) {
				warnMalformed(line, 'missing two-character XY field')
				continue
			}

			const column = firstChangedColumn(xy)
			if (column === 0) {
				staged++
			} else if (column === 1) {
				modified++
			} else {
				warnMalformed(line, 'XY field reports no change')
			}
		}
	}

	return { staged, modified }
}

/** Number of untracked (`?`) entries. */
export function countUntracked(grouped: GroupedLines): number {
	return grouped.get(UNTRACKED_TAG)?.length ?? 0
}

/**
 * Parse `git status --porcelain=2 --branch` output into a summary.
 *
 * @throws {MissingDataError} If the output has no branch header at all
 */
export function parseGitStatus(
	text: string,
	options: BranchNameOptions = {},
): StatusSummary {
	const grouped = groupLines(text)

	const branchLines = grouped.get(BRANCH_TAG)
	if (!branchLines) {
		throw new MissingDataError(
			'git did not return branch information',
			BRANCH_TAG,
		)
	}

	const info = parseBranchInfo(branchLines)
	const branch = resolveBranchName(info, options)
	const { ahead, behind } = parseAheadBehind(info)
	const { staged, modified } = parseChangeCounts(grouped)

	return {
		branch,
		untracked: countUntracked(grouped),
		staged,
		modified,
		ahead,
		behind,
	}
}
