/**
 * Lines of `git status --porcelain=2 --branch` bucketed by their first
 * character (`#`, `1`, `2`, `u`, `?`). Order within a bucket is the order
 * git emitted.
 */
export type GroupedLines = ReadonlyMap<string, readonly string[]>

/**
 * `# branch.<key> <value>` headers keyed by `branch.<key>`. Values are the
 * verbatim remainder of the line (`branch.ab` holds `+N -M`).
 */
export type BranchInfo = ReadonlyMap<string, string>

/** Commits the branch is ahead of / behind its upstream. */
export interface AheadBehind {
	readonly ahead: number
	readonly behind: number
}

/** Tracked entries with index-side vs worktree-side changes. */
export interface ChangeCounts {
	readonly staged: number
	readonly modified: number
}

/** Everything the decoration renderer needs. */
export interface StatusSummary extends AheadBehind, ChangeCounts {
	/** Branch name, or the detached prefix plus an abbreviated commit hash. */
	readonly branch: string
	readonly untracked: number
}

/** Options for turning `branch.*` headers into a display name. */
export interface BranchNameOptions {
	/** Characters of `branch.oid` shown for a detached HEAD. Default 7. */
	readonly hashChars?: number
	/** Marks a hash so it cannot be mistaken for a branch name. Default `:`. */
	readonly detachedPrefix?: string
}
