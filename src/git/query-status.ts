import { getLogger } from '../logger/index.js'
import { type SpawnResult, spawnAndCollect } from '../spawn/spawn-and-collect.js'

/** Argument vector for the status query. */
export const GIT_STATUS_ARGV: readonly string[] = [
	'git',
	'status',
	'--porcelain=2',
	'--branch',
]

function isMissingExecutable(error: unknown): boolean {
	return (
		error instanceof Error &&
		'code' in error &&
		error.code === 'ENOENT'
	)
}

/**
 * Run `git status --porcelain=2 --branch` in `cwd`.
 *
 * Returns null when git is not installed or `cwd` is not inside a work tree;
 * the prompt then simply omits the Git segment. Standard error is discarded.
 */
export async function queryGitStatus(cwd: string): Promise<string | null> {
	const log = getLogger('git/query-status')

	let result: SpawnResult
	try {
		result = await spawnAndCollect(GIT_STATUS_ARGV, { cwd, stderr: 'ignore' })
	} catch (error) {
		if (isMissingExecutable(error)) {
			log.debug({ cwd }, 'git executable or cwd not found')
			return null
		}
		throw error
	}

	if (result.exitCode !== 0) {
		log.debug({ cwd, exitCode: result.exitCode }, 'not a git work tree')
		return null
	}
	return result.stdout
}
