import { spawn } from 'node:child_process'

/** How the child's standard error is handled. */
export type StderrMode = 'pipe' | 'ignore'

export interface SpawnOptions {
	readonly cwd?: string
	/** `ignore` discards stderr; the collected `stderr` is then empty. */
	readonly stderr?: StderrMode
}

export interface SpawnResult {
	readonly exitCode: number
	readonly stdout: string
	readonly stderr: string
}

function toBuffer(chunk: Buffer | string): Buffer {
	return Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk)
}

/**
 * Spawn `argv[0]` with the remaining elements as its arguments and collect
 * its output.
 *
 * The argument vector goes straight to the process, never through a shell.
 * Resolves for any exit code; a child killed by a signal reports exit code 1.
 * Rejects when the process cannot be spawned at all (for example `ENOENT`).
 */
export function spawnAndCollect(
	argv: readonly string[],
	options: SpawnOptions = {},
): Promise<SpawnResult> {
	const [bin, ...args] = argv
	if (!bin) {
		return Promise.reject(new Error('spawnAndCollect: empty argument vector'))
	}

	const stderrMode = options.stderr ?? 'pipe'

	return new Promise<SpawnResult>((resolve, reject) => {
		const child = spawn(bin, args, {
			cwd: options.cwd,
			stdio: ['ignore', 'pipe', stderrMode],
		})

		const stdoutChunks: Buffer[] = []
		const stderrChunks: Buffer[] = []

		child.stdout?.on('data', (chunk: Buffer | string) => {
			stdoutChunks.push(toBuffer(chunk))
		})
		child.stderr?.on('data', (chunk: Buffer | string) => {
			stderrChunks.push(toBuffer(chunk))
		})

		child.on('error', reject)
		child.on('close', (code: number | null) => {
			resolve({
				exitCode: code ?? 1,
				stdout: Buffer.concat(stdoutChunks).toString('utf8'),
				stderr: Buffer.concat(stderrChunks).toString('utf8'),
			})
		})
	})
}
