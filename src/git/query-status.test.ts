import { beforeEach, describe, expect, test, vi } from 'vitest'

const { spawnAndCollectMock } = vi.hoisted(() => ({
	spawnAndCollectMock: vi.fn(),
}))

vi.mock('../spawn/spawn-and-collect.js', () => ({
	spawnAndCollect: spawnAndCollectMock,
}))

import { GIT_STATUS_ARGV, queryGitStatus } from './query-status.js'

function enoent(): Error {
	return Object.assign(new Error('spawn git ENOENT'), { code: 'ENOENT' })
}

beforeEach(() => {
	spawnAndCollectMock.mockReset()
})

describe('queryGitStatus', () => {
	test('runs git status --porcelain=2 --branch with stderr discarded', async () => {
		spawnAndCollectMock.mockResolvedValue({
			exitCode: 0,
			stdout: '# branch.head main\n',
			stderr: '',
		})

		await expect(queryGitStatus('/repo')).resolves.toBe('# branch.head main\n')
		expect(spawnAndCollectMock).toHaveBeenCalledWith(
			['git', 'status', '--porcelain=2', '--branch'],
			{ cwd: '/repo', stderr: 'ignore' },
		)
		expect(GIT_STATUS_ARGV).toEqual(['git', 'status', '--porcelain=2', '--branch'])
	})

	test('returns null outside a work tree', async () => {
		spawnAndCollectMock.mockResolvedValue({
			exitCode: 128,
			stdout: '',
			stderr: '',
		})
		await expect(queryGitStatus('/tmp')).resolves.toBeNull()
	})

	test('returns null when git is not installed', async () => {
		spawnAndCollectMock.mockRejectedValue(enoent())
		await expect(queryGitStatus('/repo')).resolves.toBeNull()
	})

	test('propagates other spawn failures', async () => {
		spawnAndCollectMock.mockRejectedValue(
			Object.assign(new Error('spawn EACCES'), { code: 'EACCES' }),
		)
		await expect(queryGitStatus('/repo')).rejects.toThrow('spawn EACCES')
	})
})
