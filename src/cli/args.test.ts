import { describe, expect, test } from 'vitest'
import { formatFlagName, parseCommandArgs } from './args.js'
import { GIT_PROMPT_COMMAND, SHORT_PWD_COMMAND } from './commands.js'
import { CliError } from './errors.js'

describe('parseCommandArgs', () => {
	test('resolves short aliases to long names', () => {
		expect(
			parseCommandArgs(['/tmp', '-n', '3', '--no-tilde'], SHORT_PWD_COMMAND),
		).toEqual({
			positional: ['/tmp'],
			flags: { 'full-paths': '3', 'no-tilde': true },
		})
	})

	test('keeps unknown flags for validation', () => {
		expect(parseCommandArgs(['--verbose=x'], GIT_PROMPT_COMMAND)).toEqual({
			positional: [],
			flags: { verbose: 'x' },
		})
	})

	test('a string flag without a value is true', () => {
		expect(parseCommandArgs(['-C'], GIT_PROMPT_COMMAND).flags).toEqual({
			directory: true,
		})
	})

	test('rejects a repeated flag', () => {
		expect(() =>
			parseCommandArgs(['-n', '1', '-n', '2'], SHORT_PWD_COMMAND),
		).toThrow('Flag -n may only be specified once')
	})

	test('rejects a flag repeated under its long name', () => {
		let caught: unknown
		try {
			parseCommandArgs(['-n', '1', '--full-paths', '2'], SHORT_PWD_COMMAND)
		} catch (error) {
			caught = error
		}
		expect(caught).toBeInstanceOf(CliError)
		expect(caught).toMatchObject({
			code: 'E_USAGE',
			exitCode: 2,
			message: 'Flag --full-paths may only be specified once',
		})
	})
})

describe('formatFlagName', () => {
	test('single letters get one dash', () => {
		expect(formatFlagName('n')).toBe('-n')
		expect(formatFlagName('no-tilde')).toBe('--no-tilde')
	})
})
