import { afterEach, describe, expect, test } from 'vitest'
import {
	configureLogger,
	getLogger,
	isLogLevel,
	setLogLevel,
} from './logger.js'

function captureLogs(level: Parameters<typeof configureLogger>[0]): string[] {
	const lines: string[] = []
	configureLogger(level, {
		write: (msg: string) => {
			lines.push(msg)
		},
	})
	return lines
}

function parseLine(line: string | undefined): unknown {
	return JSON.parse(line ?? '')
}

describe('logger', () => {
	afterEach(() => {
		configureLogger('silent')
	})

	test('child loggers carry the module binding', () => {
		const lines = captureLogs('info')

		getLogger('git/parse-status').warn({ line: '1 ..' }, 'skipping line')

		expect(lines).toHaveLength(1)
		expect(parseLine(lines[0])).toMatchObject({
			level: 40,
			name: 'prompt-segments',
			module: 'git/parse-status',
			line: '1 ..',
			msg: 'skipping line',
		})
	})

	test('drops entries below the configured level', () => {
		const lines = captureLogs('warn')

		getLogger('config').info('loaded config file')

		expect(lines).toEqual([])
	})

	test('setLogLevel applies to loggers created afterwards', () => {
		const lines = captureLogs('warn')

		setLogLevel('debug')
		getLogger('cli').debug('command failed')

		expect(lines).toHaveLength(1)
		expect(parseLine(lines[0])).toMatchObject({ level: 20, module: 'cli' })
	})

	test('isLogLevel accepts pino level names only', () => {
		expect(isLogLevel('silent')).toBe(true)
		expect(isLogLevel('trace')).toBe(true)
		expect(isLogLevel('verbose')).toBe(false)
		expect(isLogLevel('WARN')).toBe(false)
	})
})
