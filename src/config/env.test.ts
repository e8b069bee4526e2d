import path from 'node:path'
import { describe, expect, test } from 'vitest'
import { ConfigurationError } from '../errors.js'
import {
	readHome,
	readLogLevel,
	readThemeName,
	resolveConfigPath,
} from './env.js'

describe('readHome', () => {
	test('returns HOME', () => {
		expect(readHome({ HOME: '/home/alice' })).toBe('/home/alice')
	})

	test('throws ConfigurationError when HOME is missing or empty', () => {
		expect(() => readHome({})).toThrow(ConfigurationError)
		expect(() => readHome({ HOME: '' })).toThrow(ConfigurationError)
	})
})

describe('readLogLevel', () => {
	test('defaults to warn', () => {
		expect(readLogLevel({})).toBe('warn')
		expect(readLogLevel({ PROMPT_SEGMENTS_LOG_LEVEL: '' })).toBe('warn')
	})

	test('accepts pino levels and silent', () => {
		expect(readLogLevel({ PROMPT_SEGMENTS_LOG_LEVEL: 'debug' })).toBe('debug')
		expect(readLogLevel({ PROMPT_SEGMENTS_LOG_LEVEL: 'silent' })).toBe(
			'silent',
		)
	})

	test('rejects unknown levels', () => {
		expect(() => readLogLevel({ PROMPT_SEGMENTS_LOG_LEVEL: 'loud' })).toThrow(
			'Invalid environment variable PROMPT_SEGMENTS_LOG_LEVEL="loud"',
		)
	})
})

describe('readThemeName', () => {
	test('undefined when unset', () => {
		expect(readThemeName({})).toBeUndefined()
	})

	test('returns a known theme', () => {
		expect(readThemeName({ PROMPT_SEGMENTS_THEME: 'ansi' })).toBe('ansi')
	})

	test('rejects an unknown theme', () => {
		expect(() => readThemeName({ PROMPT_SEGMENTS_THEME: 'neon' })).toThrow(
			'Invalid environment variable PROMPT_SEGMENTS_THEME="neon": unknown theme',
		)
	})
})

describe('resolveConfigPath', () => {
	test('explicit path wins', () => {
		expect(
			resolveConfigPath({
				PROMPT_SEGMENTS_CONFIG: '/etc/prompt.json',
				XDG_CONFIG_HOME: '/xdg',
				HOME: '/home/alice',
			}),
		).toBe('/etc/prompt.json')
	})

	test('then XDG_CONFIG_HOME', () => {
		expect(
			resolveConfigPath({ XDG_CONFIG_HOME: '/xdg', HOME: '/home/alice' }),
		).toBe(path.join('/xdg', 'prompt-segments', 'config.json'))
	})

	test('then ~/.config', () => {
		expect(resolveConfigPath({ HOME: '/home/alice' })).toBe(
			path.join('/home/alice', '.config', 'prompt-segments', 'config.json'),
		)
	})

	test('undefined without any of them', () => {
		expect(resolveConfigPath({})).toBeUndefined()
	})
})
