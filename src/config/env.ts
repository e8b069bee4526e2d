/**
 * Environment variable readers.
 *
 * Each reader takes the environment as a parameter (defaulting to
 * `process.env`) so callers and tests can pass an explicit map.
 *
 * @module config/env
 */

import path from 'node:path'
import type { LevelWithSilent } from 'pino'
import { isThemeName, type ThemeName } from '../decoration/themes.js'
import { ConfigurationError } from '../errors.js'
import {
	DEFAULT_LOG_LEVEL,
	isLogLevel,
	LOG_LEVEL_ENV,
	LOG_LEVELS,
} from '../logger/index.js'

/** Environment variable map as the readers consume it. */
export type Env = Readonly<Record<string, string | undefined>>

export const THEME_ENV = 'PROMPT_SEGMENTS_THEME'
export const CONFIG_PATH_ENV = 'PROMPT_SEGMENTS_CONFIG'

function readNonEmpty(env: Env, name: string): string | undefined {
	const raw = env[name]
	return raw === undefined || raw === '' ? undefined : raw
}

/**
 * Read `HOME`, required whenever the home directory is collapsed to `~`.
 *
 * @throws {ConfigurationError} If `HOME` is unset or empty
 */
export function readHome(env: Env = process.env): string {
	const home = readNonEmpty(env, 'HOME')
	if (home === undefined) {
		throw new ConfigurationError(
			'HOME is not set; pass --no-tilde to skip home directory collapsing',
		)
	}
	return home
}

/**
 * Read the log level, falling back to `warn`.
 *
 * @throws {ConfigurationError} If the variable names an unknown level
 */
export function readLogLevel(env: Env = process.env): LevelWithSilent {
	const raw = readNonEmpty(env, LOG_LEVEL_ENV)
	if (raw === undefined) {
		return DEFAULT_LOG_LEVEL
	}
	if (!isLogLevel(raw)) {
		throw new ConfigurationError(
			`Invalid environment variable ${LOG_LEVEL_ENV}="${raw}": expected one of ${LOG_LEVELS.join(', ')}`,
		)
	}
	return raw
}

/**
 * Read the theme override, or undefined when the variable is absent.
 *
 * @throws {ConfigurationError} If the variable names an unknown theme
 */
export function readThemeName(env: Env = process.env): ThemeName | undefined {
	const raw = readNonEmpty(env, THEME_ENV)
	if (raw === undefined) {
		return undefined
	}
	if (!isThemeName(raw)) {
		throw new ConfigurationError(
			`Invalid environment variable ${THEME_ENV}="${raw}": unknown theme`,
		)
	}
	return raw
}

/**
 * Resolve where the config file is looked for.
 *
 * Priority:
 * 1. PROMPT_SEGMENTS_CONFIG - full path override
 * 2. $XDG_CONFIG_HOME/prompt-segments/config.json
 * 3. $HOME/.config/prompt-segments/config.json
 *
 * Returns undefined when none of these variables is set.
 */
export function resolveConfigPath(env: Env = process.env): string | undefined {
	const explicit = readNonEmpty(env, CONFIG_PATH_ENV)
	if (explicit !== undefined) {
		return explicit
	}
	const xdg = readNonEmpty(env, 'XDG_CONFIG_HOME')
	if (xdg !== undefined) {
		return path.join(xdg, 'prompt-segments', 'config.json')
	}
	const home = readNonEmpty(env, 'HOME')
	if (home !== undefined) {
		return path.join(home, '.config', 'prompt-segments', 'config.json')
	}
	return undefined
}
