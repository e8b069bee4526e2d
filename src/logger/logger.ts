/**
 * Process-wide pino logger.
 *
 * Everything is written synchronously to stderr: stdout belongs to the
 * prompt text and a prompt helper exits right after one render.
 *
 * @module logger/logger
 */

import { type LevelWithSilent, type Logger, pino } from 'pino'

/** Environment variable holding the log level. */
export const LOG_LEVEL_ENV = 'PROMPT_SEGMENTS_LOG_LEVEL'

/** Level used when the environment does not name one. */
export const DEFAULT_LOG_LEVEL: LevelWithSilent = 'warn'

export const LOG_LEVELS: readonly LevelWithSilent[] = [
	'fatal',
	'error',
	'warn',
	'info',
	'debug',
	'trace',
	'silent',
]

export function isLogLevel(value: string): value is LevelWithSilent {
	return LOG_LEVELS.some((level) => level === value)
}

let rootLogger: Logger | undefined

function levelFromEnv(): LevelWithSilent {
	const raw = process.env[LOG_LEVEL_ENV]
	if (raw === undefined || raw === '') {
		return DEFAULT_LOG_LEVEL
	}
	// Unknown names fall back here; the CLI validates the variable first.
	return isLogLevel(raw) ? raw : DEFAULT_LOG_LEVEL
}

/**
 * Create (or replace) the root logger.
 *
 * @param level - Minimum level to emit
 * @param destination - Defaults to a synchronous stderr stream
 */
export function configureLogger(
	level: LevelWithSilent,
	destination: pino.DestinationStream = pino.destination({
		dest: 2,
		sync: true,
	}),
): Logger {
	rootLogger = pino({ name: 'prompt-segments', level }, destination)
	return rootLogger
}

/** Raise or lower the level of the root logger in place. */
export function setLogLevel(level: LevelWithSilent): void {
	getRootLogger().level = level
}

function getRootLogger(): Logger {
	if (!rootLogger) {
		rootLogger = configureLogger(levelFromEnv())
	}
	return rootLogger
}

/**
 * Child logger tagged with the calling module.
 *
 * Children are created per call so a level change made by the CLI after
 * startup (e.g. `--debug`) is always honoured.
 */
export function getLogger(module: string): Logger {
	return getRootLogger().child({ module })
}
