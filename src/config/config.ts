/**
 * Optional JSON config file.
 *
 * Loads `config.json` (see `resolveConfigPath` for the lookup order),
 * validates it with zod and merges it with the defaults, so callers always
 * get complete settings. A missing file is not an error.
 *
 * @module config/config
 */

import fs from 'node:fs'
import { z } from 'zod'
import {
	DEFAULT_THEME_NAME,
	resolveTheme,
	TEXT_PLACEHOLDER,
	THEME_NAMES,
	type ThemeName,
} from '../decoration/themes.js'
import type { DecorationTheme } from '../decoration/types.js'
import { ConfigurationError } from '../errors.js'
import {
	DEFAULT_DETACHED_PREFIX,
	DEFAULT_HASH_CHARS,
} from '../git/parse-status.js'
import { getLogger } from '../logger/index.js'
import { DEFAULT_FULL_SEGMENTS } from '../path/truncate.js'
import { type Env, readThemeName, resolveConfigPath } from './env.js'

const styleTemplate = z
	.string()
	.refine((value) => value.includes(TEXT_PLACEHOLDER), {
		message: `style template must contain ${TEXT_PLACEHOLDER}`,
	})

/** Schema of the config file. Unknown keys are rejected. */
export const configFileSchema = z
	.object({
		theme: z.enum(THEME_NAMES),
		glyphs: z
			.object({
				ahead: z.string(),
				behind: z.string(),
				clean: z.string(),
				staged: z.string(),
				modified: z.string(),
				untracked: z.string(),
			})
			.partial()
			.strict(),
		styles: z
			.object({
				branch: styleTemplate,
				clean: styleTemplate,
				staged: styleTemplate,
				modified: styleTemplate,
			})
			.partial()
			.strict(),
		hashChars: z.number().int().min(1).max(40),
		detachedPrefix: z.string(),
		fullSegments: z.number().int().min(0),
		homeTilde: z.boolean(),
	})
	.partial()
	.strict()

export type ConfigFile = z.infer<typeof configFileSchema>

/** Settings shared by both commands, fully resolved. */
export interface PromptSettings {
	readonly hashChars: number
	readonly detachedPrefix: string
	readonly fullSegments: number
	readonly homeTilde: boolean
	/** Theme keys from the file, left unresolved until `git-prompt` needs them. */
	readonly themeConfig: Pick<ConfigFile, 'theme' | 'glyphs' | 'styles'>
	/** File the settings were read from, if any. */
	readonly source: string | null
}

/** Decoration theme selected for `git-prompt`. */
export interface ThemeSettings {
	readonly themeName: ThemeName
	readonly theme: DecorationTheme
}

function formatIssues(error: z.ZodError): string {
	return error.issues
		.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
		.join('; ')
}

/**
 * Read and validate the config file at `configPath`.
 *
 * @returns The parsed file, or null if it does not exist
 * @throws {ConfigurationError} If the file is not valid JSON or fails
 * validation
 */
export function loadConfigFile(configPath: string): ConfigFile | null {
	if (!fs.existsSync(configPath)) {
		return null
	}

	let raw: unknown
	try {
		raw = JSON.parse(fs.readFileSync(configPath, 'utf8'))
	} catch (error) {
		throw new ConfigurationError(
			`Invalid config file ${configPath}: ${error instanceof Error ? error.message : String(error)}`,
			{ cause: error },
		)
	}

	const result = configFileSchema.safeParse(raw)
	if (!result.success) {
		throw new ConfigurationError(
			`Invalid config file ${configPath}: ${formatIssues(result.error)}`,
			{ cause: result.error },
		)
	}
	return result.data
}

/**
 * Resolve the shared settings from the environment and the config file.
 *
 * The theme is not validated here; `short-pwd` never reads it.
 */
export function loadSettings(env: Env = process.env): PromptSettings {
	const configPath = resolveConfigPath(env)
	const file = configPath ? loadConfigFile(configPath) : null
	if (file) {
		getLogger('config').debug({ configPath }, 'loaded config file')
	}

	return {
		hashChars: file?.hashChars ?? DEFAULT_HASH_CHARS,
		detachedPrefix: file?.detachedPrefix ?? DEFAULT_DETACHED_PREFIX,
		fullSegments: file?.fullSegments ?? DEFAULT_FULL_SEGMENTS,
		homeTilde: file?.homeTilde ?? true,
		themeConfig: {
			theme: file?.theme,
			glyphs: file?.glyphs,
			styles: file?.styles,
		},
		source: file && configPath ? configPath : null,
	}
}

/**
 * Select the decoration theme.
 *
 * Priority: `themeOverride` (the `--theme` flag), then
 * `PROMPT_SEGMENTS_THEME`, then the file's `theme`, then `zsh`. The file's
 * glyphs and styles overlay whichever theme wins.
 *
 * @throws {ConfigurationError} If `PROMPT_SEGMENTS_THEME` names an unknown
 * theme and no override is given
 */
export function resolveThemeSettings(
	settings: PromptSettings,
	env: Env = process.env,
	themeOverride?: ThemeName,
): ThemeSettings {
	const { themeConfig } = settings
	const themeName =
		themeOverride ??
		readThemeName(env) ??
		themeConfig.theme ??
		DEFAULT_THEME_NAME

	return {
		themeName,
		theme: resolveTheme(themeName, {
			glyphs: themeConfig.glyphs,
			styles: themeConfig.styles,
		}),
	}
}
