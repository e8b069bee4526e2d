import { type Env, readLogLevel } from '../config/env.js'
import { configureLogger, getLogger } from '../logger/index.js'
import { parseCommandArgs } from './args.js'
import type { CommandDef } from './commands.js'
import { toCliError } from './errors.js'
import { EXIT_OK, type ExitCode } from './exit-codes.js'
import type { CommandHandler } from './handlers/types.js'
import { generateHelpText } from './help.js'
import {
	formatError,
	stderrWriter,
	stdoutWriter,
	type Writer,
} from './output.js'
import { parseBooleanFlag } from './parsers.js'
import { validateFlags } from './validate-flags.js'

export interface RunOptions {
	readonly argv?: readonly string[]
	readonly env?: Env
	readonly cwd?: string
	readonly stdout?: Writer
	readonly stderr?: Writer
}

/**
 * Run one command: parse, validate, dispatch, print.
 *
 * Every failure is reported as one line on stderr and mapped to the
 * error's exit code; nothing is thrown.
 */
export async function runCommand(
	commandDef: CommandDef,
	handler: CommandHandler,
	options: RunOptions = {},
): Promise<ExitCode> {
	const {
		argv = process.argv.slice(2),
		env = process.env,
		cwd = process.cwd(),
		stdout = stdoutWriter,
		stderr = stderrWriter,
	} = options

	try {
		configureLogger(readLogLevel(env))

		const parsed = parseCommandArgs(argv, commandDef)
		if (parseBooleanFlag(parsed.flags, 'help')) {
			stdout(`${generateHelpText(commandDef)}\n`)
			return EXIT_OK
		}

		validateFlags(parsed, commandDef)

		const result = await handler({
			positional: parsed.positional,
			flags: parsed.flags,
			cwd,
			env,
			stderr,
		})
		stdout(result.output)
		return EXIT_OK
	} catch (error) {
		const cliError = toCliError(error)
		getLogger('cli').debug({ err: error }, 'command failed')
		stderr(formatError(commandDef.command, cliError))
		return cliError.exitCode
	}
}
