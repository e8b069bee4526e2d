#!/usr/bin/env node

import { SHORT_PWD_COMMAND } from '../cli/commands.js'
import { handleShortPwd } from '../cli/handlers/short-pwd.js'
import { runCommand } from '../cli/run.js'

process.exitCode = await runCommand(SHORT_PWD_COMMAND, handleShortPwd)
