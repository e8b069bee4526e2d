#!/usr/bin/env node

import { GIT_PROMPT_COMMAND } from '../cli/commands.js'
import { handleGitPrompt } from '../cli/handlers/git-prompt.js'
import { runCommand } from '../cli/run.js'

process.exitCode = await runCommand(GIT_PROMPT_COMMAND, handleGitPrompt)
