import { config } from 'dotenv'
import { makeLogger, errorMeta } from '@threadgraph/logger'
import { buildProgram, VALID_COMMANDS } from './cli.js'

config()

const logger = makeLogger('threadgraph')

const maybeCommand = process.argv[2]

// Only treat it as a command if it's not an option (doesn't start with "-")
if (maybeCommand && !maybeCommand.startsWith('-') && !VALID_COMMANDS.has(maybeCommand)) {
  console.error(
    `Unknown command: "${maybeCommand}".` +
      `\nValid commands are: ${Array.from(VALID_COMMANDS).join(', ')}.`,
  )
  process.exit(1)
}

try {
  await buildProgram().parseAsync(process.argv)
} catch (err) {
  logger.error('command failed', errorMeta(err))
  console.error(err instanceof Error ? err.message : String(err))
  process.exitCode = 1
}
