import { Command } from 'commander'
import { createRegistry } from '@threadgraph/catalog'
import { Server } from '@threadgraph/remote-server'
import { errorMeta, makeLogger } from '@threadgraph/logger'
import { loadConfig } from './config.js'
import { createRuntime } from './runtime.js'

const logger = makeLogger('threadgraph')

export const VALID_COMMANDS = new Set(['start-server', 'list-workflows', 'describe', 'help'])

export type Print = (line: string) => void

async function startServer(domain?: string): Promise<void> {
  const config = loadConfig()
  const runtime = await createRuntime(config)
  const server = new Server(runtime.orchestrator, domain ?? config.DOMAIN, {
    allowedOrigins: config.ALLOWED_ORIGINS,
  })
  await server.start()

  const shutdown = async (signal: string) => {
    logger.info('shutting down', { signal })
    await server.stop()
    await runtime.close()
  }
  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((err: unknown) => {
        logger.error('shutdown failed', { signal, ...errorMeta(err) })
        process.exitCode = 1
      })
    })
  }
}

export function buildProgram(print: Print = (line) => console.log(line)): Command {
  const program = new Command()

  program
    .name('threadgraph')
    .description('Run and inspect resumable graph workflows')
    .version('0.1.0')

  // threadgraph start-server --domain localhost:3000
  program
    .command('start-server')
    .description('Start the HTTP server')
    .option('--domain <domain>', 'host:port to bind, defaults to DOMAIN')
    .action(async (opts: { domain?: string }) => {
      await startServer(opts.domain)
    })

  program
    .command('list-workflows')
    .description('Print the registered workflow names')
    .action(() => {
      for (const name of createRegistry().list()) print(name)
    })

  // threadgraph describe echo --mermaid
  program
    .command('describe')
    .description('Print the graph of a workflow')
    .argument('<workflowName>', 'registered workflow name')
    .option('--mermaid', 'print only the Mermaid diagram')
    .action((workflowName: string, opts: { mermaid?: boolean }) => {
      const description = createRegistry().resolve(workflowName).definition.describe()
      if (opts.mermaid) {
        print(description.mermaid)
      } else {
        print(JSON.stringify({ name: workflowName, ...description }, null, 2))
      }
    })

  return program
}
