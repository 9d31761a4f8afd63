/**
 * Command line entry point
 */

import { pathToFileURL } from 'node:url'
import { parseArgs } from 'node:util'
import {
  APP_NAME,
  APP_VERSION,
  createLogger,
  fileSink,
  toErrorMessage,
  type Logger
} from '@wingetdash/shared'
import { loadConfig, resolveRuntimeConfig, type RuntimeConfig } from '@wingetdash/backend-core'
import { MemoryBackend, WingetClient, loadDemoCatalog, type PackageBackend } from '@wingetdash/winget-client'
import { tuiUI } from './app.js'

const USAGE = `Usage: ${APP_NAME} [options]

Browse, search, install, upgrade and uninstall winget packages.

Options:
  --demo               Use a built-in catalog instead of winget
  --config <path>      Read configuration from <path>
  --log-level <level>  debug, info, warn or error
  -h, --help           Show this help
  -v, --version        Show the version
`

const OPTIONS = {
  demo: { type: 'boolean' },
  config: { type: 'string' },
  'log-level': { type: 'string' },
  help: { type: 'boolean', short: 'h' },
  version: { type: 'boolean', short: 'v' }
} as const

const DEMO_LATENCY_MS = 400

export interface CliIO {
  stdin: NodeJS.ReadStream
  stdout: NodeJS.WriteStream
  stderr: NodeJS.WriteStream
  env: NodeJS.ProcessEnv
}

function parseCli(argv: string[]) {
  return parseArgs({ args: argv, options: OPTIONS, strict: true, allowPositionals: false }).values
}

export function createBackend(config: RuntimeConfig, demo: boolean, logger: Logger): PackageBackend {
  if (demo) {
    logger.info('Using the demo catalog')
    return new MemoryBackend({ ...loadDemoCatalog(), latencyMs: DEMO_LATENCY_MS })
  }

  return new WingetClient({
    wingetPath: config.wingetPath,
    timeoutMs: config.commandTimeoutMs,
    logger: logger.createChild('winget')
  })
}

/**
 * Runs the dashboard and returns the process exit code
 */
export async function main(argv: string[], io: CliIO): Promise<number> {
  let values: ReturnType<typeof parseCli>
  try {
    values = parseCli(argv)
  } catch (error) {
    io.stderr.write(`${toErrorMessage(error)}\n\n${USAGE}`)
    return 2
  }

  if (values.help) {
    io.stdout.write(USAGE)
    return 0
  }
  if (values.version) {
    io.stdout.write(`${APP_NAME} ${APP_VERSION}\n`)
    return 0
  }

  const persisted = values.config ? await loadConfig(values.config) : await loadConfig()
  const config = resolveRuntimeConfig({ persisted, env: io.env, flags: { logLevel: values['log-level'] } })

  if (!io.stdin.isTTY || !io.stdout.isTTY) {
    io.stderr.write(`${APP_NAME} needs an interactive terminal\n`)
    return 1
  }

  let logFailure: string | undefined
  const sink = fileSink(config.logFile, (error) => {
    logFailure = toErrorMessage(error)
  })
  const logger = createLogger({ namespace: APP_NAME, level: config.logLevel, sink })
  logger.info('%s %s starting', APP_NAME, APP_VERSION)

  try {
    await tuiUI({
      stdin: io.stdin,
      stdout: io.stdout,
      backend: createBackend(config, values.demo ?? false, logger),
      config,
      logger
    })
    return 0
  } catch (error) {
    logger.error('Fatal: %s', toErrorMessage(error))
    io.stderr.write(`${APP_NAME}: ${toErrorMessage(error)}\n`)
    return 1
  } finally {
    await sink.close?.()
    if (logFailure !== undefined) {
      io.stderr.write(`${APP_NAME}: could not write ${config.logFile}: ${logFailure}\n`)
    }
  }
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  main(process.argv.slice(2), {
    stdin: process.stdin,
    stdout: process.stdout,
    stderr: process.stderr,
    env: process.env
  }).then(
    (code) => process.exit(code),
    (error: unknown) => {
      console.error(error)
      process.exit(1)
    }
  )
}
