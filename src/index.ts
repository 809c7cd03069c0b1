#!/usr/bin/env node
import { StreamReportSink, WebhookReportSink, type ReportSink } from './api/sinks.js'
import { createTextSource } from './api/sources.js'
import { ConfigError, SourceError } from './checker/errors.js'
import { probeCertificate, type Probe } from './checker/probe.js'
import { loadConfig, type Config } from './config.js'
import { runInvocation, type InvocationDeps } from './service.js'
import { CheckServer } from './ui/server.js'
import { createLogger, getLogDirectory, type Logger } from './utils/logger.js'
import { PRODUCT_NAME, VERSION } from './utils/version.js'

const EXIT_VALID = 0
const EXIT_FAILURE = 1
const EXIT_INVALID = 2

const USAGE = `Usage:
  cert-sentry check [location]   check the targets listed at location (file path or URL)
  cert-sentry serve              accept checks over HTTP`

function buildDeps(config: Config, logger: Logger, sinks: ReportSink[]): InvocationDeps {
  const probe: Probe = (target, signal) =>
    probeCertificate(target, logger, { timeoutMs: config.probeTimeoutMs, signal })

  return {
    config,
    logger,
    probe,
    openSource: (location) => createTextSource(location, logger),
    sinks,
  }
}

function webhookSinks(config: Config, logger: Logger): ReportSink[] {
  return config.reportWebhookUrl ? [new WebhookReportSink(config.reportWebhookUrl, logger)] : []
}

async function runCheck(config: Config, logger: Logger, location?: string): Promise<number> {
  const sinks = [new StreamReportSink(process.stdout), ...webhookSinks(config, logger)]
  const deps = buildDeps(config, logger, sinks)

  try {
    const response = await runInvocation({ config_location: location }, deps)
    return 'Valid' in response.report ? EXIT_VALID : EXIT_INVALID
  } catch (err) {
    if (err instanceof ConfigError || err instanceof SourceError) {
      logger.error(`${err.name}: ${err.message}`)
      return EXIT_FAILURE
    }
    throw err
  }
}

async function serve(config: Config, logger: Logger): Promise<void> {
  const server = new CheckServer(config.port, buildDeps(config, logger, webhookSinks(config, logger)))
  await server.start()

  const shutdown = (signal: string): void => {
    logger.info(`Received ${signal}, shutting down`)
    server.stop().then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error(`Shutdown failed: ${err instanceof Error ? err.message : String(err)}`)
        process.exit(1)
      }
    )
  }
  process.once('SIGINT', () => shutdown('SIGINT'))
  process.once('SIGTERM', () => shutdown('SIGTERM'))
}

async function main(argv: string[]): Promise<void> {
  const [command, location] = argv

  let config: Config
  try {
    config = loadConfig()
  } catch (err) {
    console.error(err instanceof Error ? err.message : String(err))
    process.exitCode = EXIT_FAILURE
    return
  }

  const logger = createLogger(config.logLevel, getLogDirectory(config.logDir))
  logger.info(`${PRODUCT_NAME} v${VERSION}`)

  switch (command) {
    case 'check':
      process.exitCode = await runCheck(config, logger, location)
      break
    case 'serve':
      await serve(config, logger)
      break
    default:
      console.error(USAGE)
      process.exitCode = EXIT_FAILURE
  }
}

main(process.argv.slice(2)).catch((err: unknown) => {
  console.error(err instanceof Error ? err.stack ?? err.message : String(err))
  process.exitCode = EXIT_FAILURE
})
