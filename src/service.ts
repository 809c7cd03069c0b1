import { randomUUID } from 'crypto'
import type { ReportSink } from './api/sinks.js'
import type { TextSource } from './api/sources.js'
import { runChecks } from './checker/coordinator.js'
import { ConfigError } from './checker/errors.js'
import type { Probe } from './checker/probe.js'
import { aggregateStatuses, toDomainStatus, toWireReport } from './checker/report.js'
import { parseTargets } from './checker/targets.js'
import { DAY_MS, type CheckResponse } from './checker/types.js'
import type { Config } from './config.js'
import type { Logger } from './utils/logger.js'

export interface CheckRequest {
  config_location?: string
}

export interface InvocationDeps {
  config: Config
  logger: Logger
  probe: Probe
  openSource: (location: string) => TextSource
  sinks?: ReportSink[]
  now?: () => Date
  requestId?: () => string
}

/**
 * Run one invocation: load the target list, check every target and build the response.
 *
 * Throws ConfigError or SourceError when the input itself is unusable; per-domain
 * problems always end up in the report instead.
 */
export async function runInvocation(request: CheckRequest, deps: InvocationDeps): Promise<CheckResponse> {
  const { config, logger } = deps
  const reqId = (deps.requestId ?? randomUUID)()

  const location = request.config_location?.trim() || config.targetsLocation
  if (!location) {
    throw new ConfigError('no target list location given and TARGETS_LOCATION is not set')
  }

  const source = deps.openSource(location)
  logger.info(`[${reqId}] Loading targets from ${source.describe()}`)
  const text = await source.read()

  const targets = parseTargets(text, {
    expiryThresholdMs: config.expiryThresholdDays * DAY_MS,
  })

  const now = (deps.now ?? (() => new Date()))()
  const outcomes = await runChecks(targets, {
    probe: deps.probe,
    logger,
    now,
    concurrency: config.checkConcurrency,
    deadlineMs: config.runDeadlineMs,
    networkRetries: config.networkRetries,
  })

  const statuses = outcomes.map(toDomainStatus)
  const report = aggregateStatuses(statuses)
  if (report.kind === 'valid') {
    logger.info(`[${reqId}] All ${targets.length} targets healthy`)
  } else {
    logger.warn(`[${reqId}] ${report.message.split('\n')[0]}`)
  }

  const response: CheckResponse = {
    req_id: reqId,
    checked_at: now.toISOString(),
    statuses,
    report: toWireReport(report),
  }

  for (const sink of deps.sinks ?? []) {
    try {
      await sink.deliver(response)
    } catch (err) {
      logger.error(`[${reqId}] Report delivery via ${sink.name} failed: ${err instanceof Error ? err.message : String(err)}`)
    }
  }

  return response
}
