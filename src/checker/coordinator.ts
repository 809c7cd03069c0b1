import type { Logger } from '../utils/logger.js'
import { classifyOutcome } from './classify.js'
import type { Probe } from './probe.js'
import { networkError, type CheckTarget, type DomainOutcome, type ProbeResult } from './types.js'

export const DEFAULT_CONCURRENCY = 10
export const DEFAULT_RUN_DEADLINE_MS = 60000
export const MAX_NETWORK_RETRIES = 3

export interface RunChecksOptions {
  probe: Probe
  logger: Logger
  /** Reference time for expiry evaluation */
  now: Date
  concurrency?: number
  deadlineMs?: number
  /** Extra attempts after a network error; handshake errors are never retried */
  networkRetries?: number
}

/**
 * Check every target with bounded parallelism.
 *
 * Each target owns one result slot, written once. When the overall deadline passes,
 * in-flight probes are aborted and every empty slot becomes a network timeout,
 * so the returned array always lines up with `targets`.
 */
export async function runChecks(
  targets: readonly CheckTarget[],
  options: RunChecksOptions
): Promise<DomainOutcome[]> {
  const { probe, logger, now } = options
  const concurrency = Math.max(1, options.concurrency ?? DEFAULT_CONCURRENCY)
  const deadlineMs = options.deadlineMs ?? DEFAULT_RUN_DEADLINE_MS
  const retries = Math.min(Math.max(0, options.networkRetries ?? 0), MAX_NETWORK_RETRIES)

  if (targets.length === 0) {
    logger.info('No targets configured')
    return []
  }

  const outcomes: Array<DomainOutcome | undefined> = targets.map(() => undefined)

  logger.info(`Checking ${targets.length} targets (concurrency: ${concurrency}, deadline: ${deadlineMs}ms)`)

  const controller = new AbortController()
  const queue = targets.map((_, index) => index)

  const workers = Array(Math.min(concurrency, queue.length))
    .fill(null)
    .map(async () => {
      while (queue.length > 0 && !controller.signal.aborted) {
        const index = queue.shift()
        if (index === undefined) break

        const target = targets[index]
        const result = await probeWithRetry(target, probe, controller.signal, retries, logger)
        if (controller.signal.aborted) break

        const outcome = classifyOutcome(target, result, now)
        outcomes[index] = outcome
        logOutcome(outcome, logger)
      }
    })

  let deadlineTimer: NodeJS.Timeout | undefined
  const deadline = new Promise<void>((resolve) => {
    deadlineTimer = setTimeout(() => {
      logger.warn(`Check run exceeded ${deadlineMs}ms, aborting unfinished targets`)
      controller.abort()
      resolve()
    }, deadlineMs)
  })

  try {
    await Promise.race([Promise.all(workers), deadline])
  } finally {
    clearTimeout(deadlineTimer)
  }

  const results = outcomes.map((outcome, index): DomainOutcome => outcome ?? {
    kind: 'issue',
    domain: targets[index].domain,
    reason: networkError('timeout'),
  })

  const issues = results.filter(outcome => outcome.kind === 'issue').length
  logger.info(`Check run complete: ${results.length - issues}/${results.length} healthy`)

  return results
}

async function probeWithRetry(
  target: CheckTarget,
  probe: Probe,
  signal: AbortSignal,
  retries: number,
  logger: Logger
): Promise<ProbeResult> {
  let result = await safeProbe(target, probe, signal)

  for (let attempt = 1; attempt <= retries; attempt++) {
    if (result.ok || result.failure.kind !== 'network_error' || signal.aborted) break
    logger.debug(`Retrying ${target.domain} after network error (attempt ${attempt + 1}/${retries + 1})`)
    result = await safeProbe(target, probe, signal)
  }

  return result
}

async function safeProbe(target: CheckTarget, probe: Probe, signal: AbortSignal): Promise<ProbeResult> {
  try {
    return await probe(target, signal)
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err)
    return { ok: false, failure: networkError(message) }
  }
}

function logOutcome(outcome: DomainOutcome, logger: Logger): void {
  if (outcome.kind === 'healthy') {
    logger.debug(`${outcome.domain}: healthy`)
  } else {
    logger.warn(`${outcome.domain}: ${outcome.reason.kind}`)
  }
}
