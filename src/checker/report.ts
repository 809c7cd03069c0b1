import { ReportFormatError } from './errors.js'
import type { DomainOutcome, DomainStatus, IssueReason, Report, WireReport } from './types.js'

/**
 * Render an issue reason as the text that follows `domain: ` in a report line
 */
export function renderReason(reason: IssueReason): string {
  switch (reason.kind) {
    case 'network_error':
      return `network error: ${reason.detail}`
    case 'handshake_error':
      return `handshake error: ${reason.detail}`
    case 'expired':
      return `expired (not_after=${reason.at.toISOString()})`
    case 'near_expiry':
      return `expires in ${reason.daysLeft} days (not_after=${reason.at.toISOString()})`
  }
}

export function toDomainStatus(outcome: DomainOutcome): DomainStatus {
  if (outcome.kind === 'healthy') {
    return { domain: outcome.domain, valid: true, error: '' }
  }
  return { domain: outcome.domain, valid: false, error: renderReason(outcome.reason) }
}

/**
 * Fold per-domain statuses into a report. Issue lines keep input order.
 */
export function aggregateStatuses(statuses: readonly DomainStatus[]): Report {
  const invalid = statuses.filter(status => !status.valid)
  if (invalid.length === 0) {
    return { kind: 'valid' }
  }

  const lines = invalid.map(status => `${status.domain}: ${status.error}`)
  return {
    kind: 'invalid',
    message: [`Found ${invalid.length} issues.`, ...lines].join('\n'),
  }
}

export function aggregateReport(outcomes: readonly DomainOutcome[]): Report {
  return aggregateStatuses(outcomes.map(toDomainStatus))
}

export function toWireReport(report: Report): WireReport {
  return report.kind === 'valid' ? { Valid: null } : { Invalid: report.message }
}

/**
 * Validate a report produced by another process
 */
export function parseWireReport(value: unknown): Report {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new ReportFormatError('report must be a JSON object')
  }

  const keys = Object.keys(value)
  if (keys.length !== 1) {
    throw new ReportFormatError(`report must have exactly one key, got ${keys.length}`)
  }

  if ('Valid' in value) {
    if (value.Valid !== null) {
      throw new ReportFormatError('"Valid" must be null')
    }
    return { kind: 'valid' }
  }

  if ('Invalid' in value) {
    if (typeof value.Invalid !== 'string' || value.Invalid.length === 0) {
      throw new ReportFormatError('"Invalid" must be a non-empty string')
    }
    return { kind: 'invalid', message: value.Invalid }
  }

  throw new ReportFormatError(`unknown report variant "${keys[0]}"`)
}

/**
 * Check that an arbitrary value is a list of domain statuses
 */
export function parseDomainStatuses(value: unknown): DomainStatus[] {
  if (!Array.isArray(value)) {
    throw new ReportFormatError('statuses must be an array')
  }

  return value.map((entry: unknown, index): DomainStatus => {
    if (
      typeof entry !== 'object' || entry === null ||
      !('domain' in entry) || typeof entry.domain !== 'string' ||
      !('valid' in entry) || typeof entry.valid !== 'boolean'
    ) {
      throw new ReportFormatError(`statuses[${index}] must have a string domain and a boolean valid`)
    }

    const error = 'error' in entry && typeof entry.error === 'string' ? entry.error : ''
    return { domain: entry.domain, valid: entry.valid, error }
  })
}
