/**
 * Data model shared by the certificate-check engine.
 * Everything here is created fresh for one check run and never persisted.
 */

export const DAY_MS = 24 * 60 * 60 * 1000

export const DEFAULT_PORT = 443
export const DEFAULT_EXPIRY_THRESHOLD_MS = 14 * DAY_MS

export interface CheckTarget {
  readonly domain: string
  readonly port: number
  readonly expiryThresholdMs: number
}

/**
 * Facts extracted from the leaf certificate after a successful handshake
 */
export interface CertificateFacts {
  notBefore: Date
  notAfter: Date
  subjectIdentity: string
  chainTrusted: boolean
}

export type IssueReason =
  | { kind: 'network_error'; detail: string }
  | { kind: 'handshake_error'; detail: string }
  | { kind: 'expired'; at: Date }
  | { kind: 'near_expiry'; at: Date; daysLeft: number }

export type ProbeFailure = Extract<IssueReason, { kind: 'network_error' | 'handshake_error' }>

export type ProbeResult =
  | { ok: true; facts: CertificateFacts }
  | { ok: false; failure: ProbeFailure }

export type DomainOutcome =
  | { kind: 'healthy'; domain: string }
  | { kind: 'issue'; domain: string; reason: IssueReason }

/**
 * Per-domain status as handed from the check stage to the reporting stage
 */
export interface DomainStatus {
  domain: string
  valid: boolean
  error: string
}

export type Report =
  | { kind: 'valid' }
  | { kind: 'invalid'; message: string }

/**
 * The only shape the reporting stage depends on
 */
export type WireReport = { Valid: null } | { Invalid: string }

export interface CheckResponse {
  req_id: string
  checked_at: string
  statuses: DomainStatus[]
  report: WireReport
}

export function networkError(detail: string): ProbeFailure {
  return { kind: 'network_error', detail }
}

export function handshakeError(detail: string): ProbeFailure {
  return { kind: 'handshake_error', detail }
}
