import { evaluateExpiry } from './expiry.js'
import type { CheckTarget, DomainOutcome, ProbeResult } from './types.js'

/**
 * Fold a probe result and the expiry verdict into the single outcome for a target
 */
export function classifyOutcome(target: CheckTarget, result: ProbeResult, now: Date): DomainOutcome {
  const domain = target.domain

  if (!result.ok) {
    return { kind: 'issue', domain, reason: result.failure }
  }

  if (!result.facts.chainTrusted) {
    return {
      kind: 'issue',
      domain,
      reason: { kind: 'handshake_error', detail: 'certificate chain not trusted' },
    }
  }

  const verdict = evaluateExpiry(result.facts, target.expiryThresholdMs, now)
  switch (verdict.kind) {
    case 'healthy':
      return { kind: 'healthy', domain }
    case 'expired':
      return { kind: 'issue', domain, reason: { kind: 'expired', at: verdict.at } }
    case 'near_expiry':
      return {
        kind: 'issue',
        domain,
        reason: { kind: 'near_expiry', at: verdict.at, daysLeft: verdict.daysLeft },
      }
  }
}
