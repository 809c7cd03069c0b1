import { DAY_MS, type CertificateFacts } from './types.js'

export type ExpiryVerdict =
  | { kind: 'healthy' }
  | { kind: 'expired'; at: Date }
  | { kind: 'near_expiry'; at: Date; daysLeft: number }

/**
 * Judge a certificate's upper validity bound against `now`.
 *
 * Remaining time exactly equal to the threshold counts as healthy.
 * `notBefore` is left to the TLS layer.
 */
export function evaluateExpiry(
  facts: Pick<CertificateFacts, 'notAfter'>,
  thresholdMs: number,
  now: Date
): ExpiryVerdict {
  const remainingMs = facts.notAfter.getTime() - now.getTime()

  if (remainingMs < 0) {
    return { kind: 'expired', at: facts.notAfter }
  }

  if (remainingMs < thresholdMs) {
    return {
      kind: 'near_expiry',
      at: facts.notAfter,
      daysLeft: Math.floor(remainingMs / DAY_MS),
    }
  }

  return { kind: 'healthy' }
}
