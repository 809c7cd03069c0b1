import * as dns from 'dns'
import * as net from 'net'
import * as tls from 'tls'
import type { Logger } from '../utils/logger.js'
import {
  handshakeError,
  networkError,
  type CertificateFacts,
  type CheckTarget,
  type ProbeFailure,
  type ProbeResult,
} from './types.js'

export const DEFAULT_PROBE_TIMEOUT_MS = 10000

/**
 * Resolves a host name to a single address
 */
export type LookupFn = (hostname: string) => Promise<string>

export interface ProbeOptions {
  /** Applies to every phase unless a phase-specific timeout is given */
  timeoutMs?: number
  lookupTimeoutMs?: number
  connectTimeoutMs?: number
  handshakeTimeoutMs?: number
  lookup?: LookupFn
  signal?: AbortSignal
  /** Trust anchors used instead of the bundled root store */
  ca?: string | Buffer | Array<string | Buffer>
}

export type Probe = (target: CheckTarget, signal: AbortSignal) => Promise<ProbeResult>

/**
 * Subset of the leaf certificate fields the probe reads
 */
export interface LeafCertificateFields {
  valid_from?: string
  valid_to?: string
  subject?: { CN?: string | string[] }
  subjectaltname?: string
}

// the one verification failure that still yields facts, so the expiry can be reported
const EXPIRED_CERTIFICATE = 'CERT_HAS_EXPIRED'
const CONNECTION_LOST_CODES = new Set(['ECONNRESET', 'EPIPE'])

interface PhaseTimeouts {
  lookup: number
  connect: number
  handshake: number
}

const defaultLookup: LookupFn = async (hostname) => {
  const { address } = await dns.promises.lookup(hostname)
  return address
}

/**
 * Perform a TLS handshake with a target and report the leaf certificate.
 *
 * Anything that fails before the TCP connection is up is a network error, and so is
 * a connection reset or closed by the peer before the handshake completes.
 * Protocol mismatches, handshake timeouts and certificates failing verification are
 * handshake errors. A leaf whose only fault is being past its validity still yields
 * facts (host name checked, chain trusted) so the expiry is reported as such.
 * No application data is exchanged and nothing is retried.
 */
export async function probeCertificate(
  target: CheckTarget,
  logger: Logger,
  options: ProbeOptions = {}
): Promise<ProbeResult> {
  const base = options.timeoutMs ?? DEFAULT_PROBE_TIMEOUT_MS
  const timeouts: PhaseTimeouts = {
    lookup: options.lookupTimeoutMs ?? base,
    connect: options.connectTimeoutMs ?? base,
    handshake: options.handshakeTimeoutMs ?? base,
  }
  const { signal } = options

  if (signal?.aborted) {
    return { ok: false, failure: networkError('timeout') }
  }

  let address = target.domain
  if (net.isIP(target.domain) === 0) {
    const resolved = await resolveAddress(
      target.domain,
      options.lookup ?? defaultLookup,
      timeouts.lookup,
      signal
    )
    if (!resolved.ok) {
      logger.debug(`${target.domain}: ${resolved.failure.detail}`)
      return resolved
    }
    address = resolved.address
  }

  logger.debug(`TLS probe ${target.domain}:${target.port} via ${address}`)
  const result = await connectTls(target, address, timeouts, options)
  if (!result.ok) {
    logger.debug(`TLS probe ${target.domain}:${target.port} failed: ${result.failure.detail}`)
  }
  return result
}

function resolveAddress(
  hostname: string,
  lookup: LookupFn,
  timeoutMs: number,
  signal?: AbortSignal
): Promise<{ ok: true; address: string } | { ok: false; failure: ProbeFailure }> {
  return new Promise((resolve) => {
    let settled = false

    const finish = (
      result: { ok: true; address: string } | { ok: false; failure: ProbeFailure }
    ): void => {
      if (settled) return
      settled = true
      clearTimeout(timer)
      signal?.removeEventListener('abort', onAbort)
      resolve(result)
    }

    const onAbort = (): void => finish({ ok: false, failure: networkError('timeout') })
    const timer = setTimeout(() => {
      finish({ ok: false, failure: networkError(`name resolution timeout after ${timeoutMs}ms`) })
    }, timeoutMs)
    signal?.addEventListener('abort', onAbort)

    lookup(hostname).then(
      (address) => finish({ ok: true, address }),
      (err: unknown) => finish({
        ok: false,
        failure: networkError(`name resolution failed: ${errorMessage(err)}`),
      })
    )
  })
}

function connectTls(
  target: CheckTarget,
  address: string,
  timeouts: PhaseTimeouts,
  { signal, ca }: ProbeOptions
): Promise<ProbeResult> {
  return new Promise((resolve) => {
    let connected = false
    let settled = false

    // verification outcome is read on secureConnect instead of failing the handshake
    const options: tls.ConnectionOptions = {
      host: address,
      port: target.port,
      rejectUnauthorized: false,
    }
    // SNI may not carry an IP literal; hostname verification falls back to host
    if (net.isIP(target.domain) === 0) {
      options.servername = target.domain
    }
    if (ca !== undefined) {
      options.ca = ca
    }

    const socket = tls.connect(options)

    const finish = (result: ProbeResult): void => {
      if (settled) return
      settled = true
      clearTimeout(timer)
      signal?.removeEventListener('abort', onAbort)
      socket.destroy()
      resolve(result)
    }

    const fail = (failure: ProbeFailure): void => finish({ ok: false, failure })

    const onAbort = (): void => fail(networkError('timeout'))

    let timer = setTimeout(() => {
      fail(networkError(`connect timeout after ${timeouts.connect}ms`))
    }, timeouts.connect)
    signal?.addEventListener('abort', onAbort)

    socket.once('connect', () => {
      connected = true
      clearTimeout(timer)
      timer = setTimeout(() => {
        fail(handshakeError(`handshake timeout after ${timeouts.handshake}ms`))
      }, timeouts.handshake)
    })

    socket.once('secureConnect', () => {
      const cert = socket.getPeerCertificate()
      const rejection = verificationFailure(socket, cert, target.domain)
      if (rejection) {
        fail(handshakeError(rejection))
        return
      }

      const facts = factsFromPeerCertificate(cert, true)
      if (!facts) {
        fail(handshakeError('peer presented no usable certificate'))
        return
      }
      finish({ ok: true, facts })
    })

    socket.on('error', (err) => {
      const lost = !connected || CONNECTION_LOST_CODES.has(errorCode(err))
      fail(lost ? networkError(err.message) : handshakeError(err.message))
    })

    socket.once('close', () => fail(networkError('connection closed')))
  })
}

/**
 * Why the peer's certificate is unacceptable, or null when it may be reported on.
 * An expired leaf is accepted once it matches the host, because Node stops at the
 * first verification error and never compares it against the host name.
 */
function verificationFailure(
  socket: tls.TLSSocket,
  cert: tls.PeerCertificate,
  hostname: string
): string | null {
  if (socket.authorized) return null

  const code = errorCode(socket.authorizationError)
  if (code !== EXPIRED_CERTIFICATE) {
    return `certificate verification failed: ${code}`
  }

  const identityError = tls.checkServerIdentity(hostname, cert)
  return identityError ? identityError.message : null
}

/**
 * Extract certificate facts from the fields Node exposes for the peer's leaf certificate.
 * Returns null when the peer sent no certificate or its validity dates are unreadable.
 */
export function factsFromPeerCertificate(
  cert: LeafCertificateFields,
  authorized: boolean
): CertificateFacts | null {
  if (!cert.valid_from || !cert.valid_to) {
    return null
  }

  const notBefore = new Date(cert.valid_from)
  const notAfter = new Date(cert.valid_to)
  if (isNaN(notBefore.getTime()) || isNaN(notAfter.getTime())) {
    return null
  }

  return {
    notBefore,
    notAfter,
    subjectIdentity: subjectIdentity(cert),
    chainTrusted: authorized,
  }
}

function subjectIdentity(cert: LeafCertificateFields): string {
  const cn = cert.subject?.CN
  const commonName = Array.isArray(cn) ? cn[0] : cn
  if (commonName) return commonName

  const firstDnsName = (cert.subjectaltname ?? '')
    .split(',')
    .map(entry => entry.trim())
    .find(entry => entry.startsWith('DNS:'))

  return firstDnsName ? firstDnsName.slice(4) : ''
}

// Node reports verification failures as a bare code string, socket errors as errors with a code
function errorCode(err: unknown): string {
  if (typeof err === 'string') return err
  if (err instanceof Error) {
    return 'code' in err && typeof err.code === 'string' ? err.code : err.message
  }
  return String(err)
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
