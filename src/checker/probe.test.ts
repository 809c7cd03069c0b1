import { readFileSync } from 'fs'
import * as net from 'net'
import * as tls from 'tls'
import { afterEach, describe, expect, it, vi } from 'vitest'
import { createSilentLogger } from '../utils/logger.js'
import { runChecks } from './coordinator.js'
import { factsFromPeerCertificate, probeCertificate, type LookupFn, type Probe } from './probe.js'
import { aggregateReport, toWireReport } from './report.js'
import { parseTargets } from './targets.js'
import { DAY_MS, type CheckTarget, type ProbeResult } from './types.js'

const logger = createSilentLogger()

function fixture(name: string): Buffer {
  return readFileSync(new URL(`./fixtures/${name}`, import.meta.url))
}

const testCa = fixture('ca.pem')
const toLoopback: LookupFn = async () => '127.0.0.1'

const servers: net.Server[] = []
const sockets = new Set<net.Socket>()

function listen(onConnection: (socket: net.Socket) => void): Promise<number> {
  const server = net.createServer((socket) => {
    sockets.add(socket)
    socket.on('error', () => undefined)
    socket.on('close', () => sockets.delete(socket))
    onConnection(socket)
  })
  servers.push(server)
  return new Promise((resolve) => {
    server.listen(0, '127.0.0.1', () => {
      const address = server.address()
      resolve(typeof address === 'object' && address !== null ? address.port : 0)
    })
  })
}

// serves the named fixture certificate to every client, whatever name it asks for
function serveCertificate(name: string): Promise<number> {
  const server = tls.createServer({
    key: fixture(`${name}.key.pem`),
    cert: fixture(`${name}.pem`),
  })
  server.on('connection', (socket: net.Socket) => {
    sockets.add(socket)
    socket.on('close', () => sockets.delete(socket))
  })
  server.on('tlsClientError', () => undefined)
  servers.push(server)
  return new Promise((resolve) => {
    server.listen(0, '127.0.0.1', () => {
      const address = server.address()
      resolve(typeof address === 'object' && address !== null ? address.port : 0)
    })
  })
}

async function unusedPort(): Promise<number> {
  const server = net.createServer()
  const port = await new Promise<number>((resolve) => {
    server.listen(0, '127.0.0.1', () => {
      const address = server.address()
      resolve(typeof address === 'object' && address !== null ? address.port : 0)
    })
  })
  await new Promise<void>(resolve => server.close(() => resolve()))
  return port
}

function target(domain: string, port: number): CheckTarget {
  return { domain, port, expiryThresholdMs: 14 * DAY_MS }
}

function failureOf(result: ProbeResult) {
  if (result.ok) throw new Error('expected the probe to fail')
  return result.failure
}

afterEach(async () => {
  for (const socket of sockets) socket.destroy()
  sockets.clear()
  await Promise.all(servers.splice(0).map(server => new Promise<void>(resolve => server.close(() => resolve()))))
})

describe('probeCertificate', () => {
  it('reports a refused connection as a network error', async () => {
    const port = await unusedPort()
    const failure = failureOf(await probeCertificate(target('127.0.0.1', port), logger, { timeoutMs: 2000 }))

    expect(failure.kind).toBe('network_error')
    expect(failure.detail).toContain('ECONNREFUSED')
  })

  it('reports a peer that does not speak TLS as a handshake error', async () => {
    const port = await listen((socket) => {
      socket.end('HTTP/1.1 400 Bad Request\r\nConnection: close\r\n\r\n')
    })

    const failure = failureOf(await probeCertificate(target('127.0.0.1', port), logger, { timeoutMs: 2000 }))
    expect(failure.kind).toBe('handshake_error')
  })

  it('reports a peer that drops the connection before answering as a network error', async () => {
    const port = await listen((socket) => socket.destroy())

    const failure = failureOf(await probeCertificate(target('127.0.0.1', port), logger, { timeoutMs: 2000 }))
    expect(failure.kind).toBe('network_error')
  })

  it('reports a peer that accepts but never answers as a handshake timeout', async () => {
    const port = await listen(() => undefined)

    const result = await probeCertificate(target('127.0.0.1', port), logger, {
      connectTimeoutMs: 2000,
      handshakeTimeoutMs: 100,
    })
    expect(failureOf(result)).toEqual({ kind: 'handshake_error', detail: 'handshake timeout after 100ms' })
  })

  it('reports name resolution failures as network errors', async () => {
    const lookup: LookupFn = () => Promise.reject(new Error('getaddrinfo ENOTFOUND nowhere.example'))

    const result = await probeCertificate(target('nowhere.example', 443), logger, { lookup })
    expect(failureOf(result)).toEqual({
      kind: 'network_error',
      detail: 'name resolution failed: getaddrinfo ENOTFOUND nowhere.example',
    })
  })

  it('times out a slow name lookup', async () => {
    const lookup: LookupFn = () => new Promise<string>(() => undefined)

    const result = await probeCertificate(target('slow-dns.example', 443), logger, { lookup, lookupTimeoutMs: 50 })
    expect(failureOf(result)).toEqual({ kind: 'network_error', detail: 'name resolution timeout after 50ms' })
  })

  it('connects to the resolved address', async () => {
    const port = await unusedPort()
    const lookup = vi.fn<[string], Promise<string>>().mockResolvedValue('127.0.0.1')

    const failure = failureOf(await probeCertificate(target('app.example', port), logger, { lookup, timeoutMs: 2000 }))
    expect(lookup).toHaveBeenCalledWith('app.example')
    expect(failure.kind).toBe('network_error')
    expect(failure.detail).toContain(`127.0.0.1:${port}`)
  })

  it('gives up immediately when already aborted', async () => {
    const lookup = vi.fn<[string], Promise<string>>()
    const controller = new AbortController()
    controller.abort()

    const result = await probeCertificate(target('app.example', 443), logger, { lookup, signal: controller.signal })
    expect(failureOf(result)).toEqual({ kind: 'network_error', detail: 'timeout' })
    expect(lookup).not.toHaveBeenCalled()
  })

  it('stops a pending handshake when aborted', async () => {
    const port = await listen(() => undefined)
    const controller = new AbortController()
    setTimeout(() => controller.abort(), 50)

    const result = await probeCertificate(target('127.0.0.1', port), logger, {
      timeoutMs: 5000,
      signal: controller.signal,
    })
    expect(failureOf(result)).toEqual({ kind: 'network_error', detail: 'timeout' })
  })
})

describe('probeCertificate over TLS', () => {
  const probeServed = (domain: string, port: number) =>
    probeCertificate(target(domain, port), logger, { lookup: toLoopback, ca: testCa, timeoutMs: 2000 })

  it('reports the facts of a trusted certificate', async () => {
    const port = await serveCertificate('good')

    expect(await probeServed('good.example', port)).toEqual({
      ok: true,
      facts: {
        notBefore: new Date('2025-01-01T00:00:00.000Z'),
        notAfter: new Date('2044-01-01T00:00:00.000Z'),
        subjectIdentity: 'good.example',
        chainTrusted: true,
      },
    })
  })

  it('reports the facts of an expired certificate from a trusted issuer', async () => {
    const port = await serveCertificate('expired')

    expect(await probeServed('expired.example', port)).toEqual({
      ok: true,
      facts: {
        notBefore: new Date('2020-01-01T00:00:00.000Z'),
        notAfter: new Date('2021-01-01T00:00:00.000Z'),
        subjectIdentity: 'expired.example',
        chainTrusted: true,
      },
    })
  })

  it('reports a self-signed certificate as a handshake error', async () => {
    const port = await serveCertificate('self-signed')

    const failure = failureOf(await probeServed('good.example', port))
    expect(failure.kind).toBe('handshake_error')
    expect(failure.detail).toContain('SELF_SIGNED')
  })

  it('reports a certificate issued for another host as a handshake error', async () => {
    const port = await serveCertificate('wrong-host')

    expect(failureOf(await probeServed('good.example', port))).toEqual({
      kind: 'handshake_error',
      detail: 'certificate verification failed: ERR_TLS_CERT_ALTNAME_INVALID',
    })
  })

  it('still checks the host name of an expired certificate', async () => {
    const port = await serveCertificate('expired')

    const failure = failureOf(await probeServed('good.example', port))
    expect(failure.kind).toBe('handshake_error')
    expect(failure.detail).toContain("is not in the cert's altnames")
  })

  it('reports an expired certificate as expired in the run report', async () => {
    const goodPort = await serveCertificate('good')
    const expiredPort = await serveCertificate('expired')
    const probe: Probe = (checkTarget, signal) =>
      probeCertificate(checkTarget, logger, { lookup: toLoopback, ca: testCa, timeoutMs: 2000, signal })

    const targets = parseTargets(`good.example:${goodPort}\nexpired.example:${expiredPort}\n`)
    const outcomes = await runChecks(targets, { probe, logger, now: new Date('2026-03-01T00:00:00.000Z') })

    expect(toWireReport(aggregateReport(outcomes))).toEqual({
      Invalid: 'Found 1 issues.\nexpired.example: expired (not_after=2021-01-01T00:00:00.000Z)',
    })
  })
})

describe('factsFromPeerCertificate', () => {
  it('reads validity dates and the subject common name', () => {
    const facts = factsFromPeerCertificate(
      {
        valid_from: 'Jan  1 00:00:00 2026 GMT',
        valid_to: 'Apr  1 00:00:00 2026 GMT',
        subject: { CN: 'www.example.com' },
        subjectaltname: 'DNS:www.example.com, DNS:example.com',
      },
      true
    )

    expect(facts).toEqual({
      notBefore: new Date('2026-01-01T00:00:00.000Z'),
      notAfter: new Date('2026-04-01T00:00:00.000Z'),
      subjectIdentity: 'www.example.com',
      chainTrusted: true,
    })
  })

  it('falls back to the first DNS name when there is no common name', () => {
    const facts = factsFromPeerCertificate(
      {
        valid_from: 'Jan  1 00:00:00 2026 GMT',
        valid_to: 'Apr  1 00:00:00 2026 GMT',
        subject: {},
        subjectaltname: 'IP Address:192.0.2.1, DNS:api.example.com',
      },
      false
    )

    expect(facts?.subjectIdentity).toBe('api.example.com')
    expect(facts?.chainTrusted).toBe(false)
  })

  it('returns null when the peer sent no certificate', () => {
    expect(factsFromPeerCertificate({}, true)).toBeNull()
  })

  it('returns null for unreadable dates', () => {
    expect(factsFromPeerCertificate({ valid_from: 'soon', valid_to: 'later' }, true)).toBeNull()
  })
})
