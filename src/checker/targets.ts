import { ConfigError } from './errors.js'
import {
  DAY_MS,
  DEFAULT_EXPIRY_THRESHOLD_MS,
  DEFAULT_PORT,
  type CheckTarget,
} from './types.js'

export interface TargetDefaults {
  port?: number
  expiryThresholdMs?: number
}

const COMMENT_MARKER = '#'
const HOUR_MS = 60 * 60 * 1000

const LABEL_PATTERN = /^[a-z0-9](?:[a-z0-9-]{0,61}[a-z0-9])?$/
const IPV4_PATTERN = /^\d{1,3}(\.\d{1,3}){3}$/
const THRESHOLD_PATTERN = /^(\d+)([dh])$/

/**
 * Parse a newline-delimited target list.
 *
 * Each line is `<host>[:<port>] [<threshold>]`, where threshold is `<n>d` or `<n>h`.
 * Blank lines and `#` comments are skipped.
 */
export function parseTargets(text: string, defaults: TargetDefaults = {}): CheckTarget[] {
  const port = defaults.port ?? DEFAULT_PORT
  const expiryThresholdMs = defaults.expiryThresholdMs ?? DEFAULT_EXPIRY_THRESHOLD_MS
  const targets: CheckTarget[] = []

  const lines = text.split(/\r\n|\r|\n/)
  for (let i = 0; i < lines.length; i++) {
    const content = stripComment(lines[i]).trim()
    if (!content) continue

    targets.push(parseLine(content, i + 1, { port, expiryThresholdMs }))
  }

  return targets
}

function stripComment(line: string): string {
  const index = line.indexOf(COMMENT_MARKER)
  return index >= 0 ? line.slice(0, index) : line
}

function parseLine(
  content: string,
  lineNumber: number,
  defaults: Required<TargetDefaults>
): CheckTarget {
  const tokens = content.split(/\s+/)
  if (tokens.length > 2) {
    throw new ConfigError(`unexpected token "${tokens[2]}" in "${content}"`, lineNumber)
  }

  const [hostPart, thresholdPart] = tokens
  const { domain, port } = parseHostPort(hostPart, lineNumber, defaults.port)
  const expiryThresholdMs = thresholdPart === undefined
    ? defaults.expiryThresholdMs
    : parseThreshold(thresholdPart, lineNumber)

  return Object.freeze({ domain, port, expiryThresholdMs })
}

function parseHostPort(
  value: string,
  lineNumber: number,
  defaultPort: number
): { domain: string; port: number } {
  if (value.includes('/')) {
    throw new ConfigError(`expected a host name, got "${value}"`, lineNumber)
  }

  const colonIndex = value.lastIndexOf(':')
  const hostText = colonIndex >= 0 ? value.slice(0, colonIndex) : value
  const port = colonIndex >= 0
    ? parsePort(value.slice(colonIndex + 1), lineNumber)
    : defaultPort

  const domain = hostText.toLowerCase().replace(/\.$/, '')
  if (!isValidHost(domain)) {
    throw new ConfigError(`invalid domain "${hostText}"`, lineNumber)
  }

  return { domain, port }
}

function parsePort(value: string, lineNumber: number): number {
  const port = /^\d+$/.test(value) ? parseInt(value, 10) : NaN
  if (isNaN(port) || port < 1 || port > 65535) {
    throw new ConfigError(`invalid port "${value}"`, lineNumber)
  }
  return port
}

function parseThreshold(value: string, lineNumber: number): number {
  const match = THRESHOLD_PATTERN.exec(value.toLowerCase())
  if (!match) {
    throw new ConfigError(`invalid threshold "${value}" (expected e.g. 14d or 36h)`, lineNumber)
  }

  const amount = parseInt(match[1], 10)
  return match[2] === 'd' ? amount * DAY_MS : amount * HOUR_MS
}

/**
 * Accepts DNS host names and IPv4 literals
 */
export function isValidHost(host: string): boolean {
  if (IPV4_PATTERN.test(host)) {
    return host.split('.').every(octet => parseInt(octet, 10) <= 255)
  }

  if (host.length === 0 || host.length > 253) return false
  const labels = host.split('.')
  if (labels.length < 2 && host !== 'localhost') return false
  // an all-numeric last label would be a malformed address, not a name
  if (/^\d+$/.test(labels[labels.length - 1])) return false

  return labels.every(label => LABEL_PATTERN.test(label))
}
