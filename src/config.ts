import { ConfigError } from './checker/errors.js'
import { DEFAULT_CONCURRENCY, DEFAULT_RUN_DEADLINE_MS, MAX_NETWORK_RETRIES } from './checker/coordinator.js'
import { DEFAULT_PROBE_TIMEOUT_MS } from './checker/probe.js'
import { isLogLevel, type LogLevel } from './utils/logger.js'

export interface Config {
  targetsLocation?: string
  expiryThresholdDays: number
  checkConcurrency: number
  probeTimeoutMs: number
  runDeadlineMs: number
  networkRetries: number
  reportWebhookUrl?: string
  port: number
  logLevel: LogLevel
  logDir: string
}

type Env = Record<string, string | undefined>

/**
 * Read settings from environment variables
 */
export function loadConfig(env: Env = process.env): Config {
  const logLevel = env.LOG_LEVEL?.trim() || 'info'
  if (!isLogLevel(logLevel)) {
    throw new ConfigError(`LOG_LEVEL must be one of debug, info, warn, error (got "${logLevel}")`)
  }

  return {
    targetsLocation: optionalString(env.TARGETS_LOCATION),
    expiryThresholdDays: readInteger(env, 'EXPIRY_THRESHOLD_DAYS', 14, 0),
    checkConcurrency: readInteger(env, 'CHECK_CONCURRENCY', DEFAULT_CONCURRENCY, 1),
    probeTimeoutMs: readInteger(env, 'PROBE_TIMEOUT_MS', DEFAULT_PROBE_TIMEOUT_MS, 1),
    runDeadlineMs: readInteger(env, 'RUN_DEADLINE_MS', DEFAULT_RUN_DEADLINE_MS, 1),
    networkRetries: readInteger(env, 'NETWORK_RETRIES', 0, 0, MAX_NETWORK_RETRIES),
    reportWebhookUrl: optionalString(env.REPORT_WEBHOOK_URL),
    port: readInteger(env, 'PORT', 8080, 1, 65535),
    logLevel,
    logDir: optionalString(env.LOG_DIR) ?? './logs',
  }
}

function optionalString(value: string | undefined): string | undefined {
  const trimmed = value?.trim()
  return trimmed ? trimmed : undefined
}

function readInteger(
  env: Env,
  name: string,
  fallback: number,
  min: number,
  max: number = Number.MAX_SAFE_INTEGER
): number {
  const raw = optionalString(env[name])
  if (raw === undefined) return fallback

  const value = /^\d+$/.test(raw) ? parseInt(raw, 10) : NaN
  if (isNaN(value) || value < min || value > max) {
    throw new ConfigError(`${name} must be an integer between ${min} and ${max} (got "${raw}")`)
  }
  return value
}
