/**
 * Centralized version information for Cert Sentry
 */

// Bump for each release
export const VERSION = '1.0.0'

export const PRODUCT_NAME = 'Cert Sentry'

export const USER_AGENT = `CertSentry/${VERSION}`
