/**
 * Malformed input: a target line, a setting or a location that cannot be used.
 * Aborts the invocation before any check runs.
 */
export class ConfigError extends Error {
  readonly line?: number

  constructor(message: string, line?: number) {
    super(line === undefined ? message : `line ${line}: ${message}`)
    this.name = 'ConfigError'
    this.line = line
  }
}

/**
 * The target list could not be read from its source
 */
export class SourceError extends Error {
  readonly location: string

  constructor(location: string, message: string) {
    super(`Failed to read ${location}: ${message}`)
    this.name = 'SourceError'
    this.location = location
  }
}

export class ReportFormatError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ReportFormatError'
  }
}
