import axios, { AxiosError, type AxiosInstance } from 'axios'
import { promises as fsPromises } from 'fs'
import { fileURLToPath } from 'url'
import { ConfigError, SourceError } from '../checker/errors.js'
import type { Logger } from '../utils/logger.js'
import { USER_AGENT } from '../utils/version.js'

/**
 * Supplies the raw target list text
 */
export interface TextSource {
  describe(): string
  read(): Promise<string>
}

export class FileTextSource implements TextSource {
  private filePath: string

  constructor(filePath: string) {
    this.filePath = filePath
  }

  describe(): string {
    return this.filePath
  }

  async read(): Promise<string> {
    try {
      return await fsPromises.readFile(this.filePath, 'utf-8')
    } catch (err) {
      throw new SourceError(this.filePath, err instanceof Error ? err.message : String(err))
    }
  }
}

/**
 * Fetches the target list over HTTP(S), e.g. from a presigned object-storage URL
 */
export class HttpTextSource implements TextSource {
  private client: AxiosInstance
  private url: string

  constructor(url: string, timeoutMs = 30000) {
    this.url = url
    this.client = axios.create({
      timeout: timeoutMs,
      headers: {
        'User-Agent': USER_AGENT,
        'Accept': 'text/plain, */*',
      },
    })
  }

  describe(): string {
    return this.url
  }

  async read(): Promise<string> {
    try {
      const response = await this.client.get<string>(this.url, { responseType: 'text' })
      return response.data
    } catch (err) {
      throw new SourceError(this.url, describeHttpError(err))
    }
  }
}

/**
 * Pick a source for a location: http(s) URL, file URL or local path
 */
export function createTextSource(location: string, logger: Logger): TextSource {
  const schemeMatch = /^([a-z][a-z0-9+.-]*):\/\//i.exec(location)
  const scheme = schemeMatch ? schemeMatch[1].toLowerCase() : null

  let source: TextSource
  if (scheme === null) {
    source = new FileTextSource(location)
  } else if (scheme === 'file') {
    source = new FileTextSource(fileURLToPath(location))
  } else if (scheme === 'http' || scheme === 'https') {
    source = new HttpTextSource(location)
  } else {
    throw new ConfigError(`unsupported target list location scheme "${scheme}://"`)
  }

  logger.debug(`Target list source: ${source.describe()}`)
  return source
}

function describeHttpError(err: unknown): string {
  if (err instanceof AxiosError) {
    if (err.response) {
      return `HTTP ${err.response.status}`
    }
    return err.message
  }
  return err instanceof Error ? err.message : String(err)
}
