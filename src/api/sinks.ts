import axios, { type AxiosInstance } from 'axios'
import type { CheckResponse } from '../checker/types.js'
import type { Logger } from '../utils/logger.js'
import { USER_AGENT } from '../utils/version.js'

/**
 * Receives the finished response of an invocation
 */
export interface ReportSink {
  readonly name: string
  deliver(response: CheckResponse): Promise<void>
}

/**
 * Writes the wire report as one JSON line
 */
export class StreamReportSink implements ReportSink {
  readonly name = 'stream'
  private stream: NodeJS.WritableStream

  constructor(stream: NodeJS.WritableStream = process.stdout) {
    this.stream = stream
  }

  deliver(response: CheckResponse): Promise<void> {
    const line = `${JSON.stringify(response.report)}\n`
    return new Promise((resolve, reject) => {
      this.stream.write(line, (err) => {
        if (err) reject(err)
        else resolve()
      })
    })
  }
}

/**
 * Posts the report to an alerting webhook
 */
export class WebhookReportSink implements ReportSink {
  readonly name = 'webhook'
  private client: AxiosInstance
  private url: string
  private logger: Logger

  constructor(url: string, logger: Logger, timeoutMs = 30000) {
    this.url = url
    this.logger = logger
    this.client = axios.create({
      timeout: timeoutMs,
      headers: {
        'Content-Type': 'application/json',
        'User-Agent': USER_AGENT,
      },
    })
  }

  async deliver(response: CheckResponse): Promise<void> {
    this.logger.debug(`Posting report ${response.req_id} to webhook`)
    await this.client.post(this.url, {
      req_id: response.req_id,
      report: response.report,
    })
  }
}
