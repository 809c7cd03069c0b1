import express, { type Request, type Response } from 'express'
import { createServer } from 'http'
import { ConfigError, ReportFormatError, SourceError } from '../checker/errors.js'
import { aggregateStatuses, parseDomainStatuses, toWireReport } from '../checker/report.js'
import type { CheckResponse } from '../checker/types.js'
import { runInvocation, type CheckRequest, type InvocationDeps } from '../service.js'
import type { Logger } from '../utils/logger.js'
import { VERSION } from '../utils/version.js'

export interface LastRunInfo {
  req_id: string
  checked_at: string
  targets: number
  valid: boolean
}

export interface ServerState {
  version: string
  startedAt: string
  running: number
  lastRun: LastRunInfo | null
}

/**
 * HTTP front for invocations: each POST /api/check runs one check synchronously
 */
export class CheckServer {
  private app: express.Application
  private httpServer: ReturnType<typeof createServer>
  private logger: Logger
  private deps: InvocationDeps
  private state: ServerState
  private port: number

  constructor(port: number, deps: InvocationDeps) {
    this.port = port
    this.deps = deps
    this.logger = deps.logger
    this.app = express()
    this.httpServer = createServer(this.app)
    this.state = {
      version: VERSION,
      startedAt: new Date().toISOString(),
      running: 0,
      lastRun: null,
    }

    this.setupRoutes()
  }

  private setupRoutes(): void {
    this.app.use(express.json({ limit: '1mb' }))

    this.app.get('/health', (_req, res) => {
      res.json({
        ok: true,
        version: VERSION,
        uptime_seconds: Math.floor(process.uptime()),
      })
    })

    this.app.get('/api/status', (_req, res) => {
      res.json(this.state)
    })

    this.app.post('/api/check', (req, res) => {
      void this.handleCheck(req, res)
    })

    // Reporting stage: fold statuses produced elsewhere into a report
    this.app.post('/api/report', (req: Request, res: Response) => {
      try {
        const body: unknown = req.body
        const statuses = parseDomainStatuses(
          typeof body === 'object' && body !== null && 'statuses' in body ? body.statuses : undefined
        )
        res.json({ report: toWireReport(aggregateStatuses(statuses)) })
      } catch (err) {
        if (err instanceof ReportFormatError) {
          res.status(400).json({ error: err.message })
          return
        }
        this.sendInternalError(res, err)
      }
    })
  }

  private async handleCheck(req: Request, res: Response): Promise<void> {
    let request: CheckRequest
    try {
      request = parseCheckRequest(req.body)
    } catch (err) {
      res.status(400).json({ error: err instanceof Error ? err.message : String(err) })
      return
    }

    this.state.running++
    try {
      const response = await runInvocation(request, this.deps)
      this.recordRun(response)
      res.json(response)
    } catch (err) {
      if (err instanceof ConfigError) {
        this.logger.warn(`Check rejected: ${err.message}`)
        res.status(400).json({ error: err.message })
      } else if (err instanceof SourceError) {
        this.logger.error(err.message)
        res.status(502).json({ error: err.message })
      } else {
        this.sendInternalError(res, err)
      }
    } finally {
      this.state.running--
    }
  }

  private recordRun(response: CheckResponse): void {
    this.state.lastRun = {
      req_id: response.req_id,
      checked_at: response.checked_at,
      targets: response.statuses.length,
      valid: 'Valid' in response.report,
    }
  }

  private sendInternalError(res: Response, err: unknown): void {
    this.logger.error(err instanceof Error ? err.stack ?? err.message : String(err))
    res.status(500).json({ error: 'internal error' })
  }

  getApp(): express.Application {
    return this.app
  }

  getState(): ServerState {
    return this.state
  }

  /**
   * Start listening; resolves with the bound port (useful when started on port 0)
   */
  async start(): Promise<number> {
    return new Promise((resolve, reject) => {
      this.httpServer.once('error', reject)
      this.httpServer.listen(this.port, () => {
        const address = this.httpServer.address()
        const port = typeof address === 'object' && address !== null ? address.port : this.port
        this.logger.info(`Check server listening on http://localhost:${port}`)
        resolve(port)
      })
    })
  }

  async stop(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.httpServer.close((err) => {
        if (err) reject(err)
        else resolve()
      })
    })
  }
}

function parseCheckRequest(body: unknown): CheckRequest {
  if (body === undefined || body === null) return {}
  if (typeof body !== 'object' || Array.isArray(body)) {
    throw new ConfigError('request body must be a JSON object')
  }
  if (!('config_location' in body) || body.config_location === undefined) return {}
  if (typeof body.config_location !== 'string') {
    throw new ConfigError('config_location must be a string')
  }
  return { config_location: body.config_location }
}
