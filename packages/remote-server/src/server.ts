import type { Server as HttpServer } from 'node:http'
import { z } from 'zod'
import express from 'express'
import helmet from 'helmet'
import swaggerUi from 'swagger-ui-express'
import { extendZodWithOpenApi } from '@asteasolutions/zod-to-openapi'
import cors from 'cors'

import { Orchestrator } from '@threadgraph/engine'
import { makeLogger } from '@threadgraph/logger'

import { errorHandler } from './middlewares/index.js'
import { WorkflowRouter } from './routers/index.js'
import { openapiDoc } from './swagger/index.js'

extendZodWithOpenApi(z)

export interface ServerOptions {
  /** CORS origins; every origin is allowed when omitted. */
  allowedOrigins?: string[]
  bodyLimit?: string
}

export class Server {
  private readonly app = express()
  private readonly logger = makeLogger('RemoteServer')
  private httpServer?: HttpServer

  constructor(
    private orchestrator: Orchestrator,
    private domainWithPort: string,
    private readonly options: ServerOptions = {},
  ) {
    this.configureMiddleware()
    this.configureRouters()
  }

  /** The express app, for mounting or in-process testing. */
  public get handler(): express.Express {
    return this.app
  }

  public async start(): Promise<void> {
    // this.domainWithPort can be either:
    // - "localhost:1101"
    // - "0.0.0.0:1101"
    // - or a full URL like "http://localhost:1101"
    let host: string
    let port: number

    if (this.domainWithPort.includes('://')) {
      const url = new URL(this.domainWithPort)
      host = url.hostname
      port = Number(url.port || 3000)
    } else {
      const [maybeHost, maybePort] = this.domainWithPort.split(':')
      host = maybeHost || '0.0.0.0'
      port = maybePort ? Number(maybePort) : 3000
    }

    if (!Number.isFinite(port) || port <= 0 || port >= 65536) {
      throw new Error(`Invalid port in domainWithPort: "${this.domainWithPort}" → ${port}`)
    }

    await new Promise<void>((resolve, reject) => {
      const httpServer = this.app.listen(port, host, () => {
        this.logger.info(`API on ${host}:${port}  |  Docs: http://${host}:${port}/docs`)
        resolve()
      })

      httpServer.on('error', (err) => {
        this.logger.error(`Failed to start server: ${err.message}`)
        reject(err)
      })
      this.httpServer = httpServer
    })
  }

  public async stop(): Promise<void> {
    const httpServer = this.httpServer
    if (!httpServer) return
    await new Promise<void>((resolve, reject) => {
      httpServer.close((err) => (err ? reject(err) : resolve()))
    })
    this.httpServer = undefined
    this.logger.info('server stopped')
  }

  private configureMiddleware(): void {
    this.app.use(cors({ origin: this.options.allowedOrigins ?? true }))
    this.app.use(express.json({ limit: this.options.bodyLimit ?? '500kb' }))
    this.app.use(helmet())

    this.app.use('/docs', swaggerUi.serve, swaggerUi.setup(openapiDoc))
  }

  private configureRouters(): void {
    this.app.get('/health', (_req, res) => {
      res.json({ status: 'ok' })
    })

    this.app.use(WorkflowRouter.create(this.orchestrator, this.logger))

    this.app.use((req, res) => {
      res.status(404).json({
        success: false,
        error: { code: 'NOT_FOUND', message: `no route for ${req.method} ${req.path}` },
      })
    })
    this.app.use(errorHandler(this.logger))
  }
}
