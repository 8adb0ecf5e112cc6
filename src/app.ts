import express from 'express'
import cors from 'cors'
import helmet from 'helmet'
import compression from 'compression'
import pinoHttp from 'pino-http'
import { errorHandler } from './middlewares/error'
import { logger } from './utils/logger'
import { env } from './config/env'
import type { ParseDeps } from './types/parse'
import healthRouter from './routes/health.routes'
import { createParseRouter } from './routes/parse.routes'

export function createApp(deps: ParseDeps, allowedOrigins: string[] = env.ALLOWED_ORIGINS) {
    const app = express()

    app.disable('x-powered-by')

    app.use(
        cors({
            origin: (origin, callback) => {
                // Requests without an Origin header (curl, server-to-server) are always allowed
                if (!origin || allowedOrigins.includes('*')) return callback(null, true)
                callback(null, allowedOrigins.includes(origin) ? origin : false)
            },
        })
    )
    app.use(helmet())
    app.use(compression())

    app.use(express.json({ limit: '2mb' }))
    app.use(express.urlencoded({ extended: true }))

    app.use(pinoHttp({ logger }))

    app.use('/health', healthRouter)
    app.use(createParseRouter(deps))

    app.use((_req: express.Request, res: express.Response) => {
        res.status(404).json({ error: 'Not Found' })
    })

    app.use(errorHandler)

    return app
}
