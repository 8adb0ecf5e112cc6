import pino from 'pino'
import { env } from '../config/env'

function options(): pino.LoggerOptions {
    if (env.NODE_ENV === 'production') return { level: env.LOG_LEVEL ?? 'info' }
    if (env.NODE_ENV === 'test') return { level: env.LOG_LEVEL ?? 'silent' }
    return {
        level: env.LOG_LEVEL ?? 'debug',
        transport: {
            target: 'pino-pretty',
            options: { colorize: true, translateTime: 'SYS:standard' },
        },
    }
}

export const logger = pino(options())
