import { Request, Response, NextFunction } from 'express'
import multer from 'multer'
import { ZodError } from 'zod'
import { logger } from '../utils/logger'

function statusOf(err: unknown): number {
    if (err instanceof multer.MulterError || err instanceof ZodError) return 400
    if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number') {
        return err.status
    }
    return 500
}

function messageOf(err: unknown): string {
    if (err instanceof ZodError) {
        return err.issues.map((i) => `${i.path.join('.') || 'body'}: ${i.message}`).join('; ')
    }
    if (err instanceof Error && err.message) return err.message
    return 'Internal Server Error'
}

export function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction) {
    const status = statusOf(err)
    const message = messageOf(err)
    if (status >= 500) {
        logger.error({ err }, 'Unhandled error')
    } else {
        logger.warn({ err }, 'Handled error')
    }
    res.status(status).json({ error: message })
}
