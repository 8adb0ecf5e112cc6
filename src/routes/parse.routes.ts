import { Router } from 'express'
import multer from 'multer'
import type { ParseDeps } from '../types/parse'
import { createParseHandler } from '../controllers/parse.controller'

const DEFAULT_MAX_FILE_SIZE = 20 * 1024 * 1024

export function createParseRouter(deps: ParseDeps): Router {
    const router = Router()
    const upload = multer({
        storage: multer.memoryStorage(),
        limits: { fileSize: deps.maxFileSizeBytes ?? DEFAULT_MAX_FILE_SIZE },
    })

    router.post('/parse', upload.array('files'), createParseHandler(deps))

    return router
}
