import type { Request, Response, NextFunction, RequestHandler } from 'express'
import { access } from 'fs/promises'
import { z } from 'zod'
import type {
    FileDiagnostics,
    ParseDeps,
    PathParseResponse,
    SummaryOutcome,
    UploadParseResponse,
} from '../types/parse'
import { withUploadScope } from '../services/upload.service'
import { decodeUploadName, secureFilename } from '../utils/filename'
import { releaseMemory } from '../utils/memory'
import { logger } from '../utils/logger'

const bodySchema = z.object({ file_path: z.string().optional() }).passthrough()

async function exists(filePath: string): Promise<boolean> {
    try {
        await access(filePath)
        return true
    } catch {
        return false
    }
}

function uploadedFiles(req: Request): Express.Multer.File[] {
    const { files } = req
    if (Array.isArray(files)) return files
    return files?.files ?? []
}

function summaryFields(outcome: SummaryOutcome) {
    return {
        summary: outcome.summary,
        summaryStatus: outcome.status,
        ...(outcome.status === 'failed' ? { summaryError: outcome.error } : {}),
    }
}

export function createParseHandler(deps: ParseDeps): RequestHandler {
    async function fromPath(filePath: string, res: Response) {
        if (!(await exists(filePath))) {
            res.status(400).json({ error: `File not found: ${filePath}` })
            return
        }
        const extraction = await deps.extractor.extract(filePath)
        const outcome = await deps.summarizer.summarize(extraction.status === 'failed' ? '' : extraction.text)
        releaseMemory()

        const body: PathParseResponse = {
            message: 'Parsed (from path)',
            ...summaryFields(outcome),
            extractionStatus: extraction.status,
        }
        if (extraction.status === 'failed') body.extractionError = extraction.error
        res.json(body)
    }

    async function fromUploads(files: Express.Multer.File[], res: Response) {
        const diagnostics: Record<string, FileDiagnostics> = {}
        let combined = ''

        await withUploadScope(deps.uploadDir, async (scope) => {
            for (const file of files) {
                const filename = secureFilename(decodeUploadName(file.originalname))
                const extraction = await scope.hold(filename, file.buffer, (p) => deps.extractor.extract(p))
                if (extraction.status === 'failed') {
                    diagnostics[filename] = { length: 0, status: 'failed', error: extraction.error }
                    continue
                }
                combined += `\n=== ${filename} ===\n${extraction.text}\n`
                diagnostics[filename] = { length: extraction.text.length, status: extraction.status }
            }
        })

        const outcome = await deps.summarizer.summarize(combined)
        releaseMemory()

        const body: UploadParseResponse = {
            message: 'Parsed successfully',
            diagnostics,
            ...summaryFields(outcome),
        }
        res.json(body)
    }

    return async function parse(req: Request, res: Response, next: NextFunction) {
        try {
            releaseMemory()
            const { file_path } = bodySchema.parse(req.body ?? {})
            if (file_path !== undefined) {
                logger.info({ filePath: file_path }, 'parse from path')
                await fromPath(file_path, res)
                return
            }

            const files = uploadedFiles(req)
            if (files.length === 0) {
                res.status(400).json({ error: 'No files or file_path provided' })
                return
            }
            logger.info({ files: files.length }, 'parse uploads')
            await fromUploads(files, res)
        } catch (err) {
            next(err)
        }
    }
}
