import 'dotenv/config'
import http from 'http'
import path from 'path'
import { mkdir } from 'fs/promises'
import { AddressInfo } from 'net'
import { createApp } from './app'
import { env } from './config/env'
import { logger } from './utils/logger'
import { TesseractOcrEngine } from './services/ocr.service'
import { readPdfText } from './services/pdf.service'
import { TextExtractor } from './services/extractor.service'
import { Summarizer } from './services/summarizer.service'
import { createTextGenerator } from './services/generator'

async function main() {
    const uploadDir = path.resolve(env.UPLOAD_DIR)
    await mkdir(uploadDir, { recursive: true })

    // Created once, before the first request, and owned by this process
    const ocr = await TesseractOcrEngine.create({
        languages: env.OCR_LANGUAGES,
        langPath: env.OCR_LANG_PATH,
        cachePath: env.OCR_CACHE_PATH,
    })
    const generator = createTextGenerator(env)

    const app = createApp({
        extractor: new TextExtractor(ocr, readPdfText),
        summarizer: new Summarizer(generator, env.SUMMARY_MAX_CHARS),
        uploadDir,
        maxFileSizeBytes: env.UPLOAD_MAX_FILE_SIZE_MB * 1024 * 1024,
    })
    const server = http.createServer(app)

    const listener = server.listen(env.PORT, env.HOST, () => {
        const { port } = listener.address() as AddressInfo
        logger.info(
            { port, host: env.HOST, env: env.NODE_ENV, provider: generator.provider, uploadDir },
            `HTTP server listening on :${port}`
        )
    })

    const shutdown = (signal: string) => {
        logger.info({ signal }, 'shutting down')
        server.close(() => {
            ocr.terminate().then(
                () => {
                    logger.info('closed')
                    process.exit(0)
                },
                (err: unknown) => {
                    logger.error({ err }, 'OCR worker did not terminate cleanly')
                    process.exit(1)
                }
            )
        })
    }

    process.on('SIGINT', () => shutdown('SIGINT'))
    process.on('SIGTERM', () => shutdown('SIGTERM'))
}

main().catch((err: unknown) => {
    logger.fatal({ err }, 'failed to start')
    process.exit(1)
})
