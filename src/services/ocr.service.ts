import path from 'path'
import { readFile } from 'fs/promises'
import { createWorker, OEM, type Worker } from 'tesseract.js'
import { logger } from '../utils/logger'

export interface OcrEngine {
    /** Recognized lines of text, top to bottom, blank lines dropped. */
    recognize(filePath: string): Promise<string[]>
    terminate(): Promise<void>
}

export type TesseractOptions = {
    languages: string
    langPath?: string
    cachePath?: string
}

/** Traineddata shipped by the `@tesseract.js-data/eng` package, so nothing is fetched at startup. */
export function bundledLangPath(): string {
    return path.join(path.dirname(require.resolve('@tesseract.js-data/eng/package.json')), '4.0.0_best_int')
}

export class TesseractOcrEngine implements OcrEngine {
    private worker: Worker
    private tail: Promise<unknown> = Promise.resolve()

    private constructor(worker: Worker) {
        this.worker = worker
    }

    static async create(options: TesseractOptions): Promise<TesseractOcrEngine> {
        const started = Date.now()
        const langPath = options.langPath ?? bundledLangPath()
        const worker = await createWorker(options.languages, OEM.LSTM_ONLY, {
            langPath,
            cachePath: options.cachePath,
            // Without a handler tesseract.js rethrows every rejected job inside its
            // message listener, which surfaces as an uncaughtException
            errorHandler: (err: unknown) => logger.debug({ err }, 'OCR job rejected'),
        })
        logger.info({ languages: options.languages, langPath, ms: Date.now() - started }, 'OCR worker ready')
        return new TesseractOcrEngine(worker)
    }

    recognize(filePath: string): Promise<string[]> {
        return this.exclusive(async () => {
            const image = await readFile(filePath)
            const { data } = await this.worker.recognize(image)
            return data.text
                .split('\n')
                .map((line: string) => line.trim())
                .filter(Boolean)
        })
    }

    async terminate(): Promise<void> {
        await this.tail
        await this.worker.terminate()
    }

    // One worker, one job at a time: concurrent requests queue here
    private exclusive<T>(job: () => Promise<T>): Promise<T> {
        const run = this.tail.then(job)
        this.tail = run.then(
            () => undefined,
            () => undefined
        )
        return run
    }
}
