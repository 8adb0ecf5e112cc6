import path from 'path'
import type { Extraction, TextSource } from '../types/parse'
import type { OcrEngine } from './ocr.service'
import { logger } from '../utils/logger'
import { errorMessage } from '../utils/errors'
import { releaseMemory } from '../utils/memory'

export const NO_TEXT = '[No text]'

const IMAGE_EXTENSIONS = new Set(['.jpg', '.jpeg', '.png', '.bmp', '.tiff'])

export type SourceKind = 'image' | 'document'

export type PdfReader = (filePath: string) => Promise<string>

export function classifySource(filePath: string): SourceKind {
    return IMAGE_EXTENSIONS.has(path.extname(filePath).toLowerCase()) ? 'image' : 'document'
}

export class TextExtractor implements TextSource {
    private ocr: OcrEngine
    private readPdf: PdfReader

    constructor(ocr: OcrEngine, readPdf: PdfReader) {
        this.ocr = ocr
        this.readPdf = readPdf
    }

    async extract(filePath: string): Promise<Extraction> {
        const kind = classifySource(filePath)
        try {
            if (kind === 'image') {
                const lines = await this.ocr.recognize(filePath)
                const text = lines.join('\n').trim()
                return text ? { status: 'ok', text } : { status: 'empty', text: NO_TEXT }
            }
            const text = (await this.readPdf(filePath)).trim()
            return text ? { status: 'ok', text } : { status: 'empty', text: '' }
        } catch (err) {
            logger.error({ err, filePath, kind }, 'text extraction failed')
            const message = errorMessage(err)
            return { status: 'failed', text: `[Error extracting text: ${message}]`, error: message }
        } finally {
            releaseMemory()
        }
    }
}
