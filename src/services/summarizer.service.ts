import type { SummaryOutcome, SummarySource } from '../types/parse'
import { logger } from '../utils/logger'
import { errorMessage } from '../utils/errors'

export const SUMMARY_INSTRUCTION = 'Summarize this medical report simply:'
export const DEFAULT_MAX_SOURCE_CHARS = 4000
export const NOTHING_TO_SUMMARIZE = '[No content to summarize]'
export const NO_SUMMARY = '[No summary]'

export interface TextGenerator {
    readonly provider: string
    generate(prompt: string): Promise<string | undefined>
}

/** First `max` code points of `text`; a surrogate pair is never split. */
export function truncate(text: string, max: number): string {
    if (text.length <= max) return text
    return Array.from(text).slice(0, max).join('')
}

export function buildSummaryPrompt(text: string, maxChars: number = DEFAULT_MAX_SOURCE_CHARS): string {
    return `${SUMMARY_INSTRUCTION}\n\n${truncate(text, maxChars)}`
}

export class Summarizer implements SummarySource {
    private generator: TextGenerator
    private maxChars: number

    constructor(generator: TextGenerator, maxChars: number = DEFAULT_MAX_SOURCE_CHARS) {
        this.generator = generator
        this.maxChars = maxChars
    }

    async summarize(text: string): Promise<SummaryOutcome> {
        if (!text.trim()) return { status: 'skipped', summary: NOTHING_TO_SUMMARIZE }

        const prompt = buildSummaryPrompt(text, this.maxChars)
        try {
            const started = Date.now()
            const out = (await this.generator.generate(prompt))?.trim()
            logger.debug(
                { provider: this.generator.provider, promptChars: prompt.length, ms: Date.now() - started },
                'summary generated'
            )
            if (!out) return { status: 'empty', summary: NO_SUMMARY }
            return { status: 'ok', summary: out }
        } catch (err) {
            logger.error({ err, provider: this.generator.provider }, 'summarization failed')
            const message = errorMessage(err)
            return { status: 'failed', summary: `[Summarization failed: ${message}]`, error: message }
        }
    }
}
