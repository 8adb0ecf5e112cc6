import type { Env } from '../config/env'
import type { TextGenerator } from './summarizer.service'
import { GeminiService } from './gemini.service'
import { OpenAIService } from './openai.service'

export function createTextGenerator(config: Env): TextGenerator {
    if (config.SUMMARY_PROVIDER === 'openai') {
        if (!config.OPENAI_API_KEY) throw new Error('OPENAI_API_KEY is not configured')
        return new OpenAIService(config.OPENAI_API_KEY, config.OPENAI_MODEL, config.OPENAI_MAX_TOKENS)
    }
    if (!config.GEMINI_API_KEY) throw new Error('GEMINI_API_KEY is not configured')
    return new GeminiService(config.GEMINI_API_KEY, config.GEMINI_MODEL)
}
