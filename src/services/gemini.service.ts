import { GoogleGenerativeAI, type GenerativeModel } from '@google/generative-ai'
import type { TextGenerator } from './summarizer.service'

export class GeminiService implements TextGenerator {
    readonly provider = 'gemini'
    private model: GenerativeModel

    constructor(apiKey: string, model: string) {
        this.model = new GoogleGenerativeAI(apiKey).getGenerativeModel({ model })
    }

    async generate(prompt: string): Promise<string | undefined> {
        const result = await this.model.generateContent(prompt)
        return result.response.text()
    }
}
