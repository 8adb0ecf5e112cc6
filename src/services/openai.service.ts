import OpenAI from 'openai'
import type { TextGenerator } from './summarizer.service'

export class OpenAIService implements TextGenerator {
    readonly provider = 'openai'
    private client: OpenAI
    private model: string
    private maxTokens: number

    constructor(apiKey: string, model: string, maxTokens: number) {
        this.client = new OpenAI({ apiKey })
        this.model = model
        this.maxTokens = maxTokens
    }

    async generate(prompt: string): Promise<string | undefined> {
        const resp = await this.client.chat.completions.create({
            model: this.model,
            messages: [{ role: 'user', content: prompt }],
            max_tokens: this.maxTokens,
        })
        return resp.choices[0]?.message?.content ?? undefined
    }
}
