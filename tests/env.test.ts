import { describe, it, expect } from 'vitest'
import { EnvSchema } from '../src/config/env'

describe('EnvSchema', () => {
    it('applies defaults', () => {
        const env = EnvSchema.parse({ GEMINI_API_KEY: 'test-key' })
        expect(env.NODE_ENV).toBe('development')
        expect(env.HOST).toBe('0.0.0.0')
        expect(env.PORT).toBe(5001)
        expect(env.ALLOWED_ORIGINS).toEqual(['*'])
        expect(env.UPLOAD_DIR).toBe('./uploads')
        expect(env.UPLOAD_MAX_FILE_SIZE_MB).toBe(20)
        expect(env.SUMMARY_PROVIDER).toBe('gemini')
        expect(env.SUMMARY_MAX_CHARS).toBe(4000)
        expect(env.GEMINI_MODEL).toBe('gemini-2.0-flash-lite')
        expect(env.OCR_LANGUAGES).toBe('eng')
    })

    it('parses numbers and origin lists', () => {
        const env = EnvSchema.parse({
            GEMINI_API_KEY: 'test-key',
            PORT: '8080',
            SUMMARY_MAX_CHARS: '1200',
            ALLOWED_ORIGINS: 'http://localhost:5173, https://app.example.test,',
        })
        expect(env.PORT).toBe(8080)
        expect(env.SUMMARY_MAX_CHARS).toBe(1200)
        expect(env.ALLOWED_ORIGINS).toEqual(['http://localhost:5173', 'https://app.example.test'])
    })

    it('refuses to start without a key for the selected provider', () => {
        const gemini = EnvSchema.safeParse({})
        expect(gemini.success).toBe(false)
        if (!gemini.success) {
            expect(gemini.error.issues.map((i) => i.path.join('.'))).toEqual(['GEMINI_API_KEY'])
        }

        const openai = EnvSchema.safeParse({ SUMMARY_PROVIDER: 'openai', GEMINI_API_KEY: 'test-key' })
        expect(openai.success).toBe(false)
        if (!openai.success) {
            expect(openai.error.issues.map((i) => i.path.join('.'))).toEqual(['OPENAI_API_KEY'])
        }
    })

    it('accepts an openai configuration', () => {
        const env = EnvSchema.parse({ SUMMARY_PROVIDER: 'openai', OPENAI_API_KEY: 'test-key' })
        expect(env.OPENAI_MODEL).toBe('gpt-4o-mini')
        expect(env.OPENAI_MAX_TOKENS).toBe(1000)
    })
})
