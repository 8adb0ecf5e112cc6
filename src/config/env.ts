import { z } from 'zod'

const numeric = (fallback: string) =>
    z
        .string()
        .default(fallback)
        .transform((v: string) => Number(v))
        .pipe(z.number().int().positive())

export const EnvSchema = z
    .object({
        NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
        HOST: z.string().default('0.0.0.0'),
        PORT: numeric('5001'),
        ALLOWED_ORIGINS: z
            .string()
            .default('*')
            .transform((v: string) => v.split(',').map((o: string) => o.trim()).filter(Boolean)),
        LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),
        UPLOAD_DIR: z.string().min(1).default('./uploads'),
        UPLOAD_MAX_FILE_SIZE_MB: numeric('20'),
        SUMMARY_PROVIDER: z.enum(['gemini', 'openai']).default('gemini'),
        SUMMARY_MAX_CHARS: numeric('4000'),
        GEMINI_API_KEY: z.string().min(1).optional(),
        GEMINI_MODEL: z.string().default('gemini-2.0-flash-lite'),
        OPENAI_API_KEY: z.string().min(1).optional(),
        OPENAI_MODEL: z.string().default('gpt-4o-mini'),
        OPENAI_MAX_TOKENS: numeric('1000'),
        OCR_LANGUAGES: z.string().default('eng'),
        // overrides the eng traineddata installed with @tesseract.js-data/eng
        OCR_LANG_PATH: z.string().optional(),
        OCR_CACHE_PATH: z.string().optional(),
    })
    .superRefine((v, ctx) => {
        // No built-in credential: the selected provider's key must come from the environment
        if (v.SUMMARY_PROVIDER === 'gemini' && !v.GEMINI_API_KEY) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: ['GEMINI_API_KEY'],
                message: 'GEMINI_API_KEY is required when SUMMARY_PROVIDER is gemini',
            })
        }
        if (v.SUMMARY_PROVIDER === 'openai' && !v.OPENAI_API_KEY) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: ['OPENAI_API_KEY'],
                message: 'OPENAI_API_KEY is required when SUMMARY_PROVIDER is openai',
            })
        }
    })

export type Env = z.infer<typeof EnvSchema>

export const env: Env = EnvSchema.parse({
    NODE_ENV: process.env.NODE_ENV,
    HOST: process.env.HOST,
    PORT: process.env.PORT,
    ALLOWED_ORIGINS: process.env.ALLOWED_ORIGINS,
    LOG_LEVEL: process.env.LOG_LEVEL,
    UPLOAD_DIR: process.env.UPLOAD_DIR,
    UPLOAD_MAX_FILE_SIZE_MB: process.env.UPLOAD_MAX_FILE_SIZE_MB,
    SUMMARY_PROVIDER: process.env.SUMMARY_PROVIDER,
    SUMMARY_MAX_CHARS: process.env.SUMMARY_MAX_CHARS,
    GEMINI_API_KEY: process.env.GEMINI_API_KEY,
    GEMINI_MODEL: process.env.GEMINI_MODEL,
    OPENAI_API_KEY: process.env.OPENAI_API_KEY,
    OPENAI_MODEL: process.env.OPENAI_MODEL,
    OPENAI_MAX_TOKENS: process.env.OPENAI_MAX_TOKENS,
    OCR_LANGUAGES: process.env.OCR_LANGUAGES,
    OCR_LANG_PATH: process.env.OCR_LANG_PATH,
    OCR_CACHE_PATH: process.env.OCR_CACHE_PATH,
})
