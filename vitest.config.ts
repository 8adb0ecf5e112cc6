import { defineConfig } from 'vitest/config'

export default defineConfig({
    test: {
        environment: 'node',
        include: ['tests/**/*.test.ts'],
        env: {
            NODE_ENV: 'test',
            SUMMARY_PROVIDER: 'gemini',
            GEMINI_API_KEY: 'test-key',
        },
    },
})
