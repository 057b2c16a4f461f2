import { defineConfig } from 'vitest/config'

export default defineConfig({
    test: {
        include: [
            'packages/*/src/**/*.test.ts',
            'services/*/src/**/*.test.ts'
        ],
        environment: 'node',
        env: {
            PRETTY_LOGS: 'false',
            LOG_LEVEL: 'silent'
        }
    }
})
