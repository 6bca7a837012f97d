import { defineConfig } from 'vitest/config'

export default defineConfig({
    test: {
        environment: 'node',
        include: ['packages/*/src/**/*.test.ts', 'services/*/src/**/*.test.ts'],
        restoreMocks: true,
        clearMocks: true,
        // Log output from the services under test is noise here.
        env: {
            PRETTY_LOGS: 'false',
            LOG_LEVEL: 'silent',
        },
    },
})
