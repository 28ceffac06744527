import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        environment: 'node',
        include: ['packages/*/src/**/*.test.ts'],
        watch: false,
        // Process tests spawn real shells and wait out short timeouts
        testTimeout: 15000,
    },
});
