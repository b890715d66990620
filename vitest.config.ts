import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        globals: false,
        environment: 'node',
        include: ['engine/src/**/*.test.ts', 'tests/**/*.test.ts'],
        // timestamp tests switch process.env.TZ, which needs a process per file
        pool: 'forks',
        testTimeout: 15_000,
        hookTimeout: 10_000,
    },
});
