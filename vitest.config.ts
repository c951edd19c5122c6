import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        environment: 'node',
        include: ['engine/**/*.test.ts', 'server/**/*.test.ts'],
        // Forest training dominates; keep headroom on slow CI machines.
        testTimeout: 30_000,
    },
});
