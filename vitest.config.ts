import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        include: ['src/**/*.test.ts'],
        exclude: ['**/node_modules/**', '**/dist/**'],
        env: {
            NODE_ENV: 'test',
        },
        testTimeout: 10_000,
    },
});
