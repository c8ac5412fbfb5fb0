import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        name: 'layer-export',
        include: ['src/**/*.test.ts'],
        exclude: ['node_modules', 'dist'],
        setupFiles: ['src/__tests__/setup.ts'],
        testTimeout: 30000,
        pool: 'forks',
        globals: true,
        environment: 'node',
    },
});
