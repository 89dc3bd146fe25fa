import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
    resolve: {
        alias: {
            '@/': fileURLToPath(new URL('./', import.meta.url)),
        },
    },
    test: {
        environment: 'node',
        setupFiles: ['./test-setup.ts'],
        clearMocks: true,
        include: ['**/*.test.ts'],
        exclude: ['node_modules', 'dist'],
    },
});
