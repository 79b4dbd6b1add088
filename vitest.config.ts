import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        environment: 'node',
        include: ['apps/api/test/**/*.test.ts', 'packages/shared-types/test/**/*.test.ts'],
        setupFiles: ['apps/api/test/setup.ts'],
    },
});
