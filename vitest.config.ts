import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        include: ['packages/recordsrunner/__tests__/**/*.test.ts'],
        environment: 'node',
    },
});
