import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        include: ['business/__tests__/**/*.test.ts', 'routes/__tests__/**/*.test.ts'],
        environment: 'node',
    },
});
