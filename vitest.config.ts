import { defineConfig } from 'vitest/config';

export default defineConfig({
    resolve: {
        extensions: ['.ts', '.js', '.json'],
    },
    test: {
        globals: true,
        environment: 'node',
        include: ['src/__tests__/**/*.test.ts'],
        // fetch and GENDERSCOPE_* stubs never leak between tests
        unstubGlobals: true,
        unstubEnvs: true,
        testTimeout: 10000,
    },
});
