import { fileURLToPath } from 'url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
    resolve: {
        // Run the workspace packages from their sources; only the published CLI loads dist/.
        alias: {
            '@proofmine/core': fileURLToPath(new URL('./packages/proofmine-core/src/index.ts', import.meta.url)),
        },
    },
    test: {
        include: ['packages/*/src/**/*.test.ts'],
        environment: 'node',
        testTimeout: 15_000,
    },
});
