import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';

export default defineConfig({
    test: {
        environment: 'node',
        setupFiles: ['./test/setup.ts'],
        globals: true,
        include: ['wunderground/**/*.test.ts', 'bridge/**/*.test.ts', 'cli/**/*.test.ts', 'server/**/*.test.ts'],
    },
    resolve: {
        alias: {
            '@wunderground': fileURLToPath(new URL('./wunderground/index.ts', import.meta.url)),
        },
    },
});
