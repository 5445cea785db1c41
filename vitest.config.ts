/**
 * Vitest Configuration
 *
 * Pure unit tests: no server, no database, no network. HTTP middleware is
 * exercised in-process through Hono's app.request().
 */

import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';
import { dirname, resolve } from 'path';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

export default defineConfig({
    resolve: {
        alias: {
            '@src': resolve(__dirname, './src')
        }
    },
    test: {
        globals: false,
        environment: 'node',
        setupFiles: ['./src/test-setup.ts'],
        include: ['spec/**/*.test.ts'],
        exclude: [
            '**/node_modules/**',
            '**/dist/**'
        ],
        testTimeout: 5000,
        hookTimeout: 5000,
        reporters: ['default']
    }
});
