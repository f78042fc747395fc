import { defineConfig } from 'vitest/config';
import { fileURLToPath, URL } from 'node:url';

export default defineConfig({
    test: {
        globals: false,
        environment: 'node',
        include: ['tests/**/*.test.ts'],
        exclude: [
            'node_modules/**/*',
            'dist/**/*',
        ],
        testTimeout: 30000,
        coverage: {
            provider: 'v8',
            reporter: ['text', 'html', 'lcov'],
            include: ['src/**/*.ts'],
            exclude: [
                'dist/**/*',
                'node_modules/**/*',
                'tests/**/*',
                // Entry points and native hook binding - exercised manually
                'src/main.ts',
                'src/talktype.ts',
                'src/hotkey/uiohook.ts',
            ],
            thresholds: {
                lines: 60,
                statements: 60,
                branches: 50,
                functions: 60,
            },
        },
    },
    resolve: {
        alias: {
            '@': fileURLToPath(new URL('./src', import.meta.url)),
        },
    },
});
