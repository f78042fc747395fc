import { defineConfig } from 'vite';
import replace from '@rollup/plugin-replace';
import { execSync } from 'node:child_process';
import shebang from 'rollup-plugin-preserve-shebang';
import { fileURLToPath, URL } from 'node:url';

let gitInfo = {
    branch: '',
    commit: '',
    tags: '',
    commitDate: '',
};

try {
    gitInfo = {
        branch: execSync('git rev-parse --abbrev-ref HEAD').toString().trim(),
        commit: execSync('git rev-parse --short HEAD').toString().trim(),
        tags: '',
        commitDate: execSync('git log -1 --format=%cd --date=iso').toString().trim(),
    };

    try {
        gitInfo.tags = execSync('git tag --points-at HEAD | paste -sd "," -').toString().trim();
    } catch {
        gitInfo.tags = '';
    }
} catch {
    process.stdout.write('Directory does not have a Git repository, skipping git info\n');
}

export default defineConfig({
    plugins: [
        replace({
            '__VERSION__': process.env.npm_package_version ?? '0.0.0',
            '__GIT_BRANCH__': gitInfo.branch,
            '__GIT_COMMIT__': gitInfo.commit,
            '__GIT_TAGS__': gitInfo.tags === '' ? '' : `T:${gitInfo.tags}`,
            '__GIT_COMMIT_DATE__': gitInfo.commitDate,
            '__SYSTEM_INFO__': `${process.platform} ${process.arch} ${process.version}`,
            preventAssignment: true,
        }),
        shebang({
            shebang: '#!/usr/bin/env node',
        }),
    ],
    build: {
        target: 'node20',
        outDir: 'dist',
        ssr: true,
        rollupOptions: {
            external: [
                // Dependencies from package.json
                '@theunwalked/cardigantime',
                'commander',
                'dayjs',
                'dotenv',
                'dotenv/config',
                'uiohook-napi',
                'winston',
                'ws',
                'zod',
                // Node.js built-in modules (node: prefix)
                /^node:/,
            ],
            input: {
                main: 'src/main.ts',
            },
            output: {
                format: 'esm',
                entryFileNames: '[name].js',
                chunkFileNames: '[name].js',
            },
        },
        modulePreload: false,
        minify: false,
        sourcemap: true
    },
    resolve: {
        alias: {
            '@': fileURLToPath(new URL('./src', import.meta.url)),
        },
    },
});
