import { defineConfig } from 'vitest/config';

/**
 * Vitest 配置文件
 *
 * - 测试环境：Node.js（命令行工具）
 * - 测试文件：src/__tests__ 下的 *.test.ts
 * - setup.ts 统一把日志输出切到内存，避免测试输出混入 stderr
 */
export default defineConfig({
    test: {
        environment: 'node',

        include: ['src/**/*.{test,spec}.ts'],

        exclude: ['node_modules', 'dist'],

        globals: true,

        coverage: {
            provider: 'v8',
            reporter: ['text', 'json', 'html'],
            exclude: [
                'node_modules/',
                'dist/',
                'src/__tests__/',
                'src/cli.ts',
            ],
            thresholds: {
                lines: 75,
                functions: 75,
                branches: 70,
                statements: 75,
            },
        },

        testTimeout: 10000,

        setupFiles: ['./src/__tests__/setup.ts'],
    },
});
