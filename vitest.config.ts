import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const fromRoot = (relative: string): string => fileURLToPath(new URL(relative, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      // ワークスペースパッケージのエイリアス設定
      '@cedar-mcp/path-guard': fromRoot('./packages/path-guard/src/index.ts'),
      '@cedar-mcp/policy-schemas': fromRoot('./packages/policy-schemas/src/index.ts'),
    },
  },
  test: {
    // グローバル設定
    globals: true,
    environment: 'node',

    // タイムアウト設定（Property-based testは時間がかかる）
    testTimeout: 30000,
    hookTimeout: 30000,

    // 一時ディレクトリとsymlinkを多用するためforks poolで分離
    pool: 'forks',

    include: ['packages/*/test/**/*.test.ts', 'apps/*/test/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
  },
});
