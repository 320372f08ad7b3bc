import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    // ワークスペースパッケージはビルドせずにソースを参照
    alias: {
      '@doc-audit/types': fileURLToPath(new URL('../types/src/index.ts', import.meta.url)),
      '@doc-audit/core': fileURLToPath(new URL('../core/src/index.ts', import.meta.url)),
    },
  },
  test: {
    // テストのタイムアウト設定
    testTimeout: 60000,
    hookTimeout: 60000,

    // 一時ディレクトリを使うテストは1つずつ実行
    pool: 'forks',
    poolOptions: {
      forks: {
        singleFork: true,
      },
    },

    reporters: ['default'],
    environment: 'node',
  },
});
