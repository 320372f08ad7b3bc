import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    // ワークスペースパッケージはビルドせずにソースを参照
    alias: {
      '@doc-audit/types': fileURLToPath(new URL('../types/src/index.ts', import.meta.url)),
    },
  },
  test: {
    globals: true,
    environment: 'node',
    // ファイル監視テストが一時ディレクトリのイベントを取り違えないよう、テストファイルを直列実行
    fileParallelism: false,
  },
});
