import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: [
      // ワークスペースパッケージはビルドせずにソースから読み込む
      {
        find: /^@outline-chunks\/(types|core|storage)$/,
        replacement: fileURLToPath(new URL('./packages/$1/src/index.ts', import.meta.url)),
      },
    ],
  },
  test: {
    include: ['packages/*/src/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    environment: 'node',
    // 一時ディレクトリとprocess.envを使うテストがあるため直列実行
    fileParallelism: false,
  },
});
