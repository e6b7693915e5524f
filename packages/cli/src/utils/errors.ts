import { OutlineChunksError, isNotFoundError } from '@outline-chunks/types';

/**
 * コマンドのエラーを表示して終了
 */
export function exitWithError(error: unknown): never {
  if (error instanceof OutlineChunksError) {
    console.error(`エラー [${error.code}]: ${error.message}`);
    if (error.data) {
      console.error('詳細:', error.data);
    }
  } else if (isNotFoundError(error)) {
    console.error(`エラー: ファイルが見つかりません: ${error.path ?? ''}`);
  } else if (error instanceof Error) {
    console.error(`エラー: ${error.message}`);
  } else {
    console.error('エラー: 不明なエラーが発生しました。');
  }
  process.exit(1);
}
