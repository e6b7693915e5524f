import { encode } from 'gpt-tokenizer';

/**
 * テキストをトークン列に変換する関数
 */
export type TokenEncoder = (text: string) => number[];

/**
 * チャンク本文のトークン数をカウントするクラス
 */
export class TokenCounter {
  constructor(private readonly encoder: TokenEncoder = encode) {}

  /**
   * テキストのトークン数を計測
   * エンコーダが失敗した場合は文字数の1/4を概算値として返す
   */
  count(text: string): number {
    if (text.length === 0) {
      return 0;
    }

    try {
      return this.encoder(text).length;
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      console.warn(`Token counting failed (${reason}), using character count / 4 as fallback`);
      return Math.ceil(text.length / 4);
    }
  }
}
