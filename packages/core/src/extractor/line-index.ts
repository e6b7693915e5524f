/**
 * オフセットから行番号（1-indexed）を引くための索引
 */
export class LineIndex {
  private readonly newlines: number[] = [];

  constructor(text: string) {
    for (let i = 0; i < text.length; i++) {
      if (text.charCodeAt(i) === 10) {
        this.newlines.push(i);
      }
    }
  }

  /**
   * offsetより前にある改行の数 + 1
   */
  lineAt(offset: number): number {
    let low = 0;
    let high = this.newlines.length;
    while (low < high) {
      const mid = (low + high) >>> 1;
      if (this.newlines[mid] < offset) {
        low = mid + 1;
      } else {
        high = mid;
      }
    }
    return low + 1;
  }
}
