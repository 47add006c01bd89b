/**
 * LIKE のメタ文字（% _ と エスケープ文字 \）をエスケープする。
 * 結果は必ずバインドパラメータとして渡し、`ESCAPE '\'` と組み合わせる
 */
export function escapeLikePattern(text: string): string {
  return text.replace(/[\\%_]/g, (ch) => `\\${ch}`);
}

// 部分一致用: %<escaped>%
export function containsPattern(text: string): string {
  return `%${escapeLikePattern(text)}%`;
}
