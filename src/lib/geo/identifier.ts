/**
 * 地理ID（GEOID）の正規化
 *
 * @description 表データ側と境界データ側のIDを比較可能な文字列にそろえる。
 * 比較は正規化後の完全一致のみ（数値比較・ゼロ埋め補正はしない）。
 *
 * NOTE: 数値型を経由して先頭ゼロが落ちたID（例: "01001020100" → 1001020100）は
 * 復元しないため結合に失敗する。結合結果の matchedCount で検知する。
 */

function stringify(raw: unknown): string {
  if (raw === null || raw === undefined) {
    return '';
  }
  return String(raw);
}

/**
 * 表データ側のIDを正規化
 *
 * 浮動小数で読み書きされて付いた小数部を最初の "." で切り捨てる。
 *
 * @example normalizeTableId('110010074011.0') // => '110010074011'
 */
export function normalizeTableId(raw: unknown): string {
  const value = stringify(raw);
  const dotIndex = value.indexOf('.');
  return dotIndex === -1 ? value : value.slice(0, dotIndex);
}

/**
 * 境界データ側のIDを正規化（文字列化のみ。ゼロ埋め済みを前提とする）
 */
export function normalizeBoundaryId(raw: unknown): string {
  return stringify(raw);
}
