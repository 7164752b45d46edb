/**
 * パイプライン共通エラー
 *
 * @description 入力欠落・取得失敗・スキーマ不一致・空バッチ・結合キー重複
 */

/**
 * 必須入力ファイルが存在しない（読み込み前に検出）
 */
export class MissingInputError extends Error {
  constructor(
    public readonly path: string,
    public readonly label: string = 'Input file'
  ) {
    super(`${label} not found: ${path}`);
    this.name = 'MissingInputError';
  }
}

/**
 * 1エリア分の取得失敗（ネットワーク・タイムアウト・非2xx・JSON不正）
 *
 * バッチ内ではログに残してスキップする。バッチ全体は止めない。
 */
export class FetchFailureError extends Error {
  public readonly statusCode?: number;
  public readonly cause?: Error;

  constructor(
    public readonly areaId: string,
    message: string,
    options?: { statusCode?: number; cause?: Error }
  ) {
    super(`Error fetching data for ${areaId}: ${message}`);
    this.name = 'FetchFailureError';
    this.statusCode = options?.statusCode;
    this.cause = options?.cause;
  }
}

/**
 * 期待するカラムが存在しない
 */
export class SchemaMismatchError extends Error {
  constructor(
    public readonly column: string,
    public readonly available: string[] = [],
    message?: string
  ) {
    super(message ?? `Column '${column}' not found in dataset`);
    this.name = 'SchemaMismatchError';
  }
}

/**
 * バッチ全件が失敗した（空の結果を正常値として扱わない）
 */
export class EmptyBatchError extends Error {
  constructor(
    public readonly requested: number,
    public readonly failedAreaIds: string[] = []
  ) {
    super(`No data was successfully fetched (0 of ${requested} areas)`);
    this.name = 'EmptyBatchError';
  }
}

/**
 * テーブル側の結合キーが一意でない（左結合の行数が増える）
 */
export class DuplicateJoinKeyError extends Error {
  constructor(public readonly keys: string[]) {
    const preview = keys.slice(0, 5).join(', ');
    const more = keys.length > 5 ? ` and ${keys.length - 5} more` : '';
    super(`Join key is not unique in table: ${preview}${more}`);
    this.name = 'DuplicateJoinKeyError';
  }
}

/**
 * 任意の値を Error に変換
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
