/**
 * EJScreen CSV の州フィルタ
 *
 * @description 全米トラクト CSV から指定カラムが一致する行だけを書き出す
 */

import { SchemaMismatchError } from '../errors';
import { readCsvFile, writeCsvFile, type CsvRow } from '../utils/csv';
import { assertInputExists } from '../utils/files';
import { createLogger } from '../utils/logger';

const logger = createLogger({ module: 'ejscreen-filter' });

export interface FilterCsvOptions {
  inputPath: string;
  outputPath: string;
  /** 絞り込みカラム（デフォルト: ST_ABBREV） */
  column?: string;
  /** 一致させる値（デフォルト: DC） */
  value?: string;
  /** 先頭カラムを行インデックスとみなして出力から外す（デフォルト: true） */
  dropIndexColumn?: boolean;
}

export interface FilterCsvResult {
  header: string[];
  rows: CsvRow[];
  totalRows: number;
}

/**
 * 指定カラムが値に一致する行を抽出して CSV に保存
 *
 * @throws {MissingInputError} 入力ファイルが存在しない場合
 * @throws {SchemaMismatchError} カラムが存在しない場合
 */
export async function filterCsvByColumn(options: FilterCsvOptions): Promise<FilterCsvResult> {
  const { inputPath, outputPath, column = 'ST_ABBREV', value = 'DC' } = options;
  const dropIndexColumn = options.dropIndexColumn ?? true;

  assertInputExists(inputPath);

  const csv = await readCsvFile(inputPath);
  const header = dropIndexColumn ? csv.header.slice(1) : csv.header;

  logger.debug('Available columns', { path: inputPath, columns: header });

  if (!header.includes(column)) {
    throw new SchemaMismatchError(column, header);
  }

  const rows = csv.rows.filter((row) => row[column] === value);

  await writeCsvFile(outputPath, header, rows);

  logger.info(`Filtered ${rows.length} rows out of ${csv.rows.length} total rows`, {
    path: outputPath,
    column,
    value,
    rowCount: rows.length,
  });

  return { header, rows, totalRows: csv.rows.length };
}
