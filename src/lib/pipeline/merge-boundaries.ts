/**
 * 境界データ結合パイプライン
 *
 * @description 境界ファイル（.shp / GeoJSON）とフィルタ済み CSV を読み込み、
 * GEOID で結合した FeatureCollection を GeoJSON として保存する。
 */

import { loadBoundaries, writeBoundaries } from '../geo/boundaries';
import { mergeFeatures, type MergeOptions, type MergeResult } from '../geo/spatial-join';
import { readCsvFile } from '../utils/csv';
import { assertInputExists } from '../utils/files';
import { createLogger, type LogContext } from '../utils/logger';

export interface MergeBoundariesOptions extends MergeOptions {
  /** 境界ファイル */
  boundaryPath: string;
  /** 表データ（CSV） */
  dataPath: string;
  /** 出力先（GeoJSON） */
  outputPath: string;
  logContext?: LogContext;
}

export interface MergeBoundariesResult extends MergeResult {
  outputPath: string;
}

/** 警告ログに載せる未一致IDの最大件数 */
const UNMATCHED_PREVIEW = 10;

/**
 * 境界データに表データを結合して保存
 *
 * @throws {MissingInputError} 境界ファイル・表データが存在しない場合（境界を先に確認）
 * @throws {SchemaMismatchError} キーカラムがない・未対応の境界形式
 * @throws {DuplicateJoinKeyError} 表側キー重複（duplicateKeys: 'error'）
 */
export async function mergeBoundariesWithData(
  options: MergeBoundariesOptions
): Promise<MergeBoundariesResult> {
  const { boundaryPath, dataPath, outputPath, boundaryKey, tableKey, duplicateKeys } = options;
  const logger = createLogger({ module: 'merge-boundaries', ...options.logContext });

  assertInputExists(boundaryPath, 'Boundary file');
  assertInputExists(dataPath, 'Data file');

  const timer = logger.startTimer('Boundary merge');

  const boundaries = await loadBoundaries(boundaryPath);
  const table = await readCsvFile(dataPath);
  logger.info('Data loaded', { path: dataPath, rowCount: table.rows.length });

  const { collection, diagnostics } = mergeFeatures(boundaries, table, {
    boundaryKey,
    tableKey,
    duplicateKeys,
  });

  logger.info(`Matched ${diagnostics.matchedCount} out of ${diagnostics.totalCount} features`, {
    matchedCount: diagnostics.matchedCount,
    totalCount: diagnostics.totalCount,
  });

  if (diagnostics.matchedCount < diagnostics.totalCount) {
    logger.warn('Some boundaries have no matching data row', {
      unmatchedCount: diagnostics.unmatchedBoundaryIds.length,
      unmatchedSample: diagnostics.unmatchedBoundaryIds.slice(0, UNMATCHED_PREVIEW),
      unusedTableKeyCount: diagnostics.unusedTableKeys.length,
    });
  }

  await writeBoundaries(outputPath, collection);
  timer.end({ path: outputPath, rowCount: diagnostics.totalCount });

  return { collection, diagnostics, outputPath };
}
