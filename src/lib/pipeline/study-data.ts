/**
 * 調査地域データ取得パイプライン
 *
 * @description 設定されたブロックグループ群と市全体の指標を EJScreen から取得し、
 * それぞれ CSV に保存する。
 *
 * - ブロックグループ: 順次取得（失敗はスキップ）、全件失敗なら CSV を書かない
 * - 市: 表示名付きで1件取得
 * - どちらかが失敗したら success: false とし、失敗通知メールを送る
 */

import { randomUUID } from 'crypto';
import type { EJScreenConfig } from '../config';
import { BatchCollector, toCsvRow } from '../ejscreen/collector';
import { createEJScreenClient } from '../ejscreen/client';
import { RECORD_CSV_HEADER } from '../ejscreen/types';
import { EmptyBatchError, toError } from '../errors';
import { sendPipelineFailureEmail, type PipelineFailureNotification } from '../notification/email';
import { writeCsvFile } from '../utils/csv';
import { createRunLogger } from '../utils/logger';

export type StudyDataCollector = Pick<BatchCollector, 'fetchAll' | 'fetchOne'>;

export interface StudyDataDeps {
  /** 省略時は config.api から EJScreenClient + BatchCollector を組み立てる */
  collector?: StudyDataCollector;
  /** リクエスト間ウェイト関数（collector 省略時のみ使用） */
  sleep?: (ms: number) => Promise<void>;
  notifyFailure?: (data: PipelineFailureNotification) => Promise<boolean>;
  runId?: string;
}

export interface StudyDataResult {
  success: boolean;
  runId: string;
  blockGroups: {
    requested: number;
    fetched: number;
    failed: number;
    /** 書き出した場合のみ */
    outputPath: string | null;
  };
  city: {
    fetched: boolean;
    outputPath: string | null;
  };
  errors: string[];
}

/**
 * 調査地域データ取得を実行
 */
export async function runStudyDataPipeline(
  config: EJScreenConfig,
  deps: StudyDataDeps = {}
): Promise<StudyDataResult> {
  const runId = deps.runId ?? randomUUID();
  const logger = createRunLogger('study-data', runId);
  const timer = logger.startTimer('Study data pipeline');
  const notifyFailure = deps.notifyFailure ?? sendPipelineFailureEmail;

  const collector =
    deps.collector ??
    new BatchCollector({
      fetcher: createEJScreenClient({ api: config.api, logContext: { runId } }),
      delayMs: config.api.requestDelayMs,
      sleep: deps.sleep,
      logContext: { runId },
    });

  const { blockGroups, city } = config.studyAreas;
  const errors: string[] = [];

  const result: StudyDataResult = {
    success: false,
    runId,
    blockGroups: {
      requested: blockGroups.areaIds.length,
      fetched: 0,
      failed: 0,
      outputPath: null,
    },
    city: { fetched: false, outputPath: null },
    errors,
  };

  try {
    // 1. ブロックグループ
    logger.info(`Fetching data for ${blockGroups.label} block groups`, {
      rowCount: blockGroups.areaIds.length,
    });
    const batch = await collector.fetchAll(blockGroups.areaIds, config.api.requestDelayMs);
    result.blockGroups.fetched = batch.records.length;
    result.blockGroups.failed = batch.failures.length;

    if (batch.status === 'empty') {
      const emptyError = new EmptyBatchError(
        batch.requested,
        batch.failures.map((failure) => failure.areaId)
      );
      errors.push(emptyError.message);
      logger.error('Block group batch returned no data', { error: emptyError });
    } else {
      const outputPath = config.paths.blockGroupOutput;
      await writeCsvFile(outputPath, RECORD_CSV_HEADER, batch.records.map(toCsvRow));
      result.blockGroups.outputPath = outputPath;
      logger.info('Block group data saved', { path: outputPath, rowCount: batch.records.length });
    }

    // 2. 市全体
    logger.info(`Fetching data for ${city.label}`, { areaId: city.areaId, areaType: 'city' });
    const outcome = await collector.fetchOne(city.areaId, 'city', city.name);

    if (outcome.ok) {
      const outputPath = config.paths.cityOutput;
      await writeCsvFile(outputPath, RECORD_CSV_HEADER, [toCsvRow(outcome.record)]);
      result.city = { fetched: true, outputPath };
      logger.info('City data saved', { path: outputPath, areaId: city.areaId });
    } else {
      errors.push(outcome.failure.message);
    }
  } catch (error) {
    const err = toError(error);
    errors.push(err.message);
    logger.error('Study data pipeline aborted', { error: err });
  }

  result.success = errors.length === 0;

  if (!result.success) {
    const durationMs = timer.endWithError(new Error(errors.join('\n')), {
      fetched: result.blockGroups.fetched,
      failed: result.blockGroups.failed,
    });
    await notifyFailure({
      pipeline: 'study-data',
      runId,
      error: errors.join('\n'),
      timestamp: new Date(),
      details: {
        対象ブロックグループ: result.blockGroups.requested,
        取得成功: result.blockGroups.fetched,
        取得失敗: result.blockGroups.failed,
        所要時間ms: durationMs,
      },
    });
    return result;
  }

  timer.end({
    fetched: result.blockGroups.fetched,
    failed: result.blockGroups.failed,
  });

  return result;
}
