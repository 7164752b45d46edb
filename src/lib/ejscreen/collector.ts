/**
 * EJScreen バッチ取得
 *
 * @description エリアID一覧を入力順に1件ずつ取得する。
 * - 失敗したIDはログに残してスキップ（バッチは中断しない）
 * - リクエスト間に固定ウェイト（最後のリクエストの後は待たない）
 * - 全件失敗は status: 'empty' で返す
 */

import { createLogger, type LogContext, type Logger } from '../utils/logger';
import { sleep as defaultSleep } from '../utils/http';
import type { EJScreenClient } from './client';
import type { AreaRecord, AreaType, BatchFailure, BatchResult, FetchOutcome } from './types';

/** fetchArea を持つもの（テストではスタブを渡す） */
export type AreaFetcher = Pick<EJScreenClient, 'fetchArea'>;

export interface BatchCollectorOptions {
  fetcher: AreaFetcher;
  /** リクエスト間ウェイト（ミリ秒、デフォルト: 1000） */
  delayMs?: number;
  /** ウェイト関数 */
  sleep?: (ms: number) => Promise<void>;
  /** ロガーコンテキスト */
  logContext?: LogContext;
}

export class BatchCollector {
  private readonly fetcher: AreaFetcher;
  private readonly delayMs: number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly logger: Logger;

  constructor(options: BatchCollectorOptions) {
    this.fetcher = options.fetcher;
    this.delayMs = options.delayMs ?? 1000;
    this.sleep = options.sleep ?? defaultSleep;
    this.logger = createLogger({ module: 'ejscreen-collector', ...options.logContext });
  }

  /**
   * ブロックグループを順に取得
   *
   * @param areaIds 取得対象のエリアID（この順に取得する）
   * @param delayMs リクエスト間ウェイト（省略時はコンストラクタの値）
   */
  async fetchAll(areaIds: readonly string[], delayMs: number = this.delayMs): Promise<BatchResult> {
    const total = areaIds.length;
    const records: AreaRecord[] = [];
    const failures: BatchFailure[] = [];
    const timer = this.logger.startTimer('EJScreen batch fetch');

    this.logger.info('Fetching data for block groups', { total, delayMs });

    for (let i = 0; i < total; i++) {
      const areaId = areaIds[i];
      this.logger.info(`Processing ${i + 1}/${total}`, { areaId });

      const outcome = await this.fetcher.fetchArea(areaId, 'blockgroup');
      if (outcome.ok) {
        records.push(outcome.record);
      } else {
        failures.push({ areaId, error: outcome.failure });
        this.logger.warn('Failed to fetch data, skipping', {
          areaId,
          statusCode: outcome.failure.statusCode,
          error: outcome.failure,
        });
      }

      if (i < total - 1) {
        await this.sleep(delayMs);
      }
    }

    const status = total > 0 && records.length === 0 ? 'empty' : 'ok';

    if (status === 'empty') {
      this.logger.error('No data was successfully fetched', {
        total,
        failedAreaIds: failures.map((failure) => failure.areaId),
      });
    }

    timer.end({ total, fetched: records.length, failed: failures.length });

    return { status, requested: total, records, failures };
  }

  /**
   * 名前付きの単一エリア（市など）を取得
   */
  async fetchOne(
    areaId: string,
    areaType: AreaType,
    displayName?: string
  ): Promise<FetchOutcome> {
    this.logger.info('Fetching single area', { areaId, areaType, displayName });
    const outcome = await this.fetcher.fetchArea(areaId, areaType, displayName);
    if (!outcome.ok) {
      this.logger.warn('Failed to fetch single area', { areaId, areaType, error: outcome.failure });
    }
    return outcome;
  }
}

/**
 * 取得結果を CSV 行に変換
 */
export function toCsvRow(record: AreaRecord): Record<string, string | number | boolean | null> {
  return { area_id: record.areaId, ...record.indicators };
}
