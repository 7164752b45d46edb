/**
 * EJScreen API クライアント
 *
 * @description ejscreenRESTbroker からエリア単位の指標を取得する。
 * 失敗（ネットワーク・タイムアウト・非2xx・JSON不正）は例外にせず FetchOutcome で返す。
 */

import type { ApiConfig } from '../config';
import { FetchFailureError, toError } from '../errors';
import { fetchOnce, HttpError } from '../utils/http';
import { createLogger, type LogContext, type Logger } from '../utils/logger';
import { extractIndicators, readResponse } from './response';
import type { AreaType, FetchOutcome } from './types';

export interface EJScreenClientOptions {
  /** API 設定（URL・単位・タイムアウト） */
  api: ApiConfig;
  /** ロガーコンテキスト */
  logContext?: LogContext;
}

/**
 * EJScreen API クライアント
 */
export class EJScreenClient {
  private readonly api: ApiConfig;
  private readonly logger: Logger;

  constructor(options: EJScreenClientOptions) {
    this.api = options.api;
    this.logger = createLogger({ module: 'ejscreen-client', ...options.logContext });
  }

  /**
   * リクエスト URL を構築
   *
   * geometry / distance は空のまま送る（エリアID指定のため不要）
   */
  buildUrl(areaId: string, areaType: AreaType, displayName?: string): string {
    const url = new URL(this.api.url);
    url.searchParams.append('namestr', displayName || areaId);
    url.searchParams.append('geometry', '');
    url.searchParams.append('distance', '');
    url.searchParams.append('unit', this.api.unit);
    url.searchParams.append('areatype', areaType);
    url.searchParams.append('areaid', areaId);
    url.searchParams.append('f', 'json');
    return url.toString();
  }

  /**
   * 1エリア分の指標を取得
   *
   * @param areaId エリアID（ブロックグループ12桁・市7桁など）
   * @param areaType エリア種別
   * @param displayName namestr に使う表示名（省略時は areaId）
   */
  async fetchArea(
    areaId: string,
    areaType: AreaType = 'blockgroup',
    displayName?: string
  ): Promise<FetchOutcome> {
    const url = this.buildUrl(areaId, areaType, displayName);

    this.logger.debug('EJScreen API request', { areaId, areaType });

    let response: Response;
    try {
      response = await fetchOnce(
        url,
        {
          method: 'GET',
          headers: {
            Accept: 'application/json',
          },
        },
        { timeoutMs: this.api.timeoutMs }
      );
    } catch (error) {
      const cause = toError(error);
      const statusCode = cause instanceof HttpError ? cause.statusCode : undefined;
      return this.fail(new FetchFailureError(areaId, cause.message, { statusCode, cause }));
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      const cause = toError(error);
      return this.fail(
        new FetchFailureError(areaId, `Invalid JSON response: ${cause.message}`, {
          statusCode: response.status,
          cause,
        })
      );
    }

    const parsed = readResponse(body);

    this.logger.debug('EJScreen API response', { areaId, areaType });

    return {
      ok: true,
      record: {
        areaId,
        areaType,
        displayName: displayName ?? null,
        indicators: extractIndicators(parsed),
      },
      response: parsed,
    };
  }

  private fail(failure: FetchFailureError): FetchOutcome {
    this.logger.error('EJScreen API request failed', {
      areaId: failure.areaId,
      statusCode: failure.statusCode,
      error: failure.cause ?? failure,
    });
    return { ok: false, failure };
  }
}

/**
 * クライアントインスタンスを作成
 */
export function createEJScreenClient(options: EJScreenClientOptions): EJScreenClient {
  return new EJScreenClient(options);
}
