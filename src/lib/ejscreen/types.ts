/**
 * EJScreen API 型定義
 *
 * @see https://ejscreen.epa.gov/mapper/ejscreenRESTbroker1.aspx
 */

import type { FetchFailureError } from '../errors';

export const AREA_TYPES = ['blockgroup', 'city'] as const;
export type AreaType = (typeof AREA_TYPES)[number];

/** 指標値。null は「欠損」 */
export type IndicatorValue = string | number | boolean | null;

/** レスポンス内の指標セクション */
export type ResponseSection = 'demographics' | 'main' | 'extras';

export interface IndicatorField {
  /** 取得元セクション */
  section: ResponseSection;
  /** セクション内のキー */
  key: string;
}

/**
 * 取得する指標（キーが出力カラム名、定義順が出力順）
 */
export const INDICATOR_FIELDS = {
  total_population: { section: 'demographics', key: 'TOTALPOP' },
  percent_minority: { section: 'demographics', key: 'PCT_MINORITY' },
  per_capita_income: { section: 'demographics', key: 'PER_CAP_INC' },
  unemployment_rate: { section: 'demographics', key: 'P_EMP_STAT_UNEMPLOYED' },
  pm25_air_quality: { section: 'main', key: 'RAW_E_PM25' },
  traffic_exposure: { section: 'main', key: 'RAW_E_TRAFFIC' },
  diesel_particulate_matter: { section: 'main', key: 'RAW_E_DIESEL' },
  life_expectancy: { section: 'extras', key: 'RAW_HI_LIFEEXP' },
} as const satisfies Record<string, IndicatorField>;

export type IndicatorColumn = keyof typeof INDICATOR_FIELDS;

export type IndicatorSet = Record<IndicatorColumn, IndicatorValue>;

/** 出力 CSV のヘッダー */
export const RECORD_CSV_HEADER: readonly string[] = ['area_id', ...Object.keys(INDICATOR_FIELDS)];

/**
 * 正規化済みレスポンス（各セクションは欠落時に空オブジェクト）
 */
export interface EJScreenResponse {
  demographics: Record<string, unknown>;
  main: Record<string, unknown>;
  extras: Record<string, unknown>;
}

/**
 * 1エリア分の取得結果
 */
export interface AreaRecord {
  areaId: string;
  areaType: AreaType;
  displayName: string | null;
  indicators: IndicatorSet;
}

export type FetchOutcome =
  | { ok: true; record: AreaRecord; response: EJScreenResponse }
  | { ok: false; failure: FetchFailureError };

export interface BatchFailure {
  areaId: string;
  error: FetchFailureError;
}

/**
 * バッチ取得結果
 *
 * status: 'empty' は「1件以上要求して全件失敗」。0件要求は 'ok'（records 空）。
 */
export interface BatchResult {
  status: 'ok' | 'empty';
  requested: number;
  records: AreaRecord[];
  failures: BatchFailure[];
}
