/**
 * EJScreen レスポンスのアクセサ
 *
 * @description data.demographics / data.main / extras を欠落許容で読み出す。
 * セクションが無い・オブジェクトでない場合は空オブジェクト、キーが無い場合は null。
 */

import { z } from 'zod';
import {
  INDICATOR_FIELDS,
  type EJScreenResponse,
  type IndicatorColumn,
  type IndicatorSet,
  type IndicatorValue,
  type ResponseSection,
} from './types';

const SectionSchema = z.record(z.string(), z.unknown()).catch(() => ({}));

const RawResponseSchema = z
  .object({
    data: z
      .object({
        demographics: SectionSchema,
        main: SectionSchema,
      })
      .catch(() => ({ demographics: {}, main: {} })),
    extras: SectionSchema,
  })
  .catch(() => ({ data: { demographics: {}, main: {} }, extras: {} }));

/**
 * JSON ボディを正規化済みレスポンスに変換
 */
export function readResponse(body: unknown): EJScreenResponse {
  const parsed = RawResponseSchema.parse(body);
  return {
    demographics: parsed.data.demographics,
    main: parsed.data.main,
    extras: parsed.extras,
  };
}

/**
 * スカラー値のみ指標値として扱う（オブジェクト・配列・undefined は欠損）
 */
export function toIndicatorValue(value: unknown): IndicatorValue {
  if (
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean'
  ) {
    return value;
  }
  return null;
}

export function getIndicator(
  response: EJScreenResponse,
  section: ResponseSection,
  key: string
): IndicatorValue {
  const sectionValues = response[section];
  return Object.prototype.hasOwnProperty.call(sectionValues, key)
    ? toIndicatorValue(sectionValues[key])
    : null;
}

/**
 * 固定の指標セットを抽出
 */
export function extractIndicators(response: EJScreenResponse): IndicatorSet {
  const read = (column: IndicatorColumn): IndicatorValue =>
    getIndicator(response, INDICATOR_FIELDS[column].section, INDICATOR_FIELDS[column].key);

  return {
    total_population: read('total_population'),
    percent_minority: read('percent_minority'),
    per_capita_income: read('per_capita_income'),
    unemployment_rate: read('unemployment_rate'),
    pm25_air_quality: read('pm25_air_quality'),
    traffic_exposure: read('traffic_exposure'),
    diesel_particulate_matter: read('diesel_particulate_matter'),
    life_expectancy: read('life_expectancy'),
  };
}

/**
 * 全セクションのキーを1階層にフラット化（demographics → main → extras の順で後勝ち）
 */
export function flattenResponse(response: EJScreenResponse): Record<string, IndicatorValue> {
  const flattened: Record<string, IndicatorValue> = {};
  for (const section of [response.demographics, response.main, response.extras]) {
    for (const [key, value] of Object.entries(section)) {
      flattened[key] = toIndicatorValue(value);
    }
  }
  return flattened;
}
