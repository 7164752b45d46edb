/**
 * 取得結果のサマリー表示
 */

import { getIndicator } from './response';
import type { EJScreenResponse, IndicatorValue } from './types';

function display(value: IndicatorValue): string {
  return value === null ? 'N/A' : String(value);
}

/**
 * 主要指標のサマリーを行単位で返す
 */
export function formatResponseSummary(response: EJScreenResponse): string[] {
  const demographic = (key: string) => display(getIndicator(response, 'demographics', key));
  const main = (key: string) => display(getIndicator(response, 'main', key));

  return [
    'Demographics:',
    `  Total Population: ${demographic('TOTALPOP')}`,
    `  Percent Minority: ${demographic('PCT_MINORITY')}%`,
    `  Per Capita Income: $${demographic('PER_CAP_INC')}`,
    `  Unemployment Rate: ${demographic('P_EMP_STAT_UNEMPLOYED')}%`,
    '',
    'Environmental Factors:',
    `  Air Quality (PM2.5): ${main('RAW_E_PM25')} µg/m³`,
    `  Traffic Exposure: ${main('RAW_E_TRAFFIC')} vehicles/day`,
    `  Diesel Particulate Matter: ${main('RAW_E_DIESEL')} µg/m³`,
    '',
    `Health Indicator - Life Expectancy: ${display(
      getIndicator(response, 'extras', 'RAW_HI_LIFEEXP')
    )} years`,
  ];
}
