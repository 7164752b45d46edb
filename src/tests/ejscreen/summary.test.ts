import { describe, it, expect } from 'vitest';
import { readResponse } from '@/lib/ejscreen/response';
import { formatResponseSummary } from '@/lib/ejscreen/summary';

describe('summary.ts', () => {
  describe('formatResponseSummary', () => {
    it('主要指標を単位付きで整形する', () => {
      const response = readResponse({
        data: {
          demographics: {
            TOTALPOP: 689545,
            PCT_MINORITY: 62,
            PER_CAP_INC: 63793,
            P_EMP_STAT_UNEMPLOYED: 7,
          },
          main: { RAW_E_PM25: 8.2, RAW_E_TRAFFIC: 1500, RAW_E_DIESEL: 0.31 },
        },
        extras: { RAW_HI_LIFEEXP: 78.5 },
      });

      expect(formatResponseSummary(response)).toEqual([
        'Demographics:',
        '  Total Population: 689545',
        '  Percent Minority: 62%',
        '  Per Capita Income: $63793',
        '  Unemployment Rate: 7%',
        '',
        'Environmental Factors:',
        '  Air Quality (PM2.5): 8.2 µg/m³',
        '  Traffic Exposure: 1500 vehicles/day',
        '  Diesel Particulate Matter: 0.31 µg/m³',
        '',
        'Health Indicator - Life Expectancy: 78.5 years',
      ]);
    });

    it('欠落値は N/A と表示する', () => {
      const lines = formatResponseSummary(readResponse({}));

      expect(lines[1]).toBe('  Total Population: N/A');
      expect(lines[3]).toBe('  Per Capita Income: $N/A');
      expect(lines[7]).toBe('  Air Quality (PM2.5): N/A µg/m³');
      expect(lines[11]).toBe('Health Indicator - Life Expectancy: N/A years');
    });
  });
});
