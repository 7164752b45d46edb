import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { writeFile } from 'fs/promises';
import { join } from 'path';
import {
  ConfigError,
  DEFAULT_EJSCREEN_API_URL,
  buildPaths,
  loadConfig,
  loadStudyAreas,
  type StudyAreas,
} from '@/lib/config';
import { createTmpDir } from './helpers/tmp-dir';

const studyAreas: StudyAreas = {
  blockGroups: {
    name: 'anacostia',
    label: 'Southeast Anacostia',
    areaIds: ['110010074011', '110010074012'],
  },
  city: {
    name: 'Washington',
    label: 'Washington, DC',
    areaId: '1150000',
    outputName: 'dc',
  },
};

describe('config.ts', () => {
  describe('loadConfig', () => {
    it('未設定の環境変数はデフォルト値になる', () => {
      const config = loadConfig({}, studyAreas);

      expect(config.api).toEqual({
        url: DEFAULT_EJSCREEN_API_URL,
        unit: '9035',
        timeoutMs: 30000,
        requestDelayMs: 1000,
      });
      expect(config.paths.blockGroupOutput).toBe(
        join('data', 'processed', 'block_group', 'anacostia_ejscreen_data.csv')
      );
      expect(config.paths.cityOutput).toBe(
        join('data', 'processed', 'block_group', 'dc_ejscreen_data.csv')
      );
      expect(config.studyAreas).toBe(studyAreas);
    });

    it('環境変数の値を数値に変換して使う', () => {
      const config = loadConfig(
        {
          EJSCREEN_API_URL: 'https://api.example.com/broker',
          EJSCREEN_TIMEOUT_MS: '5000',
          EJSCREEN_REQUEST_DELAY_MS: '0',
          DATA_DIR: '/srv/ejscreen',
        },
        studyAreas
      );

      expect(config.api.url).toBe('https://api.example.com/broker');
      expect(config.api.timeoutMs).toBe(5000);
      expect(config.api.requestDelayMs).toBe(0);
      expect(config.paths.rawDir).toBe(join('/srv/ejscreen', 'raw'));
    });

    it('リトライ回数の設定は受け付けない', () => {
      const config = loadConfig({ EJSCREEN_MAX_RETRIES: '2' }, studyAreas);
      expect(config.api).not.toHaveProperty('maxRetries');
    });

    it('空文字の環境変数は未設定として扱う', () => {
      const config = loadConfig({ EJSCREEN_TIMEOUT_MS: '', DATA_DIR: '' }, studyAreas);
      expect(config.api.timeoutMs).toBe(30000);
      expect(config.paths.dataDir).toBe('data');
    });

    it('不正な値は ConfigError を投げる', () => {
      let caught: unknown;
      try {
        loadConfig({ EJSCREEN_TIMEOUT_MS: 'abc', EJSCREEN_API_URL: 'not a url' }, studyAreas);
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(ConfigError);
      if (caught instanceof ConfigError) {
        expect(caught.issues).toHaveLength(2);
        expect(caught.issues.some((issue) => issue.startsWith('EJSCREEN_API_URL:'))).toBe(true);
        expect(caught.issues.some((issue) => issue.startsWith('EJSCREEN_TIMEOUT_MS:'))).toBe(true);
      }
    });
  });

  describe('buildPaths', () => {
    it('入出力パスを組み立てる', () => {
      const paths = buildPaths('data', studyAreas);

      expect(paths.tractShapefile).toBe(
        join('data', 'raw', 'shapefiles', 'tl_2024_11_tract', 'tl_2024_11_tract.shp')
      );
      expect(paths.rawTractCsv).toBe(
        join('data', 'raw', 'EJScreen_2024_Tract_StatePct_with_AS_CNMI_GU_VI.csv')
      );
      expect(paths.filteredTractCsv).toBe(
        join(
          'data',
          'processed',
          'track',
          'DC-filtered_EJScreen_2024_Tract_StatePct_with_AS_CNMI_GU_VI.csv'
        )
      );
      expect(paths.mergedBoundaries).toBe(
        join('data', 'processed', 'shapefiles', 'track', 'merged_tracts.geojson')
      );
    });
  });

  describe('loadStudyAreas', () => {
    let tmp: Awaited<ReturnType<typeof createTmpDir>>;

    beforeEach(async () => {
      tmp = await createTmpDir();
    });

    afterEach(async () => {
      await tmp.cleanup();
    });

    it('同梱の config/study-areas.json を読み込める', () => {
      const areas = loadStudyAreas('config/study-areas.json');

      expect(areas.blockGroups.name).toBe('anacostia');
      expect(areas.blockGroups.areaIds).toHaveLength(36);
      expect(areas.blockGroups.areaIds[0]).toBe('110010074011');
      expect(areas.city).toEqual({
        name: 'Washington',
        label: 'Washington, DC',
        areaId: '1150000',
        outputName: 'dc',
      });
    });

    it('スキーマ不一致は ConfigError を投げる', async () => {
      const filePath = tmp.path('areas.json');
      await writeFile(filePath, JSON.stringify({ blockGroups: { name: 'x' } }), 'utf-8');

      expect(() => loadStudyAreas(filePath)).toThrow(ConfigError);
    });

    it('存在しないファイルは ConfigError を投げる', () => {
      expect(() => loadStudyAreas(tmp.path('missing.json'))).toThrow(ConfigError);
    });
  });
});
