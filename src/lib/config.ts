/**
 * 実行設定
 *
 * @description 環境変数と対象エリア一覧（config/study-areas.json）を zod で検証し、
 * 1回の実行に閉じた設定オブジェクトを組み立てる。各コンポーネントへは引数で渡す。
 */

import { readFileSync } from 'fs';
import { join, resolve } from 'path';
import { z } from 'zod';

export const DEFAULT_EJSCREEN_API_URL =
  'https://ejscreen.epa.gov/mapper/ejscreenRESTbroker1.aspx';

/** 環境変数スキーマ（未設定・空文字はデフォルト値） */
const EnvSchema = z.object({
  EJSCREEN_API_URL: z.string().url().default(DEFAULT_EJSCREEN_API_URL),
  EJSCREEN_UNIT: z.string().min(1).default('9035'),
  EJSCREEN_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  EJSCREEN_REQUEST_DELAY_MS: z.coerce.number().int().min(0).default(1000),
  DATA_DIR: z.string().min(1).default('data'),
  STUDY_AREAS_PATH: z.string().min(1).default('config/study-areas.json'),
});

/** 対象エリア一覧スキーマ */
export const StudyAreasSchema = z.object({
  blockGroups: z.object({
    name: z.string().min(1),
    label: z.string().min(1),
    areaIds: z.array(z.string().min(1)),
  }),
  city: z.object({
    name: z.string().min(1),
    label: z.string().min(1),
    areaId: z.string().min(1),
    outputName: z.string().min(1),
  }),
});

export type StudyAreas = z.infer<typeof StudyAreasSchema>;

export interface ApiConfig {
  url: string;
  unit: string;
  timeoutMs: number;
  requestDelayMs: number;
}

export interface PathConfig {
  dataDir: string;
  rawDir: string;
  processedDir: string;
  tractShapefile: string;
  blockGroupShapefile: string;
  rawTractCsv: string;
  filteredTractCsv: string;
  mergedBoundaries: string;
  blockGroupOutput: string;
  cityOutput: string;
}

export interface EJScreenConfig {
  api: ApiConfig;
  paths: PathConfig;
  studyAreas: StudyAreas;
}

/**
 * 設定エラー
 */
export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration:\n${issues.map((issue) => `  - ${issue}`).join('\n')}`);
    this.name = 'ConfigError';
  }
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

/** 空文字の環境変数は未設定として扱う */
function compactEnv(env: NodeJS.ProcessEnv): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value !== '') {
      result[key] = value;
    }
  }
  return result;
}

const TRACT_CSV_NAME = 'EJScreen_2024_Tract_StatePct_with_AS_CNMI_GU_VI.csv';

/**
 * データディレクトリから入出力パスを組み立てる
 */
export function buildPaths(dataDir: string, studyAreas: StudyAreas): PathConfig {
  const rawDir = join(dataDir, 'raw');
  const processedDir = join(dataDir, 'processed');
  const shapefileDir = join(rawDir, 'shapefiles');

  return {
    dataDir,
    rawDir,
    processedDir,
    tractShapefile: join(shapefileDir, 'tl_2024_11_tract', 'tl_2024_11_tract.shp'),
    blockGroupShapefile: join(shapefileDir, 'tl_2024_11_bg', 'tl_2024_11_bg.shp'),
    rawTractCsv: join(rawDir, TRACT_CSV_NAME),
    filteredTractCsv: join(processedDir, 'track', `DC-filtered_${TRACT_CSV_NAME}`),
    mergedBoundaries: join(processedDir, 'shapefiles', 'track', 'merged_tracts.geojson'),
    blockGroupOutput: join(
      processedDir,
      'block_group',
      `${studyAreas.blockGroups.name}_ejscreen_data.csv`
    ),
    cityOutput: join(processedDir, 'block_group', `${studyAreas.city.outputName}_ejscreen_data.csv`),
  };
}

/**
 * 対象エリア一覧を読み込んで検証
 */
export function loadStudyAreas(filePath: string): StudyAreas {
  const absolutePath = resolve(process.cwd(), filePath);

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(absolutePath, 'utf-8'));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError([`${filePath}: ${message}`]);
  }

  const parsed = StudyAreasSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(formatIssues(parsed.error).map((issue) => `${filePath} ${issue}`));
  }
  return parsed.data;
}

/**
 * 環境変数から実行設定を組み立てる
 *
 * @param env 環境変数（テストでは任意のオブジェクトを渡す）
 * @param studyAreas 指定時は JSON を読まずにこれを使う
 * @throws {ConfigError} 値が不正な場合
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  studyAreas?: StudyAreas
): EJScreenConfig {
  const parsed = EnvSchema.safeParse(compactEnv(env));
  if (!parsed.success) {
    throw new ConfigError(formatIssues(parsed.error));
  }

  const values = parsed.data;
  const areas = studyAreas ?? loadStudyAreas(values.STUDY_AREAS_PATH);

  return {
    api: {
      url: values.EJSCREEN_API_URL,
      unit: values.EJSCREEN_UNIT,
      timeoutMs: values.EJSCREEN_TIMEOUT_MS,
      requestDelayMs: values.EJSCREEN_REQUEST_DELAY_MS,
    },
    paths: buildPaths(values.DATA_DIR, areas),
    studyAreas: areas,
  };
}
