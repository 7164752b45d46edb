/**
 * 調査地域データ取得スクリプト
 *
 * @description config/study-areas.json のブロックグループ群と市全体の指標を取得して CSV に保存
 * - CLI引数: --delay-ms=N（リクエスト間ウェイト、既定は EJSCREEN_REQUEST_DELAY_MS）
 */

import { randomUUID } from 'crypto';
import { loadConfig } from '../../src/lib/config';
import { runStudyDataPipeline } from '../../src/lib/pipeline/study-data';
import { createLogger } from '../../src/lib/utils/logger';
import { getIntegerFlag, loadEnv, notifyScriptFailure, parseFlags } from './_shared';

const logger = createLogger({ module: 'fetch-study-data' });

async function main(): Promise<void> {
  loadEnv();
  const flags = parseFlags();
  const delayMs = getIntegerFlag(flags, 'delay-ms');

  const baseConfig = loadConfig();
  const config =
    delayMs === undefined
      ? baseConfig
      : { ...baseConfig, api: { ...baseConfig.api, requestDelayMs: delayMs } };

  const runId = randomUUID();
  logger.info('Starting study data fetch', {
    runId,
    rowCount: config.studyAreas.blockGroups.areaIds.length,
    delayMs: config.api.requestDelayMs,
  });

  try {
    const result = await runStudyDataPipeline(config, { runId });

    console.log(JSON.stringify(result, null, 2));

    if (!result.success) {
      process.exit(1);
    }
  } catch (error) {
    logger.error('Study data fetch failed with exception', { runId, error });
    await notifyScriptFailure('study-data', runId, error);
    throw error;
  }
}

main()
  .then(() => {
    process.exit(0);
  })
  .catch((error) => {
    logger.error('Script failed', { error: error instanceof Error ? error.message : String(error) });
    process.exit(1);
  });
