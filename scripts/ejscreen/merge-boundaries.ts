/**
 * 境界データ結合スクリプト
 *
 * @description トラクト境界とフィルタ済み EJScreen CSV を結合して GeoJSON に保存
 * - CLI引数: --boundaries=PATH, --data=PATH, --output=PATH,
 *   --boundary-key=GEOID, --table-key=ID, --allow-fanout（表側キー重複を許可）
 */

import { randomUUID } from 'crypto';
import { loadConfig } from '../../src/lib/config';
import { mergeBoundariesWithData } from '../../src/lib/pipeline/merge-boundaries';
import { createLogger } from '../../src/lib/utils/logger';
import { getStringFlag, loadEnv, notifyScriptFailure, parseFlags } from './_shared';

const logger = createLogger({ module: 'merge-boundaries-direct' });

async function main(): Promise<void> {
  loadEnv();
  const flags = parseFlags();
  const config = loadConfig();

  const boundaryPath = getStringFlag(flags, 'boundaries') ?? config.paths.tractShapefile;
  const dataPath = getStringFlag(flags, 'data') ?? config.paths.filteredTractCsv;
  const outputPath = getStringFlag(flags, 'output') ?? config.paths.mergedBoundaries;

  const runId = randomUUID();

  try {
    const { diagnostics } = await mergeBoundariesWithData({
      boundaryPath,
      dataPath,
      outputPath,
      boundaryKey: getStringFlag(flags, 'boundary-key'),
      tableKey: getStringFlag(flags, 'table-key'),
      duplicateKeys: flags['allow-fanout'] === true ? 'fanout' : 'error',
      logContext: { runId },
    });

    const output = {
      success: true,
      runId,
      outputPath,
      matchedCount: diagnostics.matchedCount,
      totalCount: diagnostics.totalCount,
      unmatchedBoundaryIds:
        diagnostics.unmatchedBoundaryIds.length > 0 ? diagnostics.unmatchedBoundaryIds : undefined,
      duplicateTableKeys:
        diagnostics.duplicateTableKeys.length > 0 ? diagnostics.duplicateTableKeys : undefined,
    };
    console.log(JSON.stringify(output, null, 2));
  } catch (error) {
    logger.error('Boundary merge failed', { runId, error });
    await notifyScriptFailure('merge-boundaries', runId, error);
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
