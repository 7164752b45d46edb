/**
 * 州別 CSV フィルタスクリプト
 *
 * @description 全米トラクト CSV から1州分（既定: DC）を抽出する
 * - CLI引数: --input=PATH, --output=PATH, --column=ST_ABBREV, --value=DC
 */

import { randomUUID } from 'crypto';
import { loadConfig } from '../../src/lib/config';
import { filterCsvByColumn } from '../../src/lib/ejscreen/filter';
import { createLogger } from '../../src/lib/utils/logger';
import { getStringFlag, loadEnv, notifyScriptFailure, parseFlags } from './_shared';

const logger = createLogger({ module: 'filter-state' });

async function main(): Promise<void> {
  loadEnv();
  const flags = parseFlags();
  const config = loadConfig();

  const inputPath = getStringFlag(flags, 'input') ?? config.paths.rawTractCsv;
  const outputPath = getStringFlag(flags, 'output') ?? config.paths.filteredTractCsv;
  const column = getStringFlag(flags, 'column');
  const value = getStringFlag(flags, 'value');

  const runId = randomUUID();

  try {
    const result = await filterCsvByColumn({ inputPath, outputPath, column, value });

    const output = {
      success: true,
      runId,
      inputPath,
      outputPath,
      matchedRows: result.rows.length,
      totalRows: result.totalRows,
    };
    console.log(JSON.stringify(output, null, 2));
  } catch (error) {
    logger.error('State filter failed', { runId, path: inputPath, error });
    await notifyScriptFailure('filter-state', runId, error);
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
