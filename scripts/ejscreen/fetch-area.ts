/**
 * 単一エリア取得スクリプト
 *
 * @description 1エリア分の EJScreen 指標を取得し、サマリーと全項目を表示する
 * - CLI引数: --area-id=ID（必須）, --area-type=blockgroup|city, --name=NAME
 */

import { loadConfig } from '../../src/lib/config';
import { createEJScreenClient } from '../../src/lib/ejscreen/client';
import { flattenResponse } from '../../src/lib/ejscreen/response';
import { formatResponseSummary } from '../../src/lib/ejscreen/summary';
import { AREA_TYPES, type AreaType } from '../../src/lib/ejscreen/types';
import { createLogger } from '../../src/lib/utils/logger';
import { getStringFlag, loadEnv, parseFlags } from './_shared';

const logger = createLogger({ module: 'fetch-area' });

function isAreaType(value: string): value is AreaType {
  return AREA_TYPES.some((type) => type === value);
}

function parseArgs(): { areaId: string; areaType: AreaType; name?: string } {
  const flags = parseFlags();

  const areaId = getStringFlag(flags, 'area-id');
  if (!areaId) {
    throw new Error('--area-id is required');
  }

  const rawType = getStringFlag(flags, 'area-type') ?? 'blockgroup';
  if (!isAreaType(rawType)) {
    throw new Error(`Invalid area-type: ${rawType}. Valid values: ${AREA_TYPES.join(', ')}`);
  }

  return { areaId, areaType: rawType, name: getStringFlag(flags, 'name') };
}

async function main(): Promise<void> {
  loadEnv();
  const { areaId, areaType, name } = parseArgs();
  const config = loadConfig();

  const client = createEJScreenClient({ api: config.api });
  const outcome = await client.fetchArea(areaId, areaType, name);

  if (!outcome.ok) {
    throw outcome.failure;
  }

  for (const line of formatResponseSummary(outcome.response)) {
    console.log(line);
  }
  console.log();
  console.log(
    JSON.stringify({ areaId, areaType, fields: flattenResponse(outcome.response) }, null, 2)
  );
}

main()
  .then(() => {
    process.exit(0);
  })
  .catch((error) => {
    logger.error('Script failed', { error: error instanceof Error ? error.message : String(error) });
    process.exit(1);
  });
