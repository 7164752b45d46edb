/**
 * ファイルユーティリティ
 */

import { existsSync } from 'fs';
import { mkdir, writeFile } from 'fs/promises';
import { dirname } from 'path';
import { MissingInputError } from '../errors';

/**
 * 入力ファイルの存在を確認（読み込み前に呼ぶ）
 *
 * @throws {MissingInputError} 存在しない場合
 */
export function assertInputExists(filePath: string, label?: string): void {
  if (!existsSync(filePath)) {
    throw new MissingInputError(filePath, label);
  }
}

/**
 * JSON を書き出す（親ディレクトリは必要に応じて作成）
 */
export async function writeJsonFile(filePath: string, value: unknown): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });
  await writeFile(filePath, `${JSON.stringify(value)}\n`, 'utf-8');
}
