/**
 * EJScreen スクリプト共通ユーティリティ
 */

import { config } from 'dotenv';
import { resolve } from 'path';
import { sendPipelineFailureEmail, type PipelineName } from '../../src/lib/notification/email';

/**
 * 環境変数ロード済みフラグ（重複ロード防止）
 */
let envLoaded = false;

/**
 * プロジェクトルートの .env.local を読み込む（存在しなければ何もしない）
 */
export function loadEnv(): void {
  if (envLoaded) return;

  const envPath = resolve(process.cwd(), '.env.local');
  config({ path: envPath });

  envLoaded = true;
}

export type CliFlags = Record<string, string | true>;

/**
 * `--key=value` / `--flag` 形式の CLI 引数をパース
 *
 * @example
 * ```
 * parseFlags(['--area-id=110010074011', '--allow-fanout'])
 * // => { 'area-id': '110010074011', 'allow-fanout': true }
 * ```
 */
export function parseFlags(argv: readonly string[] = process.argv.slice(2)): CliFlags {
  const flags: CliFlags = {};
  for (const arg of argv) {
    if (!arg.startsWith('--')) continue;
    const body = arg.slice(2);
    const eq = body.indexOf('=');
    if (eq === -1) {
      flags[body] = true;
    } else {
      flags[body.slice(0, eq)] = body.slice(eq + 1);
    }
  }
  return flags;
}

/**
 * 文字列フラグを取得（値なしの `--key` はエラー）
 */
export function getStringFlag(flags: CliFlags, name: string): string | undefined {
  const value = flags[name];
  if (value === true) {
    throw new Error(`--${name} requires a value (--${name}=...)`);
  }
  return value;
}

/**
 * 0以上の整数フラグを取得
 */
export function getIntegerFlag(flags: CliFlags, name: string): number | undefined {
  const raw = getStringFlag(flags, name);
  if (raw === undefined) return undefined;

  const value = parseInt(raw, 10);
  if (isNaN(value) || value < 0 || String(value) !== raw) {
    throw new Error(`Invalid --${name}: ${raw}. Must be a non-negative integer.`);
  }
  return value;
}

/**
 * スクリプト例外時の失敗通知（通知の失敗はスクリプト結果に影響させない）
 */
export async function notifyScriptFailure(
  pipeline: PipelineName,
  runId: string,
  error: unknown
): Promise<void> {
  await sendPipelineFailureEmail({
    pipeline,
    runId,
    error: error instanceof Error ? error.message : String(error),
    timestamp: new Date(),
  });
}
