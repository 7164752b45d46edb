/**
 * メールテンプレート
 *
 * @description パイプライン通知用のHTMLメールテンプレート
 */

import type { PipelineFailureNotification, PipelineName } from './email';

/**
 * HTMLエスケープ
 */
export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#039;');
}

/**
 * パイプライン名を日本語に変換
 */
export function getPipelineLabel(pipeline: PipelineName): string {
  const labels: Record<PipelineName, string> = {
    'study-data': '調査地域データ取得',
    'merge-boundaries': '境界データ結合',
    'filter-state': '州別CSVフィルタ',
    'fetch-area': '単一エリア取得',
  };
  return labels[pipeline];
}

function renderDetailRows(details: Record<string, string | number> | undefined): string {
  if (!details) return '';
  return Object.entries(details)
    .map(
      ([label, value]) => `
    <tr>
      <td style="padding: 12px; border-bottom: 1px solid #e5e7eb; font-weight: bold;">
        ${escapeHtml(label)}
      </td>
      <td style="padding: 12px; border-bottom: 1px solid #e5e7eb;">
        ${escapeHtml(String(value))}
      </td>
    </tr>`
    )
    .join('');
}

/**
 * 失敗通知メールテンプレート
 */
export function getPipelineFailureEmailTemplate(
  data: PipelineFailureNotification
): { subject: string; html: string } {
  const label = getPipelineLabel(data.pipeline);
  const timestamp = data.timestamp.toISOString();

  const subject = `[ALERT] ${data.pipeline} 失敗 - ${data.runId}`;

  const html = `
<!DOCTYPE html>
<html lang="ja">
<head>
  <meta charset="UTF-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <title>パイプライン失敗通知</title>
</head>
<body style="font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, sans-serif; line-height: 1.6; color: #333; max-width: 600px; margin: 0 auto; padding: 20px;">
  <div style="background-color: #fef2f2; border: 1px solid #fecaca; border-radius: 8px; padding: 20px; margin-bottom: 20px;">
    <h1 style="color: #dc2626; margin: 0 0 10px 0; font-size: 24px;">
      パイプライン失敗通知
    </h1>
    <p style="color: #991b1b; margin: 0;">
      ${label} の実行に失敗しました
    </p>
  </div>

  <table style="width: 100%; border-collapse: collapse; margin-bottom: 20px;">
    <tr>
      <td style="padding: 12px; border-bottom: 1px solid #e5e7eb; font-weight: bold; width: 140px;">
        パイプライン
      </td>
      <td style="padding: 12px; border-bottom: 1px solid #e5e7eb;">
        ${escapeHtml(data.pipeline)}
      </td>
    </tr>
    <tr>
      <td style="padding: 12px; border-bottom: 1px solid #e5e7eb; font-weight: bold;">
        Run ID
      </td>
      <td style="padding: 12px; border-bottom: 1px solid #e5e7eb; font-family: monospace; font-size: 14px;">
        ${escapeHtml(data.runId)}
      </td>
    </tr>${renderDetailRows(data.details)}
    <tr>
      <td style="padding: 12px; border-bottom: 1px solid #e5e7eb; font-weight: bold;">
        発生時刻
      </td>
      <td style="padding: 12px; border-bottom: 1px solid #e5e7eb;">
        ${timestamp}
      </td>
    </tr>
  </table>

  <div style="background-color: #f9fafb; border: 1px solid #e5e7eb; border-radius: 8px; padding: 16px; margin-bottom: 20px;">
    <h3 style="margin: 0 0 10px 0; color: #374151; font-size: 16px;">
      エラー内容
    </h3>
    <pre style="margin: 0; font-size: 13px; white-space: pre-wrap; word-break: break-word; color: #dc2626; background-color: #fff; padding: 12px; border-radius: 4px; border: 1px solid #fecaca;">
${escapeHtml(data.error)}
    </pre>
  </div>

  <div style="color: #6b7280; font-size: 14px;">
    <p style="margin: 0 0 10px 0;">
      <strong>対応方法:</strong>
    </p>
    <ol style="margin: 0; padding-left: 20px;">
      <li>ログの <code>runId</code> で該当実行のエラー詳細を確認</li>
      <li>入力ファイルのパスと EJScreen API の応答状況を確認</li>
      <li>必要に応じて手動で再実行</li>
    </ol>
  </div>

  <hr style="border: none; border-top: 1px solid #e5e7eb; margin: 20px 0;">

  <p style="color: #9ca3af; font-size: 12px; margin: 0;">
    このメールは EJScreen 調査データパイプラインから自動送信されています。
  </p>
</body>
</html>
`;

  return { subject, html };
}
