/**
 * HTTP リクエストユーティリティ
 *
 * @description 1回だけ fetch し、2xx 以外はステータスコード付きの HttpError にする。
 * 再試行はしない。
 */

/**
 * 2xx 以外の HTTP 応答
 */
export class HttpError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number
  ) {
    super(message);
    this.name = 'HttpError';
  }
}

export interface FetchOnceOptions {
  /** タイムアウト（ミリ秒）。省略時はシグナルを付けない */
  timeoutMs?: number;
}

/**
 * 指定時間スリープ
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * fetch を1回だけ実行
 *
 * 2xx 以外は本文を破棄して HttpError を投げる。
 * ネットワークエラー・タイムアウトはそのまま投げる。
 *
 * @example
 * ```typescript
 * const response = await fetchOnce(url, { headers: { Accept: 'application/json' } }, {
 *   timeoutMs: 30000,
 * });
 * ```
 */
export async function fetchOnce(
  url: string,
  init?: RequestInit,
  options?: FetchOnceOptions
): Promise<Response> {
  const response = await fetch(url, {
    ...init,
    ...(options?.timeoutMs !== undefined
      ? { signal: AbortSignal.timeout(options.timeoutMs) }
      : {}),
  });

  if (!response.ok) {
    await response.body?.cancel();
    throw new HttpError(`HTTP ${response.status}: ${response.statusText}`, response.status);
  }

  return response;
}
