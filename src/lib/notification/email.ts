/**
 * メール通知（Resend）
 *
 * @description パイプライン失敗時のメール通知
 * @see https://resend.com/docs
 */

import { Resend } from 'resend';
import { createLogger } from '../utils/logger';
import { getPipelineFailureEmailTemplate } from './templates';

const logger = createLogger({ module: 'email' });

export type PipelineName = 'study-data' | 'merge-boundaries' | 'filter-state' | 'fetch-area';

export interface PipelineFailureNotification {
  /** パイプライン名 */
  pipeline: PipelineName;
  /** 実行ID */
  runId: string;
  /** エラーメッセージ（複数ある場合は改行区切り） */
  error: string;
  /** 発生時刻 */
  timestamp: Date;
  /** 件数などの補足情報 */
  details?: Record<string, string | number>;
}

function getResendClient(): Resend | null {
  const apiKey = process.env.RESEND_API_KEY;
  if (!apiKey) {
    logger.warn('RESEND_API_KEY is not set, email notifications disabled');
    return null;
  }
  return new Resend(apiKey);
}

function getAlertEmailTo(): string | null {
  const email = process.env.ALERT_EMAIL_TO;
  if (!email) {
    logger.warn('ALERT_EMAIL_TO is not set');
    return null;
  }
  return email;
}

function getEmailFrom(): string {
  return process.env.EMAIL_FROM ?? 'EJScreen Pipeline <noreply@resend.dev>';
}

async function send(subject: string, html: string, pipeline: PipelineName): Promise<boolean> {
  const resend = getResendClient();
  const to = getAlertEmailTo();

  if (!resend || !to) {
    logger.info('Email notification skipped (not configured)', { pipeline });
    return false;
  }

  try {
    const result = await resend.emails.send({
      from: getEmailFrom(),
      to: [to],
      subject,
      html,
    });

    if (result.error) {
      logger.error('Failed to send notification email', { pipeline, error: result.error.message });
      return false;
    }

    logger.info('Notification email sent', { pipeline, emailId: result.data?.id });
    return true;
  } catch (error) {
    // 通知失敗はログに残すだけでパイプラインの結果には影響させない
    logger.error('Error sending notification email', { pipeline, error });
    return false;
  }
}

/**
 * パイプライン失敗通知メールを送信
 *
 * @returns 送信成功した場合 true
 */
export async function sendPipelineFailureEmail(
  data: PipelineFailureNotification
): Promise<boolean> {
  const { subject, html } = getPipelineFailureEmailTemplate(data);
  return send(subject, html, data.pipeline);
}
