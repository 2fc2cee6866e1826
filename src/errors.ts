import { SHARE_HINT } from './config/defaults';

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err ?? '');
}

// 1文字以下のメッセージは役に立たないので共有設定のヒントに置き換える
export function describeFailure(err: unknown): string {
  const message = errorMessage(err);
  return message.length > 1 ? message : SHARE_HINT;
}

export type FailureReport = {
  worksheet_url: string | null;
  status: string;
  message: string;
  success: false;
};

/**
 * 行 / ジョブ単位の失敗をログに残し、シートに書くメッセージを返す。
 * 自由文と構造化 JSON の両方を出す（Cloud Logging でどちらでも拾えるように）。
 */
export function reportFailure(tag: string, worksheetUrl: string | undefined, err: unknown): string {
  console.error(`❌ ${tag}:`, err);
  const payload: FailureReport = {
    worksheet_url: worksheetUrl || null,
    status: tag,
    message: describeFailure(err),
    success: false,
  };
  console.error(`${tag}: ${JSON.stringify(payload)}`);
  return payload.message;
}
