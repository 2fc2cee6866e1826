import { z } from 'zod';
import type { SheetsGateway } from '../../../src/sheets/client';
import { writeStatus } from '../../../src/sheets/status';
import { DUBBING_CONFIG_KEY } from '../../../src/config/defaults';
import { reportFailure } from '../../../src/errors';
import type { JobPayload } from '../../../src/types/domain';
import { processLine, type ProcessLineDeps } from './processLine';
import { FAILED_STATUS_FOR_REPORTING } from './constants';

export class PayloadDecodeError extends Error {
  constructor(message: string, cause?: unknown) {
    super(`Malformed job message: ${message}`, { cause });
    this.name = 'PayloadDecodeError';
  }
}

// Pub/Sub push（Eventarc 経由も同じ形）
export const PushEnvelopeSchema = z.object({
  message: z.object({
    data: z.string().min(1),
    messageId: z.string().optional(),
    attributes: z.record(z.string()).optional(),
  }),
  subscription: z.string().optional(),
});

export const JobPayloadSchema = z.object({
  worksheet_url: z.string().min(1),
  line_config: z
    .object({ row_num: z.number().int().nonnegative() })
    .catchall(z.union([z.string(), z.number()])),
  tool_config: z
    .record(z.string())
    .refine((c) => Boolean(c[DUBBING_CONFIG_KEY]), `${DUBBING_CONFIG_KEY} is required`),
  status_columns: z.object({
    STATUS_COLUMN: z.string().min(1),
    UPDATED_AT_COLUMN: z.string().min(1),
    MESSAGE_COLUMN: z.string().min(1),
  }),
});

export function decodePushMessage(envelope: unknown): JobPayload {
  const parsedEnvelope = PushEnvelopeSchema.safeParse(envelope);
  if (!parsedEnvelope.success) {
    throw new PayloadDecodeError(parsedEnvelope.error.issues.map((i) => i.message).join('; '));
  }

  let json: unknown;
  try {
    json = JSON.parse(Buffer.from(parsedEnvelope.data.message.data, 'base64').toString('utf-8'));
  } catch (err) {
    throw new PayloadDecodeError('data is not base64-encoded JSON', err);
  }

  const payload = JobPayloadSchema.safeParse(json);
  if (!payload.success) {
    throw new PayloadDecodeError(
      payload.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')
    );
  }
  return payload.data;
}

export type WorkerDeps = ProcessLineDeps & {
  sheets: SheetsGateway;
};

export type HttpResult = { code: number; body: string };

/**
 * 1 メッセージ = 1 行。最終ステータスを必ず書き戻してから応答する。
 * 200 以外を返すと Pub/Sub が再配信する。
 */
export async function handleDubbingMessage(envelope: unknown, deps: WorkerDeps): Promise<HttpResult> {
  let payload: JobPayload;
  try {
    payload = decodePushMessage(envelope);
  } catch (err) {
    reportFailure(FAILED_STATUS_FOR_REPORTING, undefined, err);
    return { code: 400, body: 'Bad Request' };
  }

  const { worksheet_url, line_config, tool_config, status_columns } = payload;
  console.log(`📥 Received row ${line_config.row_num} of ${worksheet_url}`);

  const outcome = await processLine(deps, tool_config, line_config, worksheet_url);

  try {
    await writeStatus(
      deps.sheets,
      {
        spreadsheetUrl: worksheet_url,
        worksheet: tool_config[DUBBING_CONFIG_KEY] ?? '',
        rowNum: line_config.row_num,
        columns: status_columns,
      },
      outcome
    );
  } catch (err) {
    reportFailure(FAILED_STATUS_FOR_REPORTING, worksheet_url, err);
    return { code: 500, body: 'Error' };
  }

  return { code: 200, body: 'OK' };
}
