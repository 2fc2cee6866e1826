import { z } from 'zod';
import type { SheetsGateway } from '../../../src/sheets/client';
import type { Publisher } from './pubsub';
import { readDubbingConfig, readToolConfig } from '../../../src/sheets/loader';
import { writeStatus } from '../../../src/sheets/status';
import { parseJobSpec } from '../../../src/config/jobSpec';
import { DEFAULT_DUBBING_CONFIG, DUBBING_CONFIG_KEY, STATUS } from '../../../src/config/defaults';
import { describeFailure, reportFailure } from '../../../src/errors';
import type { JobPayload, LineConfig, StatusColumns, ToolConfig } from '../../../src/types/domain';

export const FAILED_STATUS_FOR_REPORTING = 'ERROR_IN_DUBBING_SPLITTER';

export type SplitterDeps = {
  sheets: SheetsGateway;
  publisher: Publisher;
  topic: string;
  statusColumns: StatusColumns;
};

export type DispatchSummary = {
  published: number[];
  failed: number[];
};

export const SplitRequestSchema = z.object({
  worksheet_url: z.string().min(1),
  tool_config_sheet_name: z.string(),
});

export type SplitRequest = z.infer<typeof SplitRequestSchema>;

export function buildPayload(
  worksheetUrl: string,
  lineConfig: LineConfig,
  rowNum: number,
  toolConfig: ToolConfig,
  statusColumns: StatusColumns
): JobPayload {
  return {
    worksheet_url: worksheetUrl,
    line_config: { ...lineConfig, row_num: rowNum },
    tool_config: toolConfig,
    status_columns: statusColumns,
  };
}

/**
 * 行ごとに payload を作って publish する（シート順・逐次）。
 * 失敗した行だけ FAILED を書く。成功時はシートに触らない（worker が最終結果を書く）。
 * ある行の失敗で後続の行を止めない。
 */
export async function processLines(
  deps: SplitterDeps,
  worksheetUrl: string,
  toolConfig: ToolConfig,
  lines: LineConfig[]
): Promise<DispatchSummary> {
  const summary: DispatchSummary = { published: [], failed: [] };
  const worksheet = toolConfig[DUBBING_CONFIG_KEY] ?? '';

  for (const [rowNum, lineConfig] of lines.entries()) {
    const payload = buildPayload(worksheetUrl, lineConfig, rowNum, toolConfig, deps.statusColumns);
    try {
      // 壊れた行は publish せずにここで弾く
      parseJobSpec(payload.line_config);
      const messageId = await deps.publisher.publish(deps.topic, payload);
      console.log(`📤 Row ${rowNum} published (message ${messageId})`);
      summary.published.push(rowNum);
    } catch (err) {
      summary.failed.push(rowNum);
      const message = reportFailure(FAILED_STATUS_FOR_REPORTING, worksheetUrl, err);
      try {
        await writeStatus(
          deps.sheets,
          { spreadsheetUrl: worksheetUrl, worksheet, rowNum, columns: deps.statusColumns },
          { status: STATUS.FAILED, message }
        );
      } catch (writeErr) {
        console.error(`💀 Could not write status for row ${rowNum}:`, writeErr);
      }
    }
  }

  return summary;
}

export type HttpResult = { code: number; body: string };

export async function handleSplitRequest(body: unknown, deps: SplitterDeps): Promise<HttpResult> {
  try {
    const request = SplitRequestSchema.parse(body);
    const toolConfig = await readToolConfig({}, deps.sheets, request.worksheet_url, request.tool_config_sheet_name);

    const dubbingSheet = toolConfig[DUBBING_CONFIG_KEY];
    if (!dubbingSheet) {
      throw new Error(`${DUBBING_CONFIG_KEY} is not set in ${request.tool_config_sheet_name}`);
    }

    const lines = await readDubbingConfig(DEFAULT_DUBBING_CONFIG, deps.sheets, request.worksheet_url, dubbingSheet);
    console.log(`📋 ${lines.length} row(s) read from "${dubbingSheet}"`);

    const summary = await processLines(deps, request.worksheet_url, toolConfig, lines);
    console.log(`✅ Dispatch finished: ${summary.published.length} published, ${summary.failed.length} failed`);
    return { code: 200, body: 'OK' };
  } catch (err) {
    console.error('❌ Split request failed:', err);
    return { code: 500, body: `Error ${describeFailure(err)}` };
  }
}
