import type { SheetsGateway } from './client';
import type { StatusColumns, StatusUpdate } from '../types/domain';

const pad = (n: number) => String(n).padStart(2, '0');

// YYYY-MM-DD HH:MM:SS（ローカル時刻）
export function formatTimestamp(d: Date): string {
  return `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())} `
       + `${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}`;
}

// ヘッダ1行 + 1始まり
export function sheetRowFor(rowNum: number): number {
  return rowNum + 2;
}

export function statusRange(columns: StatusColumns, row: number): string {
  return `${columns.STATUS_COLUMN}${row}:${columns.MESSAGE_COLUMN}${row}`;
}

export type StatusTarget = {
  spreadsheetUrl: string;
  worksheet: string;
  rowNum: number;
  columns: StatusColumns;
};

/** その行の status / updated_at / message の3セルだけを書き換える */
export async function writeStatus(
  sheets: SheetsGateway,
  target: StatusTarget,
  update: StatusUpdate,
  now: Date = new Date()
): Promise<void> {
  const row = sheetRowFor(target.rowNum);
  await sheets.updateValues(
    target.spreadsheetUrl,
    target.worksheet,
    statusRange(target.columns, row),
    [[update.status, formatTimestamp(now), update.message]]
  );
}
