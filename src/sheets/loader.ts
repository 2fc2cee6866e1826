import type { SheetsGateway } from './client';
import type { LineConfig, ToolConfig } from '../types/domain';

export type SheetRecord = Record<string, string>;

/**
 * 1 行目をヘッダとして、残りの行をヘッダ名キーのレコードにする。
 * 短い行は "" で埋め、ヘッダより長い部分は捨てる。
 */
export function tableToRecords(values: string[][]): SheetRecord[] {
  const [header, ...rows] = values;
  if (!header) return [];
  return rows.map((row) => {
    const record: SheetRecord = {};
    header.forEach((name, i) => {
      record[name] = row[i] ?? '';
    });
    return record;
  });
}

export async function loadTable(
  sheets: SheetsGateway,
  spreadsheetUrl: string,
  worksheet: string
): Promise<SheetRecord[]> {
  const values = await sheets.getValues(spreadsheetUrl, worksheet);
  return tableToRecords(values);
}

// シートに値があり空でなければそれ、なければ既定値。テンプレートにないキーは捨てる
export function mergeWithDefaults(record: SheetRecord, defaults: Readonly<Record<string, string>>): LineConfig {
  const line: LineConfig = {};
  for (const key of Object.keys(defaults)) {
    const value = record[key];
    line[key] = value ? value : defaults[key] ?? '';
  }
  return line;
}

/** variable / value の2列シートを defaults に上書きしたマップを返す */
export async function readToolConfig(
  defaults: Readonly<ToolConfig>,
  sheets: SheetsGateway,
  spreadsheetUrl: string,
  sheetName: string
): Promise<ToolConfig> {
  const rows = await loadTable(sheets, spreadsheetUrl, sheetName);
  const config: ToolConfig = { ...defaults };
  for (const row of rows) {
    const variable = row['variable'];
    if (variable) config[variable] = row['value'] ?? '';
  }
  return config;
}

export async function readDubbingConfig(
  defaults: Readonly<Record<string, string>>,
  sheets: SheetsGateway,
  spreadsheetUrl: string,
  sheetName: string
): Promise<LineConfig[]> {
  const rows = await loadTable(sheets, spreadsheetUrl, sheetName);
  return rows.map((row) => mergeWithDefaults(row, defaults));
}
