import { google, type sheets_v4 } from 'googleapis';

/**
 * スプレッドシートへの最小限のアクセス口。
 * 各エントリポイントで生成して明示的に渡す（モジュール共有のクライアントは持たない）。
 */
export interface SheetsGateway {
  /** worksheet 全体の値を 2 次元配列で返す。worksheet が空なら先頭シート */
  getValues(spreadsheetUrl: string, worksheet: string): Promise<string[][]>;
  updateValues(spreadsheetUrl: string, worksheet: string, range: string, values: string[][]): Promise<void>;
}

const SCOPES = [
  'https://www.googleapis.com/auth/spreadsheets',
  'https://www.googleapis.com/auth/drive',
];

export function spreadsheetIdFromUrl(urlOrId: string): string {
  const m = urlOrId.match(/\/spreadsheets\/d\/([a-zA-Z0-9_-]+)/);
  if (m?.[1]) return m[1];
  if (/^[a-zA-Z0-9_-]+$/.test(urlOrId)) return urlOrId;
  throw new Error(`Invalid spreadsheet URL: ${urlOrId}`);
}

// 'Jobs' -> "'Jobs'!A1:R3" のようにシート名をクォートする
export function a1Range(worksheet: string, range?: string): string {
  const quoted = `'${worksheet.replace(/'/g, "''")}'`;
  return range ? `${quoted}!${range}` : quoted;
}

function cellToString(cell: unknown): string {
  if (cell === null || cell === undefined) return '';
  return typeof cell === 'string' ? cell : String(cell);
}

export class GoogleSheetsGateway implements SheetsGateway {
  private readonly api: sheets_v4.Sheets;

  constructor(api?: sheets_v4.Sheets) {
    // 認証は Application Default Credentials（Cloud Run 上ではサービスアカウント）
    this.api = api ?? google.sheets({ version: 'v4', auth: new google.auth.GoogleAuth({ scopes: SCOPES }) });
  }

  async getValues(spreadsheetUrl: string, worksheet: string): Promise<string[][]> {
    const spreadsheetId = spreadsheetIdFromUrl(spreadsheetUrl);
    const sheetName = worksheet || (await this.firstSheetTitle(spreadsheetId));
    const res = await this.api.spreadsheets.values.get({
      spreadsheetId,
      range: a1Range(sheetName),
      valueRenderOption: 'FORMATTED_VALUE',
    });
    const rows: unknown[][] = res.data.values ?? [];
    return rows.map((row) => row.map(cellToString));
  }

  async updateValues(spreadsheetUrl: string, worksheet: string, range: string, values: string[][]): Promise<void> {
    await this.api.spreadsheets.values.update({
      spreadsheetId: spreadsheetIdFromUrl(spreadsheetUrl),
      range: a1Range(worksheet, range),
      valueInputOption: 'RAW',
      requestBody: { values },
    });
  }

  private async firstSheetTitle(spreadsheetId: string): Promise<string> {
    const { data } = await this.api.spreadsheets.get({ spreadsheetId, fields: 'sheets.properties.title' });
    const title = data.sheets?.[0]?.properties?.title;
    if (!title) throw new Error(`Spreadsheet ${spreadsheetId} has no worksheets`);
    return title;
  }
}
