// splitter と worker で共有するワイヤ型（Pub/Sub メッセージの中身）

export type StatusColumns = {
  STATUS_COLUMN: string;
  UPDATED_AT_COLUMN: string;
  MESSAGE_COLUMN: string;
};

// ツール全体の設定（variable / value の2列シート）
export type ToolConfig = Record<string, string>;

// 1行 = 1ジョブ。値はシートのまま文字列で運ぶ
export type LineConfig = Record<string, string>;

// publish 時に row_num（0始まりのデータ行番号）を付ける
export type DispatchedLineConfig = {
  [field: string]: string | number;
  row_num: number;
};

export type JobPayload = {
  worksheet_url: string;
  line_config: DispatchedLineConfig;
  tool_config: ToolConfig;
  status_columns: StatusColumns;
};

export type RowStatus = 'OK' | 'FAILED' | 'PROCESSING';

export type StatusUpdate = {
  status: RowStatus;
  message: string;
};
