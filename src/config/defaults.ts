import type { StatusColumns } from '../types/domain';

export const STATUS = {
  OK: 'OK',
  FAILED: 'FAILED',
  PROCESSING: 'PROCESSING',
} as const;

export const VOICE_PROVIDER = {
  ELEVENLABS: 'ElevenLabs',
  GOOGLE: 'Google',
} as const;

// シートを service account に共有し忘れると例外メッセージが空になるため、その時に出す文言
export const SHARE_HINT = 'Check you shared the spreadsheet with the service account';

export const DEFAULT_STATUS_COLUMNS: StatusColumns = {
  STATUS_COLUMN: 'P',
  UPDATED_AT_COLUMN: 'Q',
  MESSAGE_COLUMN: 'R',
};

// tool_config シート上で行ごとの設定シート名を指すキー
export const DUBBING_CONFIG_KEY = 'DUBBING_CONFIG';

/**
 * 行設定のテンプレート。シート側で空欄 / 列なしの項目はこの値になる。
 * リスト・JSON 系もシートと同じく文字列で持つ（型付けは jobSpec.ts で一度だけ行う）。
 */
export const DEFAULT_DUBBING_CONFIG = {
  campaign_name: 'Default',
  custom_tag: 'default_tag',
  original_language: '',
  target_language: '[]',
  video_url: '',
  script: '[]',
  target_gender: '',
  voice_provider: VOICE_PROVIDER.GOOGLE,
  clone_original_voices: 'False',
  preferred_voice_family: '[]',
  voices: '[]',
  output_naming_convention: '',
  output_bucket: '',
  status: '',
  output_file_path: '',
  number_of_speakers: '1',
  diarization_instructions: '',
  translation_instructions: '',
  no_dubbing_phrases: '[]',
  merge_utterances: 'True',
  minimum_merge_threshold: '0.001',
  adjust_speed: 'True',
  vocals_volume_adjustment: '5.0',
  background_volume_adjustment: '0.0',
  gemini_model_name: 'gemini-1.5-flash',
  gemini_temperature: '1.0',
  gemini_top_p: '0.95',
  gemini_top_k: '64',
  gemini_maximum_output_tokens: '8192',
  clean_up: 'False',
  with_verification: 'False',
  tts_params: '{}',
} as const satisfies Record<string, string>;

export type DubbingConfigField = keyof typeof DEFAULT_DUBBING_CONFIG;
