export const FAILED_STATUS_FOR_REPORTING = 'ERROR_IN_DUBBING_WORKER';

// tool_config 上のキー
export const TOOL_KEYS = {
  GEMINI: 'AI_STUDIO_API_KEY',
  HUGGING_FACE: 'HUGGING_FACE_ACCESS_TOKEN',
  ELEVENLABS: 'ELEVEN_LABS_API_KEY',
} as const;
