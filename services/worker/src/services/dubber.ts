import { spawn } from 'node:child_process';
import { z } from 'zod';
import type { JobSpec, Utterance, VoiceAssignment } from '../../../../src/config/jobSpec';
import type { ToolConfig } from '../../../../src/types/domain';
import { TOOL_KEYS } from '../constants';

// 外部の吹き替えエンジンに渡す設定（1言語 = 1インスタンス分）
export type DubberSettings = {
  inputFile: string;
  outputDirectory: string;
  advertiserName: string;
  originalLanguage: string;
  targetLanguage: string;
  numberOfSpeakers: number;
  geminiToken?: string;
  huggingFaceToken?: string;
  noDubbingPhrases: string[];
  diarizationInstructions: string;
  translationInstructions: string;
  mergeUtterances: boolean;
  minimumMergeThreshold: number;
  preferredVoices: string[];
  adjustSpeed: boolean;
  vocalsVolumeAdjustment: number;
  backgroundVolumeAdjustment: number;
  cleanUp: boolean;
  geminiModelName: string;
  temperature: number;
  topP: number;
  topK: number;
  maxOutputTokens: number;
  useElevenlabs: boolean;
  elevenlabsToken?: string;
  elevenlabsCloneVoices: boolean;
  withVerification: boolean;
};

export type ScriptDubRequest = {
  script: Utterance[];
  ttsParams: Record<string, unknown>;
  assignedVoice: VoiceAssignment;
};

export type DubResult = {
  /** エンジンが書き出した吹き替え済み動画のローカルパス */
  videoFile: string;
};

export interface DubbingEngine {
  /** 文字起こし・翻訳・TTS まで全部エンジンに任せる */
  dub(settings: DubberSettings): Promise<DubResult>;
  dubFromScript(settings: DubberSettings, request: ScriptDubRequest): Promise<DubResult>;
  /** 一時ファイルの後始末。1 回の起動につき 1 回だけ呼ばれる */
  cleanUp(): Promise<void>;
}

export type DubbingEngineFactory = () => DubbingEngine;

function optional(value: string | undefined): string | undefined {
  return value ? value : undefined;
}

export function buildDubberSettings(
  toolConfig: ToolConfig,
  spec: JobSpec,
  targetLanguage: string,
  inputFile: string,
  outputDirectory: string
): DubberSettings {
  return {
    inputFile,
    outputDirectory,
    advertiserName: spec.campaignName,
    originalLanguage: spec.originalLanguage,
    targetLanguage,
    numberOfSpeakers: spec.numberOfSpeakers,
    geminiToken: optional(toolConfig[TOOL_KEYS.GEMINI]),
    huggingFaceToken: optional(toolConfig[TOOL_KEYS.HUGGING_FACE]),
    noDubbingPhrases: spec.noDubbingPhrases,
    diarizationInstructions: spec.diarizationInstructions,
    translationInstructions: spec.translationInstructions,
    mergeUtterances: spec.mergeUtterances,
    minimumMergeThreshold: spec.minimumMergeThreshold,
    preferredVoices: spec.preferredVoiceFamily,
    adjustSpeed: spec.adjustSpeed,
    vocalsVolumeAdjustment: spec.vocalsVolumeAdjustment,
    backgroundVolumeAdjustment: spec.backgroundVolumeAdjustment,
    cleanUp: spec.cleanUp,
    geminiModelName: spec.geminiModelName,
    temperature: spec.geminiTemperature,
    topP: spec.geminiTopP,
    topK: spec.geminiTopK,
    maxOutputTokens: spec.geminiMaxOutputTokens,
    useElevenlabs: spec.useElevenlabs,
    elevenlabsToken: optional(toolConfig[TOOL_KEYS.ELEVENLABS]),
    elevenlabsCloneVoices: spec.cloneOriginalVoices,
    withVerification: spec.withVerification,
  };
}

// エンジン CLI 側の引数名（snake_case）
export function toEngineSettings(s: DubberSettings): Record<string, unknown> {
  return {
    input_file: s.inputFile,
    output_directory: s.outputDirectory,
    advertiser_name: s.advertiserName,
    original_language: s.originalLanguage,
    target_language: s.targetLanguage,
    number_of_speakers: s.numberOfSpeakers,
    gemini_token: s.geminiToken ?? null,
    hugging_face_token: s.huggingFaceToken ?? null,
    no_dubbing_phrases: s.noDubbingPhrases,
    diarization_instructions: s.diarizationInstructions,
    translation_instructions: s.translationInstructions,
    merge_utterances: s.mergeUtterances,
    minimum_merge_threshold: s.minimumMergeThreshold,
    preferred_voices: s.preferredVoices,
    adjust_speed: s.adjustSpeed,
    vocals_volume_adjustment: s.vocalsVolumeAdjustment,
    background_volume_adjustment: s.backgroundVolumeAdjustment,
    clean_up: s.cleanUp,
    gemini_model_name: s.geminiModelName,
    temperature: s.temperature,
    top_p: s.topP,
    top_k: s.topK,
    max_output_tokens: s.maxOutputTokens,
    use_elevenlabs: s.useElevenlabs,
    elevenlabs_token: s.elevenlabsToken ?? null,
    elevenlabs_clone_voices: s.elevenlabsCloneVoices,
    with_verification: s.withVerification,
  };
}

export type EngineRequest =
  | { action: 'dub_ad'; settings: Record<string, unknown> }
  | {
      action: 'dub_ad_from_script';
      settings: Record<string, unknown>;
      script_with_timestamps: Utterance[];
      assigned_voice: VoiceAssignment;
      elevenlabs_text_to_speech_parameters?: Record<string, unknown>;
      google_text_to_speech_parameters?: Record<string, unknown>;
    }
  | { action: 'clean_up'; output_directory: string; clean_up: boolean };

export function scriptRequest(settings: DubberSettings, request: ScriptDubRequest): EngineRequest {
  const base = {
    action: 'dub_ad_from_script' as const,
    settings: toEngineSettings(settings),
    script_with_timestamps: request.script,
    assigned_voice: request.assignedVoice,
  };
  return settings.useElevenlabs
    ? { ...base, elevenlabs_text_to_speech_parameters: request.ttsParams }
    : { ...base, google_text_to_speech_parameters: request.ttsParams };
}

const EngineOutputSchema = z.object({ video_file: z.string().min(1) });

// stdout の最後の JSON 行を結果として読む（それ以前の行はエンジンのログ）
export function parseEngineOutput(stdout: string): DubResult {
  const lines = stdout.split('\n').map((l) => l.trim()).filter(Boolean);
  const last = lines[lines.length - 1];
  if (!last) throw new Error('Dubbing engine produced no output');
  let parsed: unknown;
  try {
    parsed = JSON.parse(last);
  } catch {
    throw new Error(`Dubbing engine output is not JSON: ${last}`);
  }
  return { videoFile: EngineOutputSchema.parse(parsed).video_file };
}

/**
 * 外部エンジンをサブプロセスとして起動する実装。
 * リクエストは stdin に JSON 1 個、結果は stdout の最終行 {"video_file": "..."}。
 */
export class CommandDubbingEngine implements DubbingEngine {
  private readonly command: string;
  private readonly args: string[];
  // 作業ディレクトリ -> その行の clean_up 設定
  private readonly usedDirectories = new Map<string, boolean>();

  constructor(commandLine: string) {
    const [command, ...args] = commandLine.trim().split(/\s+/);
    if (!command) throw new Error('CommandDubbingEngine: command is required');
    this.command = command;
    this.args = args;
  }

  async dub(settings: DubberSettings): Promise<DubResult> {
    this.usedDirectories.set(settings.outputDirectory, settings.cleanUp);
    const stdout = await this.run({ action: 'dub_ad', settings: toEngineSettings(settings) });
    return parseEngineOutput(stdout);
  }

  async dubFromScript(settings: DubberSettings, request: ScriptDubRequest): Promise<DubResult> {
    this.usedDirectories.set(settings.outputDirectory, settings.cleanUp);
    const stdout = await this.run(scriptRequest(settings, request));
    return parseEngineOutput(stdout);
  }

  async cleanUp(): Promise<void> {
    for (const [dir, cleanUp] of this.usedDirectories) {
      await this.run({ action: 'clean_up', output_directory: dir, clean_up: cleanUp });
    }
    this.usedDirectories.clear();
  }

  private run(request: EngineRequest): Promise<string> {
    return new Promise<string>((resolve, reject) => {
      const p = spawn(this.command, [...this.args, request.action], { stdio: ['pipe', 'pipe', 'inherit'] });
      const chunks: Buffer[] = [];
      p.stdout.on('data', (chunk: Buffer) => chunks.push(chunk));
      p.on('error', reject);
      // stdin を読まずに終了したエンジンへの書き込みは EPIPE。終了コードは close で報告する
      p.stdin.on('error', (err: Error) => {
        if ('code' in err && err.code === 'EPIPE') return;
        reject(err);
      });
      p.on('close', (code) =>
        code === 0
          ? resolve(Buffer.concat(chunks).toString('utf-8'))
          : reject(new Error(`Dubbing engine "${request.action}" exited with code ${code}`))
      );
      p.stdin.end(JSON.stringify(request));
    });
  }
}
