import { z } from 'zod';
import { parseLiteral, type LiteralValue } from './literal';
import { VOICE_PROVIDER } from './defaults';

/**
 * 行設定（シートの文字列）を型付きの JobSpec に変換する。
 * splitter は publish 前に、worker はデコード直後に同じスキーマで検証する。
 */

export type Utterance = { [key: string]: LiteralValue };

// speaker_id -> voice 名
export type VoiceAssignment = Record<string, string>;

export class JobConfigError extends Error {
  constructor(readonly issues: z.ZodIssue[]) {
    super(
      `Invalid job configuration: ${issues
        .map((i) => `${i.path.length > 0 ? i.path.join('.') : '(row)'}: ${i.message}`)
        .join('; ')}`
    );
    this.name = 'JobConfigError';
  }
}

const literalOf = <T extends z.ZodTypeAny>(schema: T) =>
  z.string().transform((raw, ctx): unknown => {
    try {
      return parseLiteral(raw.trim());
    } catch (e) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: e instanceof Error ? e.message : String(e) });
      return z.NEVER;
    }
  }).pipe(schema);

const jsonOf = <T extends z.ZodTypeAny>(schema: T) =>
  z.string().transform((raw, ctx): unknown => {
    try {
      const parsed: unknown = JSON.parse(raw);
      return parsed;
    } catch (e) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: e instanceof Error ? e.message : String(e) });
      return z.NEVER;
    }
  }).pipe(schema);

const numeric = z
  .string()
  .trim()
  .refine((v) => v !== '' && Number.isFinite(Number(v)), 'must be a number')
  .transform(Number);

const integer = z
  .string()
  .trim()
  .refine((v) => /^[+-]?\d+$/.test(v), 'must be an integer')
  .transform(Number);

// "True" / "true" / "TRUE" だけが true。それ以外は false
const flag = z.string().transform((v) => v.trim().toLowerCase() === 'true');

const stringList = literalOf(z.array(z.string()));

const utteranceSchema: z.ZodType<Utterance> = z.record(z.custom<LiteralValue>(() => true));

// "[]"（既定値）は「割り当てなし」
const voicesSchema = z.union([
  z.array(z.never()).transform((): Record<string, VoiceAssignment> => ({})),
  z.record(z.record(z.string())),
]);

export const JobSpecSchema = z.object({
  row_num: z.coerce.number().int().nonnegative(),
  campaign_name: z.string(),
  custom_tag: z.string(),
  original_language: z.string(),
  target_language: stringList,
  video_url: z.string().trim().min(1, 'video_url is required'),
  script: literalOf(z.array(utteranceSchema)),
  target_gender: z.string(),
  voice_provider: z.string(),
  clone_original_voices: flag,
  preferred_voice_family: stringList,
  voices: jsonOf(voicesSchema),
  output_naming_convention: z.string(),
  output_bucket: z.string(),
  number_of_speakers: integer,
  diarization_instructions: z.string(),
  translation_instructions: z.string(),
  no_dubbing_phrases: stringList,
  merge_utterances: flag,
  minimum_merge_threshold: numeric,
  adjust_speed: flag,
  vocals_volume_adjustment: numeric,
  background_volume_adjustment: numeric,
  gemini_model_name: z.string(),
  gemini_temperature: numeric,
  gemini_top_p: numeric,
  gemini_top_k: integer,
  gemini_maximum_output_tokens: integer,
  clean_up: flag,
  with_verification: flag,
  tts_params: jsonOf(z.record(z.unknown())),
});

export type JobSpecRaw = z.input<typeof JobSpecSchema>;

export type JobSpec = {
  rowNum: number;
  campaignName: string;
  originalLanguage: string;
  targetLanguages: string[];
  videoUrl: string;
  script: Utterance[];
  voiceProvider: string;
  useElevenlabs: boolean;
  cloneOriginalVoices: boolean;
  preferredVoiceFamily: string[];
  voices: Record<string, VoiceAssignment>;
  outputNamingConvention: string;
  outputBucket: string;
  numberOfSpeakers: number;
  diarizationInstructions: string;
  translationInstructions: string;
  noDubbingPhrases: string[];
  mergeUtterances: boolean;
  minimumMergeThreshold: number;
  adjustSpeed: boolean;
  vocalsVolumeAdjustment: number;
  backgroundVolumeAdjustment: number;
  geminiModelName: string;
  geminiTemperature: number;
  geminiTopP: number;
  geminiTopK: number;
  geminiMaxOutputTokens: number;
  cleanUp: boolean;
  withVerification: boolean;
  ttsParams: Record<string, unknown>;
};

export function parseJobSpec(lineConfig: Record<string, unknown>): JobSpec {
  const result = JobSpecSchema.safeParse(lineConfig);
  if (!result.success) throw new JobConfigError(result.error.issues);
  const c = result.data;
  return {
    rowNum: c.row_num,
    campaignName: c.campaign_name,
    originalLanguage: c.original_language,
    targetLanguages: c.target_language,
    videoUrl: c.video_url,
    script: c.script,
    voiceProvider: c.voice_provider,
    useElevenlabs: c.voice_provider.includes(VOICE_PROVIDER.ELEVENLABS),
    cloneOriginalVoices: c.clone_original_voices,
    preferredVoiceFamily: c.preferred_voice_family,
    voices: c.voices,
    outputNamingConvention: c.output_naming_convention,
    outputBucket: c.output_bucket,
    numberOfSpeakers: c.number_of_speakers,
    diarizationInstructions: c.diarization_instructions,
    translationInstructions: c.translation_instructions,
    noDubbingPhrases: c.no_dubbing_phrases,
    mergeUtterances: c.merge_utterances,
    minimumMergeThreshold: c.minimum_merge_threshold,
    adjustSpeed: c.adjust_speed,
    vocalsVolumeAdjustment: c.vocals_volume_adjustment,
    backgroundVolumeAdjustment: c.background_volume_adjustment,
    geminiModelName: c.gemini_model_name,
    geminiTemperature: c.gemini_temperature,
    geminiTopP: c.gemini_top_p,
    geminiTopK: c.gemini_top_k,
    geminiMaxOutputTokens: c.gemini_maximum_output_tokens,
    cleanUp: c.clean_up,
    withVerification: c.with_verification,
    ttsParams: c.tts_params,
  };
}
