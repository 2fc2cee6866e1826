import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { DEFAULT_DUBBING_CONFIG } from '../../../../src/config/defaults';
import { parseJobSpec } from '../../../../src/config/jobSpec';
import {
  buildDubberSettings,
  CommandDubbingEngine,
  parseEngineOutput,
  scriptRequest,
  toEngineSettings,
  type DubberSettings,
  type ScriptDubRequest,
} from '../services/dubber';

const FAKE_ENGINE = `${process.execPath} ${path.join(__dirname, 'fixtures', 'fake-engine.js')}`;

const spec = (overrides: Record<string, string> = {}) =>
  parseJobSpec({
    ...DEFAULT_DUBBING_CONFIG,
    video_url: 'bkt/in.mp4',
    target_language: "['fr']",
    original_language: 'en-US',
    ...overrides,
    row_num: 0,
  });

const settingsFor = (language: string, overrides: Record<string, string> = {}): DubberSettings =>
  buildDubberSettings(
    { AI_STUDIO_API_KEY: 'test-gemini', HUGGING_FACE_ACCESS_TOKEN: '' },
    spec(overrides),
    language,
    '/tmp/out/row-0/in.mp4',
    '/tmp/out/row-0'
  );

const REQUEST: ScriptDubRequest = {
  script: [{ start: 0, end: 1, text: 'Hello' }],
  ttsParams: { speaking_rate: 1.1 },
  assignedVoice: { speaker_1: 'voice-a' },
};

describe('buildDubberSettings', () => {
  it('maps the row config and tool tokens', () => {
    const settings = settingsFor('de', { no_dubbing_phrases: "['ACME']", preferred_voice_family: "['Wavenet']" });

    expect(settings).toEqual({
      inputFile: '/tmp/out/row-0/in.mp4',
      outputDirectory: '/tmp/out/row-0',
      advertiserName: 'Default',
      originalLanguage: 'en-US',
      targetLanguage: 'de',
      numberOfSpeakers: 1,
      geminiToken: 'test-gemini',
      huggingFaceToken: undefined,
      noDubbingPhrases: ['ACME'],
      diarizationInstructions: '',
      translationInstructions: '',
      mergeUtterances: true,
      minimumMergeThreshold: 0.001,
      preferredVoices: ['Wavenet'],
      adjustSpeed: true,
      vocalsVolumeAdjustment: 5,
      backgroundVolumeAdjustment: 0,
      cleanUp: false,
      geminiModelName: 'gemini-1.5-flash',
      temperature: 1,
      topP: 0.95,
      topK: 64,
      maxOutputTokens: 8192,
      useElevenlabs: false,
      elevenlabsToken: undefined,
      elevenlabsCloneVoices: false,
      withVerification: false,
    });
  });
});

describe('engine request', () => {
  it('uses snake_case keys and null for missing tokens', () => {
    const engine = toEngineSettings(settingsFor('fr'));

    expect(engine['input_file']).toBe('/tmp/out/row-0/in.mp4');
    expect(engine['target_language']).toBe('fr');
    expect(engine['gemini_token']).toBe('test-gemini');
    expect(engine['hugging_face_token']).toBeNull();
    expect(engine['elevenlabs_token']).toBeNull();
    expect(engine['max_output_tokens']).toBe(8192);
    expect(Object.keys(engine)).toHaveLength(27);
  });

  it('sends Google TTS parameters by default', () => {
    const request = scriptRequest(settingsFor('fr'), REQUEST);

    expect(request).toMatchObject({
      action: 'dub_ad_from_script',
      script_with_timestamps: REQUEST.script,
      assigned_voice: { speaker_1: 'voice-a' },
      google_text_to_speech_parameters: { speaking_rate: 1.1 },
    });
    expect(request).not.toHaveProperty('elevenlabs_text_to_speech_parameters');
  });

  it('sends ElevenLabs parameters for the ElevenLabs provider', () => {
    const request = scriptRequest(settingsFor('fr', { voice_provider: 'ElevenLabs' }), REQUEST);

    expect(request).toMatchObject({ elevenlabs_text_to_speech_parameters: { speaking_rate: 1.1 } });
    expect(request).not.toHaveProperty('google_text_to_speech_parameters');
  });
});

describe('parseEngineOutput', () => {
  it('reads the last JSON line', () => {
    expect(parseEngineOutput('loading model\n{"video_file": "/tmp/out/a.mp4"}\n\n')).toEqual({
      videoFile: '/tmp/out/a.mp4',
    });
  });

  it('rejects empty output', () => {
    expect(() => parseEngineOutput('  \n')).toThrow('Dubbing engine produced no output');
  });

  it('rejects a non-JSON last line', () => {
    expect(() => parseEngineOutput('{"video_file": "a"}\ndone')).toThrow('Dubbing engine output is not JSON: done');
  });

  it('rejects JSON without a video file', () => {
    expect(() => parseEngineOutput('{"status": "ok"}')).toThrow();
  });
});

describe('CommandDubbingEngine', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('runs the engine command and reads its result', async () => {
    const engine = new CommandDubbingEngine(FAKE_ENGINE);

    await expect(engine.dub(settingsFor('fr'))).resolves.toEqual({ videoFile: '/tmp/out/row-0/dubbed_fr.mp4' });
  });

  it('passes script requests with the provider parameters', async () => {
    const engine = new CommandDubbingEngine(FAKE_ENGINE);

    await expect(engine.dubFromScript(settingsFor('fr'), REQUEST)).resolves.toEqual({
      videoFile: '/tmp/out/row-0/dubbed_fr_google.mp4',
    });
    await expect(
      engine.dubFromScript(settingsFor('de', { voice_provider: 'ElevenLabs' }), REQUEST)
    ).resolves.toEqual({ videoFile: '/tmp/out/row-0/dubbed_de_elevenlabs.mp4' });
  });

  it('rejects when the engine exits with an error', async () => {
    const engine = new CommandDubbingEngine(FAKE_ENGINE);

    await expect(engine.dub(settingsFor('xx'))).rejects.toThrow('Dubbing engine "dub_ad" exited with code 3');
  });

  it('rejects instead of crashing when the engine exits without reading its request', async () => {
    const engine = new CommandDubbingEngine(`${process.execPath} -e process.exit(2)`);
    const script = Array.from({ length: 20000 }, (_, i) => ({ start: i, end: i + 1, text: `line ${i}` }));

    await expect(engine.dubFromScript(settingsFor('fr'), { ...REQUEST, script })).rejects.toThrow(
      'Dubbing engine "dub_ad_from_script" exited with code 2'
    );
  });

  it('cleans up the directories it used with the row clean_up setting', async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'engine-log-'));
    const log = path.join(dir, 'requests.jsonl');
    try {
      const engine = new CommandDubbingEngine(`${FAKE_ENGINE} ${log}`);
      await engine.dub(settingsFor('fr', { clean_up: 'True' }));
      await engine.dub(settingsFor('de', { clean_up: 'True' }));

      await expect(engine.cleanUp()).resolves.toBeUndefined();

      const requests: unknown[] = (await fs.readFile(log, 'utf-8'))
        .trim()
        .split('\n')
        .map((line) => JSON.parse(line));
      expect(requests.slice(2)).toEqual([
        { action: 'clean_up', output_directory: '/tmp/out/row-0', clean_up: true },
      ]);
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });

  it('sends clean_up false when the row keeps its files', async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'engine-log-'));
    const log = path.join(dir, 'requests.jsonl');
    try {
      const engine = new CommandDubbingEngine(`${FAKE_ENGINE} ${log}`);
      await engine.dub(settingsFor('fr'));
      await engine.cleanUp();

      const lines = (await fs.readFile(log, 'utf-8')).trim().split('\n');
      expect(lines[lines.length - 1]).toBe(
        JSON.stringify({ action: 'clean_up', output_directory: '/tmp/out/row-0', clean_up: false })
      );
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });

  it('requires a command', () => {
    expect(() => new CommandDubbingEngine('   ')).toThrow('CommandDubbingEngine: command is required');
  });
});
