import * as path from 'node:path';
import { parseJobSpec } from '../../../src/config/jobSpec';
import { STATUS } from '../../../src/config/defaults';
import { reportFailure } from '../../../src/errors';
import type { DispatchedLineConfig, StatusUpdate, ToolConfig } from '../../../src/types/domain';
import type { ObjectStore } from './util';
import { buildFileName, splitVideoUrl } from './util';
import { buildDubberSettings, type DubResult, type DubbingEngine, type DubbingEngineFactory } from './services/dubber';
import { FAILED_STATUS_FOR_REPORTING } from './constants';

export type ProcessLineDeps = {
  store: ObjectStore;
  createEngine: DubbingEngineFactory;
  outputDirectory: string;
};

// 行ごとの作業ディレクトリ（同じインスタンスで別の行を並行処理しても衝突しない）
export function workDirFor(outputDirectory: string, rowNum: number): string {
  return path.join(outputDirectory, `row-${rowNum}`);
}

/**
 * engine を確保して fn を実行し、どの経路で抜けても cleanUp を 1 回だけ呼ぶ。
 * cleanUp 自体の失敗は結果に影響させない。
 */
export async function withDubbingEngine<T>(
  createEngine: DubbingEngineFactory,
  fn: (engine: DubbingEngine) => Promise<T>
): Promise<T> {
  const engine = createEngine();
  try {
    return await fn(engine);
  } finally {
    try {
      await engine.cleanUp();
    } catch (err) {
      console.warn('⚠️ Dubbing engine clean-up failed (ignored):', err);
    }
  }
}

/**
 * 1 行分の吹き替え。target_language の順に逐次処理し、最初の失敗で打ち切る。
 * 例外は投げず、シートに書く (status, message) に落とす。
 */
export async function processLine(
  deps: ProcessLineDeps,
  toolConfig: ToolConfig,
  lineConfig: DispatchedLineConfig,
  worksheetUrl: string
): Promise<StatusUpdate> {
  const outputPaths: string[] = [];

  try {
    await withDubbingEngine(deps.createEngine, async (engine) => {
      const spec = parseJobSpec(lineConfig);
      const { bucket, objectName } = splitVideoUrl(spec.videoUrl);
      const workDir = workDirFor(deps.outputDirectory, spec.rowNum);

      for (const language of spec.targetLanguages) {
        console.log(`🎬 Row ${spec.rowNum}: dubbing into "${language}"`);
        const inputFile = path.join(workDir, path.basename(objectName));
        await deps.store.download(bucket, objectName, inputFile);

        const settings = buildDubberSettings(toolConfig, spec, language, inputFile, workDir);

        let result: DubResult;
        if (spec.script.length > 0) {
          const assignedVoice = spec.voices[language];
          if (!assignedVoice) throw new Error(`No voice assignment for language "${language}"`);
          result = await engine.dubFromScript(settings, {
            script: spec.script,
            ttsParams: spec.ttsParams,
            assignedVoice,
          });
        } else {
          result = await engine.dub(settings);
        }

        const outputName = buildFileName({ ...lineConfig, target_language: language }, result.videoFile);
        outputPaths.push(await deps.store.upload(spec.outputBucket, result.videoFile, outputName));
      }
    });
  } catch (err) {
    return { status: STATUS.FAILED, message: reportFailure(FAILED_STATUS_FOR_REPORTING, worksheetUrl, err) };
  }

  console.log(`✅ Row ${String(lineConfig.row_num)} completed: ${outputPaths.length} file(s)`);
  return { status: STATUS.OK, message: outputPaths.join(',') };
}
