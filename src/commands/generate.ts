import ora from 'ora';
import { readFile } from 'fs/promises';
import { describeChapterPaths } from '../chapters/resolver';
import { readBasePrompt } from '../chapters/story';
import { readRuntimeEnv } from '../config/env';
import { loadSettingsFile } from '../config/loader';
import { errorMessage } from '../errors';
import { createPipeline, type PipelineOverrides } from '../factory';
import { fileExists } from '../generator';
import { buildPrompt } from '../illustration';
import type { BatchReport, ChapterState, ForceStage, Settings } from '../types';
import { Logger } from '../utils/logger';

export interface GenerateOptions {
  config: string;
  root?: string;
  voice?: string;
  scenes?: number[];
  concurrency?: number;
  force?: boolean;
  forceStage?: ForceStage[];
  forceScene?: number[];
  dryRun?: boolean;
  format?: 'text' | 'json';
}

export interface DryRunChapter {
  chapter: number;
  input: string;
  inputExists: boolean;
  characters: number;
  audio: string;
  images: string[];
  video: string;
  videoExists: boolean;
  prompts: string[];
}

// ElevenLabs list price per million characters
const COST_PER_MILLION_CHARS = 30;

export function estimateCost(characters: number): number {
  return (characters / 1000000) * COST_PER_MILLION_CHARS;
}

export async function planChapters(chapters: number[], settings: Settings, scenes: number[]): Promise<DryRunChapter[]> {
  return Promise.all(
    chapters.map(async (chapter) => {
      const paths = describeChapterPaths(chapter, settings);
      const inputExists = await fileExists(paths.input);
      const text = inputExists ? await readFile(paths.input, 'utf8') : '';
      const basePrompt = await readBasePrompt(chapter, settings);

      return {
        chapter,
        input: paths.input,
        inputExists,
        characters: text.length,
        audio: paths.audio,
        images: scenes.length === 1 ? [paths.image] : scenes.map((scene) => paths.sceneImage(scene)),
        video: paths.video,
        videoExists: await fileExists(paths.video),
        prompts: scenes.map((scene) => {
          const template = settings.image.basePrompts.get(scene);
          return template === undefined ? `<no prompt for scene ${scene}>` : buildPrompt(basePrompt ?? template);
        }),
      };
    })
  );
}

function describeState(state: ChapterState): string {
  switch (state.state) {
    case 'Assembled':
      return `→ ${state.paths.video}`;
    case 'Failed':
      return `failed at ${state.stage} (${state.reason}): ${state.error}`;
    default:
      return state.state;
  }
}

function printReport(report: BatchReport): void {
  if (report.failed.length === 0) {
    console.log(`\n✓ Assembled all ${report.succeeded.length} chapters`);
    return;
  }

  console.log(`\n⚠ Assembled ${report.succeeded.length}/${report.outcomes.length} chapters`);
  if (report.succeeded.length > 0) {
    console.log(`Succeeded: ${report.succeeded.join(', ')}`);
  }
  console.log('Failed chapters:');
  for (const failure of report.failed) {
    console.log(`  ✗ Chapter ${failure.chapter} [${failure.stage}] ${failure.reason}`);
  }
}

export async function generateCommand(
  chapters: number[],
  options: GenerateOptions,
  overrides: PipelineOverrides = {}
): Promise<BatchReport | undefined> {
  const isJsonMode = options.format === 'json';
  Logger.silence(isJsonMode);
  const spinner = isJsonMode ? null : ora('Loading configuration...').start();

  try {
    const settings = await loadSettingsFile(options.config, { root: options.root });
    const runtime = readRuntimeEnv();
    const scenes = options.scenes && options.scenes.length > 0 ? options.scenes : [1];

    if (options.dryRun) {
      const plan = await planChapters(chapters, settings, scenes);
      const totalChars = plan.reduce((sum, ch) => sum + ch.characters, 0);
      if (spinner) spinner.stop();

      if (isJsonMode) {
        console.log(JSON.stringify({ chapters: plan, totalCharacters: totalChars, estimatedCost: estimateCost(totalChars) }, null, 2));
      } else {
        console.log('\nDry run - nothing generated\n');
        for (const ch of plan) {
          const status = ch.inputExists ? `${ch.characters.toLocaleString()} characters` : 'input missing';
          console.log(`  Chapter ${ch.chapter}: ${ch.input} (${status})`);
          console.log(`    audio  ${ch.audio}`);
          ch.images.forEach((image) => console.log(`    image  ${image}`));
          console.log(`    video  ${ch.video}${ch.videoExists ? ' (exists)' : ''}`);
        }
        console.log(`\nTotal characters: ${totalChars.toLocaleString()}`);
        console.log(`Estimated narration cost: $${estimateCost(totalChars).toFixed(2)} (approximate)`);
      }
      return undefined;
    }

    // Only read API keys after the dry-run check
    const pipeline = createPipeline(settings, runtime, overrides);
    const controller = new AbortController();
    const onInterrupt = () => {
      if (spinner) spinner.warn('Interrupted - finishing in-flight requests');
      controller.abort();
    };
    process.once('SIGINT', onInterrupt);

    let completed = 0;
    const total = chapters.length;
    if (spinner) spinner.start(`Generating ${total} chapters (0/${total})`);

    let report: BatchReport;
    try {
      report = await pipeline.runBatch(chapters, {
        force: options.force,
        forceStages: options.forceStage,
        forceScenes: options.forceScene,
        voice: options.voice ?? runtime.voiceOverride,
        scenes,
        concurrency: options.concurrency ?? runtime.concurrentChapters,
        signal: controller.signal,
        onTransition: (chapter, state) => {
          if (state.state !== 'Assembled' && state.state !== 'Failed') {
            if (spinner) spinner.text = `Generating ${total} chapters (${completed}/${total}) - chapter ${chapter}: ${state.state}`;
            return;
          }
          completed++;
          if (spinner) spinner.text = `Generating ${total} chapters (${completed}/${total})`;
          if (!isJsonMode) {
            const mark = state.state === 'Assembled' ? '✓' : '✗';
            spinner?.clear();
            console.log(`  ${mark} Chapter ${chapter} ${describeState(state)}`);
            spinner?.render();
          }
        },
      });
    } finally {
      process.removeListener('SIGINT', onInterrupt);
    }

    if (spinner) spinner.stop();

    if (isJsonMode) {
      console.log(JSON.stringify(report, null, 2));
    } else {
      printReport(report);
    }

    process.exitCode = report.exitCode;
    return report;
  } catch (error) {
    if (spinner) spinner.fail('Generation failed');
    const errorMsg = errorMessage(error);

    if (isJsonMode) {
      console.log(JSON.stringify({ success: false, error: errorMsg }, null, 2));
    } else {
      console.error(`\nError: ${errorMsg}`);
    }
    process.exitCode = 1;
    return undefined;
  }
}
