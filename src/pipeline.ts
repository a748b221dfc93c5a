import PQueue from 'p-queue';
import { readBasePrompt, readChapterText, splitIntoParagraphs } from './chapters/story';
import { resolveChapter } from './chapters/resolver';
import { DEFAULT_CONCURRENT_CHAPTERS } from './config/env';
import { errorMessage, errorName } from './errors';
import { fileExists } from './generator';
import type { IllustrationRequester } from './illustration';
import type { NarrationRequester } from './narration';
import type { RunState, StateManager } from './services/state-manager';
import type {
  BatchReport,
  ChapterArtifacts,
  ChapterOutcome,
  ChapterPaths,
  ChapterStage,
  ChapterState,
  ForceStage,
  RunOptions,
  Settings,
} from './types';
import type { VideoAssembler } from './video/assembler';
import { logger } from './utils/logger';

export type TransitionListener = (chapter: number, state: ChapterState) => void | Promise<void>;

export interface PipelineDeps {
  settings: Settings;
  narration: NarrationRequester;
  illustration: IllustrationRequester;
  assembler: VideoAssembler;
  stateManager?: StateManager;
}

export interface ChapterRunOptions extends RunOptions {
  onTransition?: TransitionListener;
}

export interface BatchOptions extends ChapterRunOptions {
  concurrency?: number;
}

const log = logger.child('pipeline');

export function failureReason(error: unknown, signal?: AbortSignal): string {
  if (signal?.aborted) return 'Cancelled';
  return errorName(error);
}

export function forces(options: RunOptions, stage: ForceStage): boolean {
  return options.force === true || (options.forceStages?.includes(stage) ?? false);
}

/** Picks an evenly spaced paragraph per scene so each image follows a different part of the chapter. */
export function sceneContexts(paragraphs: string[], sceneCount: number): (string | undefined)[] {
  return Array.from({ length: sceneCount }, (_, i) =>
    paragraphs[Math.floor((i * paragraphs.length) / sceneCount)]
  );
}

/**
 * Drives chapters through Pending → TextResolved → NarrationReady →
 * IllustrationReady → Assembled. Narration and illustration run concurrently
 * and are joined before assembly. Any failure ends in Failed(stage, reason).
 */
export class ChapterPipeline {
  private readonly controllers = new Map<number, AbortController>();

  constructor(private readonly deps: PipelineDeps) {}

  /** Stops new provider calls for one running or queued chapter. */
  cancel(chapter: number): boolean {
    const controller = this.controllers.get(chapter);
    if (!controller) return false;
    controller.abort();
    return true;
  }

  async run(chapter: number, options: ChapterRunOptions = {}): Promise<ChapterState> {
    // runBatch registers queued chapters up front so they can be cancelled before they start
    const controller = this.controllers.get(chapter) ?? new AbortController();
    this.controllers.set(chapter, controller);
    const signal = options.signal ? AbortSignal.any([options.signal, controller.signal]) : controller.signal;

    const emit = async (state: ChapterState): Promise<ChapterState> => {
      await options.onTransition?.(chapter, state);
      return state;
    };

    let stage: ChapterStage = 'TextResolved';
    try {
      await emit({ state: 'Pending' });
      signal.throwIfAborted();

      const paths = await resolveChapter(chapter, this.deps.settings);
      const text = await readChapterText(paths);
      await emit({ state: 'TextResolved' });
      signal.throwIfAborted();

      stage = 'NarrationReady';
      const scenes = options.scenes && options.scenes.length > 0 ? options.scenes : [1];
      const imagePaths = scenes.length === 1 ? [paths.image] : scenes.map((scene) => paths.sceneImage(scene));

      const [narration, illustration] = await Promise.allSettled([
        this.narrate(paths, text, options, signal),
        this.illustrate(chapter, text, scenes, imagePaths, options, signal),
      ]);

      if (narration.status === 'rejected') throw narration.reason;
      await emit({ state: 'NarrationReady' });

      stage = 'IllustrationReady';
      if (illustration.status === 'rejected') throw illustration.reason;
      await emit({ state: 'IllustrationReady' });
      signal.throwIfAborted();

      stage = 'Assembled';
      const artifacts: ChapterArtifacts = { audio: paths.audio, images: imagePaths, video: paths.video };
      // A regenerated input makes the existing video stale
      const stale = narration.value || illustration.value;
      if (stale || forces(options, 'assembly') || !(await fileExists(paths.video))) {
        await this.deps.assembler.assemble({ audioPath: paths.audio, imagePaths, outputPath: paths.video });
      } else {
        log.debug(`Chapter ${chapter}: video exists, skipping assembly`, { path: paths.video });
      }

      return await emit({ state: 'Assembled', paths: artifacts });
    } catch (error) {
      const failed: ChapterState = {
        state: 'Failed',
        stage,
        reason: failureReason(error, signal),
        error: errorMessage(error),
      };
      return await emit(failed);
    } finally {
      if (this.controllers.get(chapter) === controller) this.controllers.delete(chapter);
    }
  }

  /** Resolves to true when new audio was written. */
  private async narrate(paths: ChapterPaths, text: string, options: RunOptions, signal: AbortSignal): Promise<boolean> {
    if (!forces(options, 'narration') && (await fileExists(paths.audio))) {
      log.debug(`Chapter ${paths.chapter}: narration exists, skipping`, { path: paths.audio });
      return false;
    }
    await this.deps.narration.narrate({ text, audioPath: paths.audio, voice: options.voice, signal });
    return true;
  }

  private async illustrate(
    chapter: number,
    text: string,
    scenes: number[],
    imagePaths: string[],
    options: RunOptions,
    signal: AbortSignal
  ): Promise<boolean> {
    const basePrompt = await readBasePrompt(chapter, this.deps.settings);
    const contexts = sceneContexts(splitIntoParagraphs(text), scenes.length);

    let written = false;

    for (const [i, scene] of scenes.entries()) {
      const imagePath = imagePaths[i];
      if (imagePath === undefined) continue;
      const forced = forces(options, 'illustration') || (options.forceScenes?.includes(scene) ?? false);
      if (!forced && (await fileExists(imagePath))) {
        log.debug(`Chapter ${chapter}: scene ${scene} image exists, skipping`, { path: imagePath });
        continue;
      }
      signal.throwIfAborted();
      await this.deps.illustration.illustrate({ scene, imagePath, context: contexts[i], basePrompt, signal });
      written = true;
    }
    return written;
  }

  /**
   * Runs chapters through a bounded pool. Per-chapter failures are recorded
   * in the report and never stop sibling chapters.
   */
  async runBatch(chapters: number[], options: BatchOptions = {}): Promise<BatchReport> {
    const unique = [...new Set(chapters)];
    const queue = new PQueue({ concurrency: options.concurrency ?? DEFAULT_CONCURRENT_CHAPTERS });
    const { stateManager, settings } = this.deps;
    const runState: RunState | undefined = stateManager?.create();
    const results = new Map<number, ChapterState>();

    for (const chapter of unique) {
      if (!this.controllers.has(chapter)) this.controllers.set(chapter, new AbortController());
    }

    const onTransition: TransitionListener = async (chapter, state) => {
      if (stateManager && runState) {
        stateManager.record(runState, chapter, state);
        await stateManager.save(runState, settings.directories.output);
      }
      await options.onTransition?.(chapter, state);
    };

    await Promise.all(
      unique.map((chapter) =>
        queue.add(async () => {
          let state: ChapterState;
          try {
            state = await this.run(chapter, { ...options, onTransition });
          } catch (error) {
            // Only a failing listener gets here; run() records every chapter failure itself
            state = { state: 'Failed', stage: 'Pending', reason: failureReason(error), error: errorMessage(error) };
          }
          results.set(chapter, state);
        })
      )
    );

    const outcomes: ChapterOutcome[] = unique.map((chapter) => ({
      chapter,
      state: results.get(chapter) ?? { state: 'Failed', stage: 'Pending', reason: 'Error', error: 'Chapter did not run' },
    }));

    const report = summarize(outcomes);
    if (stateManager && report.exitCode === 0) {
      await stateManager.clear(settings.directories.output);
    }
    return report;
  }
}

export function summarize(outcomes: ChapterOutcome[]): BatchReport {
  const succeeded: number[] = [];
  const failed: BatchReport['failed'] = [];

  for (const { chapter, state } of outcomes) {
    if (state.state === 'Assembled') {
      succeeded.push(chapter);
    } else if (state.state === 'Failed') {
      failed.push({ chapter, stage: state.stage, reason: `${state.reason}: ${state.error}` });
    } else {
      failed.push({ chapter, stage: state.state, reason: 'Chapter stopped before assembly' });
    }
  }

  return { succeeded, failed, outcomes, exitCode: failed.length === 0 ? 0 : 1 };
}
