import * as path from 'path';
import { readFile, writeFile, mkdir } from 'fs/promises';
import { fileExists } from './generator';
import { IllustrationRequester } from './illustration';
import { NarrationRequester } from './narration';
import { ChapterPipeline, sceneContexts, summarize } from './pipeline';
import { StateManager } from './services/state-manager';
import {
  StubEncoder,
  StubImageGenerator,
  StubSynthesizer,
  instantLimiter,
  makeWorkspace,
  testSettings,
  writeChapter,
} from './testing/fixtures';
import type { ChapterState, ImageGenerator, Settings } from './types';
import { VideoAssembler } from './video/assembler';

interface Harness {
  settings: Settings;
  pipeline: ChapterPipeline;
  synthesizer: StubSynthesizer;
  images: StubImageGenerator;
  encoder: StubEncoder;
  stateManager: StateManager;
}

async function harness(overrides: { images?: ImageGenerator; encoder?: StubEncoder; synthesizer?: StubSynthesizer } = {}): Promise<Harness> {
  const settings = testSettings(await makeWorkspace());
  const { limiter } = instantLimiter(2);
  const synthesizer = overrides.synthesizer ?? new StubSynthesizer();
  const images = new StubImageGenerator();
  const encoder = overrides.encoder ?? new StubEncoder();
  const stateManager = new StateManager(() => new Date('2026-01-01T00:00:00.000Z'));

  const pipeline = new ChapterPipeline({
    settings,
    narration: new NarrationRequester(settings, synthesizer, limiter),
    illustration: new IllustrationRequester(settings, overrides.images ?? images, limiter),
    assembler: new VideoAssembler(settings, encoder),
    stateManager,
  });
  return { settings, pipeline, synthesizer, images, encoder, stateManager };
}

describe('ChapterPipeline.run', () => {
  it('takes chapter 1 from text to an assembled video', async () => {
    const { settings, pipeline, images } = await harness();
    await writeChapter(settings, 1, 'Kapilar climbed the Parambu hills.\n\nNeelan followed.');
    const transitions: string[] = [];

    const state = await pipeline.run(1, { onTransition: (_chapter, s) => void transitions.push(s.state) });

    const output = settings.directories.output;
    expect(state).toEqual({
      state: 'Assembled',
      paths: {
        audio: path.join(output, 'audio', 'chapter_1.mp3'),
        images: [path.join(output, 'images', 'chapter_1.png')],
        video: path.join(output, 'chapter_1.mp4'),
      },
    });
    expect(transitions).toEqual(['Pending', 'TextResolved', 'NarrationReady', 'IllustrationReady', 'Assembled']);
    expect(await fileExists(path.join(output, 'audio', 'chapter_1.mp3'))).toBe(true);
    expect(await fileExists(path.join(output, 'images', 'chapter_1.png'))).toBe(true);
    expect(await fileExists(path.join(output, 'chapter_1.mp4'))).toBe(true);
    expect(images.requests[0]?.prompt).toBe('A forest at dawn. Context: Kapilar climbed the Parambu hills.');
  });

  it('fails at TextResolved when the chapter text is missing', async () => {
    const { pipeline, synthesizer } = await harness();

    const state = await pipeline.run(5);

    expect(state).toMatchObject({ state: 'Failed', stage: 'TextResolved', reason: 'ChapterNotFoundError' });
    expect(synthesizer.calls).toBe(0);
  });

  it('keeps the narration when the illustration prompt is missing', async () => {
    const { settings, pipeline, encoder } = await harness();
    await writeChapter(settings, 1, 'text');

    const state = await pipeline.run(1, { scenes: [4] });

    expect(state).toMatchObject({ state: 'Failed', stage: 'IllustrationReady', reason: 'PromptNotFoundError' });
    expect(await fileExists(path.join(settings.directories.audio, 'chapter_1.mp3'))).toBe(true);
    expect(encoder.jobs).toHaveLength(0);
    expect(await fileExists(path.join(settings.directories.output, 'chapter_1.mp4'))).toBe(false);
  });

  it('reports the narration failure when both branches fail', async () => {
    const { settings, pipeline } = await harness({ synthesizer: new StubSynthesizer(new Error('quota exceeded')) });
    await writeChapter(settings, 1, 'text');

    const state = await pipeline.run(1, { scenes: [4] });

    expect(state).toEqual({
      state: 'Failed',
      stage: 'NarrationReady',
      reason: 'SynthesisError',
      error: 'Speech synthesis failed: quota exceeded',
    });
  });

  it('fails at Assembled when the encoder fails', async () => {
    const { settings, pipeline } = await harness({ encoder: new StubEncoder({ exitCode: 1, stderr: 'bad codec' }) });
    await writeChapter(settings, 1, 'text');

    const state = await pipeline.run(1);

    expect(state).toMatchObject({ state: 'Failed', stage: 'Assembled', reason: 'EncodingError' });
    expect(await fileExists(path.join(settings.directories.output, 'chapter_1.mp4'))).toBe(false);
  });

  it('skips stages whose output already exists unless forced', async () => {
    const { settings, pipeline, synthesizer, images, encoder } = await harness();
    await writeChapter(settings, 1, 'text');

    await pipeline.run(1);
    await pipeline.run(1);
    expect([synthesizer.calls, images.calls, encoder.jobs.length]).toEqual([1, 1, 1]);

    await pipeline.run(1, { force: true });
    expect([synthesizer.calls, images.calls, encoder.jobs.length]).toEqual([2, 2, 2]);
  });

  it('regenerates only the forced stage and reassembles the video', async () => {
    const { settings, pipeline, synthesizer, images, encoder } = await harness();
    await writeChapter(settings, 1, 'text');
    await pipeline.run(1);

    await pipeline.run(1, { forceStages: ['narration'] });

    expect([synthesizer.calls, images.calls, encoder.jobs.length]).toEqual([2, 1, 2]);
  });

  it('re-encodes without new provider calls when only assembly is forced', async () => {
    const { settings, pipeline, synthesizer, images, encoder } = await harness();
    await writeChapter(settings, 1, 'text');
    await pipeline.run(1);

    await pipeline.run(1, { forceStages: ['assembly'] });

    expect([synthesizer.calls, images.calls, encoder.jobs.length]).toEqual([1, 1, 2]);
  });

  it('redraws a single scene of a multi-scene chapter', async () => {
    const { settings, pipeline, synthesizer, images, encoder } = await harness();
    await writeChapter(settings, 2, 'Dawn.\n\nNoon.\n\nDusk.');
    await pipeline.run(2, { scenes: [1, 2, 3] });
    images.requests.length = 0;

    const state = await pipeline.run(2, { scenes: [1, 2, 3], forceScenes: [2] });

    expect(state.state).toBe('Assembled');
    expect(images.requests.map((r) => r.prompt)).toEqual(['A river crossing. Context: Noon.']);
    expect(synthesizer.calls).toBe(1);
    expect(encoder.jobs).toHaveLength(2);
  });

  it('reports a chapter number that is not a positive integer', async () => {
    const { pipeline, synthesizer } = await harness();

    const state = await pipeline.run(0);

    expect(state).toEqual({
      state: 'Failed',
      stage: 'TextResolved',
      reason: 'RangeError',
      error: 'Chapter number must be a positive integer, got 0',
    });
    expect(synthesizer.calls).toBe(0);
  });

  it('illustrates one image per requested scene from different paragraphs', async () => {
    const { settings, pipeline, images, encoder } = await harness();
    await writeChapter(settings, 2, 'Dawn.\n\nNoon.\n\nDusk.\n\nNight.');

    const state = await pipeline.run(2, { scenes: [1, 3] });

    expect(state.state).toBe('Assembled');
    expect(images.requests.map((r) => r.prompt)).toEqual([
      'A forest at dawn. Context: Dawn.',
      'A hill temple at dusk. Context: Dusk.',
    ]);
    expect(encoder.jobs[0]?.imagePaths).toEqual([
      path.join(settings.directories.images, 'chapter_2_scene_1.png'),
      path.join(settings.directories.images, 'chapter_2_scene_3.png'),
    ]);
  });

  it('uses the per-chapter prompt file when present', async () => {
    const { settings, pipeline, images } = await harness();
    await writeChapter(settings, 3, 'Mullai forest.');
    await writeFile(path.join(settings.directories.input, 'chapter3_base_prompt.txt'), 'Jasmine forest at dusk.');

    await pipeline.run(3);

    expect(images.requests[0]?.prompt).toBe('Jasmine forest at dusk. Context: Mullai forest.');
  });

  it('stops issuing provider calls for a cancelled chapter', async () => {
    let release: () => void = () => undefined;
    const blocked = new Promise<void>((resolve) => {
      release = resolve;
    });
    const slowImages: ImageGenerator = {
      generate: async () => {
        await blocked;
        return new Uint8Array([1]);
      },
    };
    const { settings, pipeline, encoder } = await harness({ images: slowImages });
    await writeChapter(settings, 1, 'text');

    const running = pipeline.run(1, {
      onTransition: (chapter, s) => {
        if (s.state === 'TextResolved') {
          setImmediate(() => {
            pipeline.cancel(chapter);
            release();
          });
        }
      },
    });
    const state = await running;

    expect(state).toMatchObject({ state: 'Failed', reason: 'Cancelled' });
    expect(encoder.jobs).toHaveLength(0);
    expect(pipeline.cancel(1)).toBe(false);
  });
});

describe('ChapterPipeline.runBatch', () => {
  it('assembles chapters 1 and 3 when chapter 2 is missing and exits non-zero', async () => {
    const { settings, pipeline, stateManager } = await harness();
    await writeChapter(settings, 1, 'one');
    await writeChapter(settings, 3, 'three');

    const report = await pipeline.runBatch([1, 2, 3], { concurrency: 2 });

    expect(report.succeeded).toEqual([1, 3]);
    expect(report.failed).toEqual([
      { chapter: 2, stage: 'TextResolved', reason: `ChapterNotFoundError: Chapter 2 not found at ${path.join(settings.directories.input, 'chapter_2.txt')}` },
    ]);
    expect(report.exitCode).toBe(1);
    expect(report.outcomes.map((o) => [o.chapter, o.state.state])).toEqual([
      [1, 'Assembled'],
      [2, 'Failed'],
      [3, 'Assembled'],
    ]);

    const saved = await stateManager.load(settings.directories.output);
    expect(saved?.chapters['2']).toMatchObject({ state: 'Failed', stage: 'TextResolved', reason: 'ChapterNotFoundError' });
    expect(saved?.chapters['1']?.state).toBe('Assembled');
  });

  it('cancels a chapter that is still waiting in the queue', async () => {
    const { settings, pipeline, synthesizer } = await harness();
    await writeChapter(settings, 1, 'one');
    await writeChapter(settings, 2, 'two');
    let cancelled: boolean | undefined;

    const report = await pipeline.runBatch([1, 2], {
      concurrency: 1,
      onTransition: (chapter, state) => {
        if (chapter === 1 && state.state === 'Pending') cancelled = pipeline.cancel(2);
      },
    });

    expect(cancelled).toBe(true);
    expect(report.succeeded).toEqual([1]);
    expect(report.outcomes[1]?.state).toMatchObject({ state: 'Failed', stage: 'TextResolved', reason: 'Cancelled' });
    expect(synthesizer.requests.map((r) => r.text)).toEqual(['one']);
    expect(pipeline.cancel(2)).toBe(false);
  });

  it('clears the run state after a fully successful batch', async () => {
    const { settings, pipeline, stateManager } = await harness();
    await writeChapter(settings, 1, 'one');

    const report = await pipeline.runBatch([1, 1]);

    expect(report).toMatchObject({ succeeded: [1], failed: [], exitCode: 0 });
    expect(await fileExists(stateManager.getStatePath(settings.directories.output))).toBe(false);
  });

  it('keeps going when a chapter listener throws', async () => {
    const { settings, pipeline } = await harness();
    await writeChapter(settings, 1, 'one');
    await writeChapter(settings, 2, 'two');

    const report = await pipeline.runBatch([1, 2], {
      onTransition: (chapter, state) => {
        if (chapter === 1 && state.state === 'Failed') throw new Error('listener broke');
        if (chapter === 1 && state.state === 'Pending') throw new Error('listener broke');
      },
    });

    expect(report.succeeded).toEqual([2]);
    expect(report.failed).toEqual([{ chapter: 1, stage: 'Pending', reason: 'Error: listener broke' }]);
  });
});

describe('helpers', () => {
  it('spreads scenes across paragraphs', () => {
    expect(sceneContexts(['a', 'b', 'c', 'd'], 2)).toEqual(['a', 'c']);
    expect(sceneContexts(['a'], 3)).toEqual(['a', 'a', 'a']);
    expect(sceneContexts([], 1)).toEqual([undefined]);
  });

  it('summarizes outcomes', () => {
    const failed: ChapterState = { state: 'Failed', stage: 'Assembled', reason: 'EncodingError', error: 'status 1' };
    expect(summarize([{ chapter: 4, state: failed }])).toEqual({
      succeeded: [],
      failed: [{ chapter: 4, stage: 'Assembled', reason: 'EncodingError: status 1' }],
      outcomes: [{ chapter: 4, state: failed }],
      exitCode: 1,
    });
  });
});

describe('run artifacts', () => {
  it('writes the provider bytes to disk', async () => {
    const { settings, pipeline } = await harness();
    await writeChapter(settings, 1, 'text');
    await mkdir(settings.directories.output, { recursive: true });

    await pipeline.run(1);

    expect(new Uint8Array(await readFile(path.join(settings.directories.audio, 'chapter_1.mp3')))).toEqual(
      new Uint8Array([0x49, 0x44, 0x33, 0x04])
    );
  });
});
