import * as os from 'os';
import * as path from 'path';
import { mkdir, mkdtemp, writeFile } from 'fs/promises';
import { loadSettings } from '../config/loader';
import { TransientProviderError } from '../errors';
import { RateLimiter } from '../services/rate-limiter';
import type { CombineJob, EncodeJob, EncodeResult, ImageGenerator, MediaEncoder, Settings, SpeechSynthesizer } from '../types';
import { Logger } from '../utils/logger';

export function baseDocument() {
  return {
    directories: { input: 'input', output: 'output', audio: 'output/audio', images: 'output/images' },
    story: {
      chapter_file_pattern: 'chapter_{}.txt',
      output_filename_pattern: 'chapter_{}.mp4',
      base_prompt_pattern: 'chapter{}_base_prompt.txt',
    },
    elevenlabs: { model: 'eleven_multilingual_v2', default_voice: 'voice-default', quality: 'high_quality' },
    openai: {
      model: 'dall-e-3',
      image_size: '1792x1024',
      quality: 'standard',
      base_prompts: { 1: 'A forest at dawn.', 2: 'A river crossing.', 3: 'A hill temple at dusk.' },
    },
    video: {
      fps: 24,
      video_codec: 'libx264',
      video_quality: 18,
      video_preset: 'veryslow',
      audio_codec: 'aac',
      audio_bitrate: '320k',
      pixel_format: 'yuv420p',
    },
  };
}

export async function makeWorkspace(): Promise<string> {
  return mkdtemp(path.join(os.tmpdir(), 'chapter-reel-'));
}

export function testSettings(root: string): Settings {
  return loadSettings(baseDocument(), { root });
}

export async function writeChapter(settings: Settings, chapter: number, text: string): Promise<string> {
  const file = path.join(settings.directories.input, `chapter_${chapter}.txt`);
  await mkdir(path.dirname(file), { recursive: true });
  await writeFile(file, text, 'utf8');
  return file;
}

export const AUDIO_BYTES = new Uint8Array([0x49, 0x44, 0x33, 0x04]);
export const IMAGE_BYTES = new Uint8Array([0x89, 0x50, 0x4e, 0x47]);

type Step<T> = T | Error;

/** Replays scripted results in order, then repeats the last one. */
class Script<T> {
  calls = 0;
  constructor(private readonly steps: Step<T>[]) {}

  next(): T {
    const step = this.steps[Math.min(this.calls, this.steps.length - 1)];
    this.calls++;
    if (step === undefined) throw new Error('empty script');
    if (step instanceof Error) throw step;
    return step;
  }
}

export class StubSynthesizer implements SpeechSynthesizer {
  readonly requests: { text: string; voice: string }[] = [];
  maxCharacters?: number;
  private readonly script: Script<Uint8Array>;

  constructor(...steps: Step<Uint8Array>[]) {
    this.script = new Script(steps.length > 0 ? steps : [AUDIO_BYTES]);
  }

  get calls(): number {
    return this.script.calls;
  }

  async synthesize(text: string, voice: string): Promise<Uint8Array> {
    this.requests.push({ text, voice });
    return this.script.next();
  }
}

export class StubImageGenerator implements ImageGenerator {
  readonly requests: { prompt: string; size: string; quality: string }[] = [];
  private readonly script: Script<Uint8Array>;

  constructor(...steps: Step<Uint8Array>[]) {
    this.script = new Script(steps.length > 0 ? steps : [IMAGE_BYTES]);
  }

  get calls(): number {
    return this.script.calls;
  }

  async generate(prompt: string, size: string, quality: string): Promise<Uint8Array> {
    this.requests.push({ prompt, size, quality });
    return this.script.next();
  }
}

/** Writes a placeholder video where the job asks, or fails with the given status. */
export class StubEncoder implements MediaEncoder {
  readonly jobs: EncodeJob[] = [];
  readonly combineJobs: CombineJob[] = [];

  constructor(private readonly result: EncodeResult = { exitCode: 0, stderr: '' }) {}

  async encode(job: EncodeJob): Promise<EncodeResult> {
    this.jobs.push(job);
    return this.finish(job.outputPath);
  }

  async combine(job: CombineJob): Promise<EncodeResult> {
    this.combineJobs.push(job);
    return this.finish(job.outputPath);
  }

  private async finish(outputPath: string): Promise<EncodeResult> {
    if (this.result.exitCode === 0) {
      await writeFile(outputPath, 'video');
    }
    return this.result;
  }
}

export function transient(message = 'rate limited'): TransientProviderError {
  return new TransientProviderError(message);
}

export function instantLimiter(maxRetries = 3): { limiter: RateLimiter; delays: number[] } {
  const delays: number[] = [];
  const limiter = new RateLimiter({
    requestsPerSecond: Infinity,
    maxRetries,
    sleep: async (ms) => {
      delays.push(ms);
    },
    logger: new Logger('test', 'error'),
  });
  return { limiter, delays };
}
