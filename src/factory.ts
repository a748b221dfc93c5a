import { getElevenLabsApiKey, getOpenAIApiKey, type RuntimeEnv } from './config/env';
import { IllustrationRequester } from './illustration';
import { OpenAIImageGenerator } from './images';
import { NarrationRequester } from './narration';
import { ChapterPipeline } from './pipeline';
import { RateLimiter } from './services/rate-limiter';
import { StateManager } from './services/state-manager';
import { ElevenLabsSynthesizer } from './tts';
import type { ImageGenerator, MediaEncoder, Settings, SpeechSynthesizer } from './types';
import { VideoAssembler } from './video/assembler';
import { FfmpegEncoder } from './video/encoder';

export interface PipelineOverrides {
  synthesizer?: SpeechSynthesizer;
  imageGenerator?: ImageGenerator;
  encoder?: MediaEncoder;
  limiter?: RateLimiter;
  stateManager?: StateManager;
}

/**
 * Wires the production providers. API keys are read only for providers that
 * are not overridden.
 */
export function createPipeline(settings: Settings, runtime: RuntimeEnv, overrides: PipelineOverrides = {}): ChapterPipeline {
  const limiter = overrides.limiter ?? new RateLimiter({
    requestsPerSecond: runtime.requestsPerSecond,
    maxRetries: runtime.maxRetries,
    timeoutMs: runtime.timeoutMs,
  });

  const synthesizer = overrides.synthesizer ?? new ElevenLabsSynthesizer({
    apiKey: getElevenLabsApiKey(),
    settings: settings.speech,
  });
  const imageGenerator = overrides.imageGenerator ?? new OpenAIImageGenerator({
    apiKey: getOpenAIApiKey(),
    settings: settings.image,
  });

  return new ChapterPipeline({
    settings,
    narration: new NarrationRequester(settings, synthesizer, limiter),
    illustration: new IllustrationRequester(settings, imageGenerator, limiter),
    assembler: new VideoAssembler(settings, overrides.encoder ?? new FfmpegEncoder()),
    stateManager: overrides.stateManager ?? new StateManager(),
  });
}
