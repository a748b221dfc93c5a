export * from './types';
export * from './errors';
export { loadSettings, loadSettingsFile, parseSettings } from './config/loader';
export { readRuntimeEnv } from './config/env';
export { resolveChapter, describeChapterPaths } from './chapters/resolver';
export { readChapterText, readBasePrompt, splitIntoParagraphs } from './chapters/story';
export { NarrationRequester } from './narration';
export { IllustrationRequester, buildPrompt } from './illustration';
export { VideoAssembler } from './video/assembler';
export { findMediaPairs, naturalCompare } from './video/media-pairs';
export { FfmpegEncoder } from './video/encoder';
export { ElevenLabsSynthesizer } from './tts';
export { OpenAIImageGenerator } from './images';
export { RateLimiter } from './services/rate-limiter';
export { StateManager } from './services/state-manager';
export { ChapterPipeline, summarize } from './pipeline';
export { createPipeline } from './factory';
