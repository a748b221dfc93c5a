import { logger } from '../utils/logger';

export const DEFAULT_CONCURRENT_CHAPTERS = 2;
export const DEFAULT_REQUESTS_PER_SECOND = 3;
export const DEFAULT_MAX_RETRIES = 3;
export const DEFAULT_PROVIDER_TIMEOUT_MS = 120_000;

function readInt(name: string, fallback: number, minimum: number, env: NodeJS.ProcessEnv): number {
  const envValue = env[name];

  if (!envValue) {
    return fallback;
  }

  const parsed = Number.parseInt(envValue, 10);
  if (Number.isNaN(parsed) || parsed < minimum) {
    logger.warn(`Invalid ${name} value "${envValue}". Using minimum value of ${minimum}.`);
    return minimum;
  }

  return parsed;
}

export function readPositiveInt(name: string, fallback: number, env: NodeJS.ProcessEnv = process.env): number {
  return readInt(name, fallback, 1, env);
}

/** Like readPositiveInt, but 0 is allowed (e.g. no retries). */
export function readNonNegativeInt(name: string, fallback: number, env: NodeJS.ProcessEnv = process.env): number {
  return readInt(name, fallback, 0, env);
}

export interface RuntimeEnv {
  concurrentChapters: number;
  requestsPerSecond: number;
  maxRetries: number;
  timeoutMs: number;
  voiceOverride?: string;
}

export function readRuntimeEnv(env: NodeJS.ProcessEnv = process.env): RuntimeEnv {
  return {
    concurrentChapters: readPositiveInt('CONCURRENT_CHAPTERS', DEFAULT_CONCURRENT_CHAPTERS, env),
    requestsPerSecond: readPositiveInt('REQUESTS_PER_SECOND', DEFAULT_REQUESTS_PER_SECOND, env),
    maxRetries: readNonNegativeInt('PROVIDER_MAX_RETRIES', DEFAULT_MAX_RETRIES, env),
    timeoutMs: readPositiveInt('PROVIDER_TIMEOUT_MS', DEFAULT_PROVIDER_TIMEOUT_MS, env),
    voiceOverride: env.ELEVENLABS_VOICE_ID || undefined,
  };
}

export function getElevenLabsApiKey(env: NodeJS.ProcessEnv = process.env): string {
  const apiKey = env.ELEVENLABS_API_KEY;

  if (!apiKey) {
    throw new Error(
      'ElevenLabs API key not found. Set ELEVENLABS_API_KEY in .env file.\n' +
      'Get your API key from: https://elevenlabs.io/'
    );
  }

  return apiKey;
}

export function getOpenAIApiKey(env: NodeJS.ProcessEnv = process.env): string {
  const apiKey = env.OPENAI_API_KEY;

  if (!apiKey) {
    throw new Error('OpenAI API key not found. Set OPENAI_API_KEY in .env file.');
  }

  return apiKey;
}
