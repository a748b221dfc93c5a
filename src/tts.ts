import { TransientProviderError, errorMessage } from './errors';
import type { SpeechSettings, SpeechSynthesizer } from './types';

const MAX_CHARS = 11000;
const API_BASE = 'https://api.elevenlabs.io/v1';

const OUTPUT_FORMATS: Record<string, string> = {
  high_quality: 'mp3_44100_192',
  standard: 'mp3_44100_128',
  low_latency: 'mp3_22050_32',
};

export interface ElevenLabsOptions {
  apiKey: string;
  settings: SpeechSettings;
  fetch?: typeof fetch;
}

export function outputFormatFor(quality: string): string {
  return OUTPUT_FORMATS[quality] ?? quality;
}

export class ElevenLabsSynthesizer implements SpeechSynthesizer {
  private readonly fetchImpl: typeof fetch;

  /** Longest text one request accepts; NarrationRequester splits anything longer. */
  readonly maxCharacters = MAX_CHARS;

  constructor(private readonly options: ElevenLabsOptions) {
    this.fetchImpl = options.fetch ?? fetch;
  }

  async synthesize(text: string, voice: string, signal?: AbortSignal): Promise<Uint8Array> {
    const { apiKey, settings } = this.options;
    const url = `${API_BASE}/text-to-speech/${encodeURIComponent(voice)}?output_format=${encodeURIComponent(outputFormatFor(settings.quality))}`;

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method: 'POST',
        headers: {
          'xi-api-key': apiKey,
          'Content-Type': 'application/json',
          Accept: 'audio/mpeg',
        },
        body: JSON.stringify({
          text,
          model_id: settings.model,
          voice_settings: {
            stability: 0.5,
            similarity_boost: 0.75,
          },
        }),
        signal,
      });
    } catch (error) {
      if (signal?.aborted) throw error;
      throw new TransientProviderError(`ElevenLabs request failed: ${errorMessage(error)}`, undefined, { cause: error });
    }

    if (!response.ok) {
      const errorText = await response.text();

      if (response.status === 401) {
        throw new Error('Invalid ElevenLabs API key. Check ELEVENLABS_API_KEY in .env');
      }

      if (response.status === 429) {
        const retryAfter = parseRetryAfter(response.headers.get('Retry-After'));
        throw new TransientProviderError(
          `ElevenLabs rate limit exceeded. Retry after ${retryAfter === undefined ? 'unknown' : `${retryAfter / 1000}`} seconds.`,
          retryAfter
        );
      }

      if (response.status >= 500) {
        throw new TransientProviderError(`ElevenLabs server error: ${response.status} ${response.statusText}`);
      }

      throw new Error(`ElevenLabs API error: ${response.status} ${response.statusText}. ${errorText}`.trim());
    }

    return new Uint8Array(await response.arrayBuffer());
  }
}

/** Seconds from a Retry-After header, as milliseconds. */
export function parseRetryAfter(header: string | null): number | undefined {
  if (!header) return undefined;
  const seconds = Number.parseInt(header, 10);
  return Number.isNaN(seconds) || seconds < 0 ? undefined : seconds * 1000;
}
