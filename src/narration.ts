import { saveArtifact } from './generator';
import { SynthesisError, errorMessage } from './errors';
import type { RateLimiter } from './services/rate-limiter';
import type { Settings, SpeechSynthesizer } from './types';
import { concatBytes, splitTextIntoChunks } from './utils/text-chunks';
import { logger } from './utils/logger';

export interface NarrationRequest {
  text: string;
  audioPath: string;
  /** Overrides the configured default voice. */
  voice?: string;
  signal?: AbortSignal;
}

export interface NarrationResult {
  audioPath: string;
  voice: string;
  bytes: number;
  characters: number;
}

const log = logger.child('narration');

export class NarrationRequester {
  constructor(
    private readonly settings: Settings,
    private readonly synthesizer: SpeechSynthesizer,
    private readonly limiter: RateLimiter
  ) {}

  selectVoice(override?: string): string {
    return override?.trim() || this.settings.speech.defaultVoice;
  }

  splitForProvider(text: string): string[] {
    const limit = this.synthesizer.maxCharacters;
    return limit !== undefined && text.length > limit ? splitTextIntoChunks(text, limit) : [text];
  }

  /**
   * @throws SynthesisError on empty text, a permanent provider error, exhausted
   * retries or an empty audio response
   */
  async narrate(request: NarrationRequest): Promise<NarrationResult> {
    const { text, audioPath, signal } = request;
    if (text.trim().length === 0) {
      throw new SynthesisError('Chapter text is empty');
    }

    const voice = this.selectVoice(request.voice);
    log.debug('Requesting narration', { voice, model: this.settings.speech.model, characters: text.length });

    const chunks = this.splitForProvider(text);
    const parts: Uint8Array[] = [];
    try {
      // One rate-limited request with its own timeout and retries per chunk
      for (const [i, chunk] of chunks.entries()) {
        const label = chunks.length === 1 ? `narration ${audioPath}` : `narration ${audioPath} (part ${i + 1}/${chunks.length})`;
        parts.push(
          await this.limiter.execute(label, (attemptSignal) => this.synthesizer.synthesize(chunk, voice, attemptSignal), signal)
        );
      }
    } catch (error) {
      if (signal?.aborted) throw error;
      throw new SynthesisError(`Speech synthesis failed: ${errorMessage(error)}`, error);
    }

    const audio = concatBytes(parts);
    if (audio.byteLength === 0) {
      throw new SynthesisError('Speech provider returned no audio');
    }

    const written = await saveArtifact(audio, audioPath);
    return { audioPath: written, voice, bytes: audio.byteLength, characters: text.length };
  }
}
