import { saveArtifact } from './generator';
import { GenerationError, PromptNotFoundError, errorMessage } from './errors';
import type { RateLimiter } from './services/rate-limiter';
import type { ImageGenerator, Settings } from './types';
import { logger } from './utils/logger';

/** OpenAI rejects image prompts longer than this. */
export const MAX_PROMPT_CHARS = 4000;

export interface IllustrationRequest {
  scene: number;
  imagePath: string;
  /** Chapter passage appended to the template so the image follows the text. */
  context?: string;
  /** Per-chapter prompt that replaces the template of a configured scene. */
  basePrompt?: string | null;
  signal?: AbortSignal;
}

export interface IllustrationResult {
  imagePath: string;
  scene: number;
  prompt: string;
  bytes: number;
}

const log = logger.child('illustration');

export function buildPrompt(template: string, context?: string, maxChars = MAX_PROMPT_CHARS): string {
  const base = template.trim();
  const passage = context?.replace(/\s+/g, ' ').trim();
  if (!passage) return base.slice(0, maxChars);

  const prefix = `${base} Context: `;
  const room = maxChars - prefix.length;
  if (room <= 0) return base.slice(0, maxChars);

  return prefix + (passage.length > room ? passage.slice(0, room - 1).trimEnd() + '…' : passage);
}

export class IllustrationRequester {
  constructor(
    private readonly settings: Settings,
    private readonly generator: ImageGenerator,
    private readonly limiter: RateLimiter
  ) {}

  /**
   * The scene must be configured even when a per-chapter prompt replaces its template.
   * @throws PromptNotFoundError when the scene has no configured template
   */
  resolveTemplate(scene: number, basePrompt?: string | null): string {
    const template = this.settings.image.basePrompts.get(scene);
    if (template === undefined) {
      throw new PromptNotFoundError(scene, [...this.settings.image.basePrompts.keys()]);
    }
    return basePrompt || template;
  }

  async illustrate(request: IllustrationRequest): Promise<IllustrationResult> {
    const { scene, imagePath, signal } = request;
    const prompt = buildPrompt(this.resolveTemplate(scene, request.basePrompt), request.context);
    const { size, quality, model } = this.settings.image;

    log.debug('Requesting illustration', { scene, model, size, quality, promptLength: prompt.length });

    let image: Uint8Array;
    try {
      image = await this.limiter.execute(
        `illustration ${imagePath}`,
        (attemptSignal) => this.generator.generate(prompt, size, quality, attemptSignal),
        signal
      );
    } catch (error) {
      if (signal?.aborted) throw error;
      throw new GenerationError(`Image generation failed: ${errorMessage(error)}`, error);
    }

    if (image.byteLength === 0) {
      throw new GenerationError('Image provider returned no image');
    }

    const written = await saveArtifact(image, imagePath);
    return { imagePath: written, scene, prompt, bytes: image.byteLength };
  }
}
