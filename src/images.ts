import OpenAI from 'openai';
import type { ImageGenerateParams } from 'openai/resources/images';
import { TransientProviderError, errorMessage } from './errors';
import { parseRetryAfter } from './tts';
import type { ImageGenerator, ImageSettings } from './types';

type ImageSize = NonNullable<ImageGenerateParams['size']>;
type ImageQuality = NonNullable<ImageGenerateParams['quality']>;

const SIZES = ['256x256', '512x512', '1024x1024', '1792x1024', '1024x1792'] as const satisfies readonly ImageSize[];
const QUALITIES = ['standard', 'hd'] as const satisfies readonly ImageQuality[];

export function isImageSize(value: string): value is (typeof SIZES)[number] {
  return SIZES.some((size) => size === value);
}

export function isImageQuality(value: string): value is (typeof QUALITIES)[number] {
  return QUALITIES.some((quality) => quality === value);
}

/** The slice of the OpenAI client this generator calls. */
export interface ImagesApi {
  generate(
    body: ImageGenerateParams,
    options?: { signal?: AbortSignal }
  ): Promise<{ data?: { b64_json?: string; url?: string }[] }>;
}

export interface OpenAIImageOptions {
  settings: ImageSettings;
  apiKey?: string;
  images?: ImagesApi;
  fetch?: typeof fetch;
}

export class OpenAIImageGenerator implements ImageGenerator {
  private readonly images: ImagesApi;
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: OpenAIImageOptions) {
    this.fetchImpl = options.fetch ?? fetch;

    if (options.images) {
      this.images = options.images;
    } else {
      // Retries happen in RateLimiter, so the SDK must not retry on its own
      const client = new OpenAI({ apiKey: options.apiKey, maxRetries: 0 });
      this.images = { generate: (body, requestOptions) => client.images.generate(body, requestOptions) };
    }
  }

  async generate(prompt: string, size: string, quality: string, signal?: AbortSignal): Promise<Uint8Array> {
    if (!isImageSize(size)) {
      throw new Error(`Unsupported image size "${size}" (expected one of ${SIZES.join(', ')})`);
    }
    if (!isImageQuality(quality)) {
      throw new Error(`Unsupported image quality "${quality}" (expected one of ${QUALITIES.join(', ')})`);
    }

    let response: Awaited<ReturnType<ImagesApi['generate']>>;
    try {
      response = await this.images.generate(
        {
          model: this.options.settings.model,
          prompt,
          size,
          quality,
          n: 1,
          response_format: 'b64_json',
        },
        { signal }
      );
    } catch (error) {
      throw classifyOpenAIError(error);
    }

    const image = response.data?.[0];
    if (image?.b64_json) {
      return Buffer.from(image.b64_json, 'base64');
    }
    if (image?.url) {
      return this.download(image.url, signal);
    }
    return new Uint8Array(0);
  }

  private async download(url: string, signal?: AbortSignal): Promise<Uint8Array> {
    const response = await this.fetchImpl(url, { signal });
    if (!response.ok) {
      const message = `Image download failed: ${response.status} ${response.statusText}`;
      throw response.status >= 500 ? new TransientProviderError(message) : new Error(message);
    }
    return new Uint8Array(await response.arrayBuffer());
  }
}

export function classifyOpenAIError(error: unknown): unknown {
  if (error instanceof OpenAI.RateLimitError) {
    return new TransientProviderError(
      `OpenAI rate limit exceeded: ${error.message}`,
      parseRetryAfter(error.headers?.['retry-after'] ?? null),
      { cause: error }
    );
  }
  if (error instanceof OpenAI.InternalServerError || error instanceof OpenAI.APIConnectionError) {
    return new TransientProviderError(`OpenAI unavailable: ${errorMessage(error)}`, undefined, { cause: error });
  }
  return error;
}
