import { z } from 'zod';

export const SLOT = '{}';

export function countSlots(pattern: string): number {
  return pattern.split(SLOT).length - 1;
}

export function fillPattern(pattern: string, chapter: number): string {
  return pattern.replace(SLOT, String(chapter));
}

const nonEmpty = z.string().trim().min(1, 'must be a non-empty string');

const filenamePattern = nonEmpty.refine(
  (value) => countSlots(value) === 1,
  `must contain exactly one "${SLOT}" slot for the chapter number`
);

// YAML readers turn `video_quality: 18` into a number; the encoder wants the text verbatim
const textValue = z.preprocess((value) => (typeof value === 'number' ? String(value) : value), nonEmpty);

const sceneIndex = /^[1-9]\d*$/;

export const CONFIG_SCHEMA = z.object({
  directories: z.object({
    input: nonEmpty,
    output: nonEmpty,
    audio: nonEmpty,
    images: nonEmpty,
  }),
  story: z.object({
    chapter_file_pattern: filenamePattern,
    output_filename_pattern: filenamePattern,
    base_prompt_pattern: filenamePattern.optional(),
  }),
  elevenlabs: z.object({
    model: nonEmpty,
    default_voice: nonEmpty,
    quality: textValue,
  }),
  openai: z.object({
    model: nonEmpty,
    image_size: nonEmpty.regex(/^\d+x\d+$/, 'must look like "WIDTHxHEIGHT"'),
    quality: textValue,
    base_prompts: z
      .record(z.string(), nonEmpty)
      .superRefine((prompts, ctx) => {
        const keys = Object.keys(prompts);
        if (keys.length === 0) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'must define at least one scene prompt' });
        }
        for (const key of keys) {
          if (!sceneIndex.test(key)) {
            ctx.addIssue({
              code: z.ZodIssueCode.custom,
              path: [key],
              message: 'scene index must be a positive integer',
            });
          }
        }
      }),
  }),
  video: z.object({
    fps: z.number({ invalid_type_error: 'must be a positive integer' }).int('must be a positive integer').positive('must be a positive integer'),
    video_codec: nonEmpty,
    video_quality: textValue,
    video_preset: nonEmpty,
    audio_codec: nonEmpty,
    audio_bitrate: textValue,
    pixel_format: nonEmpty,
  }),
});

export type ConfigDocument = z.infer<typeof CONFIG_SCHEMA>;
