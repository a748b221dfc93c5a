import * as path from 'path';
import { readFile } from 'fs/promises';
import { parse } from 'yaml';
import type { ZodIssue } from 'zod';
import { ConfigurationError, errorMessage } from '../errors';
import type { Settings } from '../types';
import { CONFIG_SCHEMA, type ConfigDocument } from './schema';

export interface LoadOptions {
  /** Directory every configured path is resolved against. Defaults to the working directory. */
  root?: string;
}

function issueToError(issue: ZodIssue): ConfigurationError {
  const field = issue.path.length > 0 ? issue.path.join('.') : '<root>';
  const detail = issue.message === 'Required' ? 'missing required field' : issue.message;
  return new ConfigurationError(field, detail);
}

function deepFreeze<T extends object>(value: T): Readonly<T> {
  for (const key of Object.keys(value)) {
    const child: unknown = Reflect.get(value, key);
    if (typeof child === 'object' && child !== null && !Object.isFrozen(child)) {
      deepFreeze(child);
    }
  }
  return Object.freeze(value);
}

function toSettings(doc: ConfigDocument, root: string): Settings {
  const resolve = (dir: string) => path.resolve(root, dir);

  const basePrompts = new Map<number, string>(
    Object.entries(doc.openai.base_prompts)
      .map(([scene, prompt]): [number, string] => [Number(scene), prompt])
      .sort(([a], [b]) => a - b)
  );

  return {
    root,
    directories: {
      input: resolve(doc.directories.input),
      output: resolve(doc.directories.output),
      audio: resolve(doc.directories.audio),
      images: resolve(doc.directories.images),
    },
    story: {
      chapterFilePattern: doc.story.chapter_file_pattern,
      outputFilenamePattern: doc.story.output_filename_pattern,
      basePromptPattern: doc.story.base_prompt_pattern,
    },
    speech: {
      model: doc.elevenlabs.model,
      defaultVoice: doc.elevenlabs.default_voice,
      quality: doc.elevenlabs.quality,
    },
    image: {
      model: doc.openai.model,
      size: doc.openai.image_size,
      quality: doc.openai.quality,
      basePrompts,
    },
    video: {
      fps: doc.video.fps,
      videoCodec: doc.video.video_codec,
      videoQuality: doc.video.video_quality,
      preset: doc.video.video_preset,
      audioCodec: doc.video.audio_codec,
      audioBitrate: doc.video.audio_bitrate,
      pixelFormat: doc.video.pixel_format,
    },
  };
}

/**
 * Validates an already-parsed configuration document and builds the frozen settings value.
 * @throws ConfigurationError naming the first missing or malformed field
 */
export function loadSettings(document: unknown, options: LoadOptions = {}): Settings {
  const result = CONFIG_SCHEMA.safeParse(document);
  if (!result.success) {
    const [first] = result.error.issues;
    throw first ? issueToError(first) : new ConfigurationError('<root>', result.error.message);
  }

  const root = path.resolve(options.root ?? process.cwd());
  return deepFreeze(toSettings(result.data, root));
}

export function parseSettings(yamlText: string, options: LoadOptions = {}): Settings {
  let document: unknown;
  try {
    document = parse(yamlText);
  } catch (error) {
    throw new ConfigurationError('<document>', `not valid YAML: ${errorMessage(error)}`, error);
  }
  return loadSettings(document ?? {}, options);
}

export async function loadSettingsFile(file: string, options: LoadOptions = {}): Promise<Settings> {
  let text: string;
  try {
    text = await readFile(file, 'utf8');
  } catch (error) {
    throw new ConfigurationError(file, `cannot read configuration file: ${errorMessage(error)}`, error);
  }
  return parseSettings(text, options);
}
