import ora from 'ora';
import * as path from 'path';
import { loadSettingsFile } from '../config/loader';
import { errorMessage } from '../errors';
import type { MediaEncoder, Settings } from '../types';
import { Logger } from '../utils/logger';
import { VideoAssembler } from '../video/assembler';
import { FfmpegEncoder } from '../video/encoder';
import { findMediaPairs } from '../video/media-pairs';

export interface CombineOptions {
  config: string;
  root?: string;
  /** Directory holding both the audio and the images. Defaults to the configured directories. */
  dir?: string;
  output?: string;
  format?: 'text' | 'json';
}

export interface CombineReport {
  output: string;
  pairs: string[];
  unmatched: string[];
}

const DEFAULT_OUTPUT = 'combined_video.mp4';

/** A bare file name lands in the output directory; anything with a directory is taken as a path. */
export function resolveCombineOutput(output: string | undefined, settings: Settings): string {
  const name = output ?? DEFAULT_OUTPUT;
  return path.basename(name) === name ? path.join(settings.directories.output, name) : path.resolve(name);
}

export async function combineCommand(
  options: CombineOptions,
  encoder: MediaEncoder = new FfmpegEncoder()
): Promise<CombineReport | undefined> {
  const isJsonMode = options.format === 'json';
  Logger.silence(isJsonMode);
  const spinner = isJsonMode ? null : ora('Finding matching media files...').start();

  try {
    const settings = await loadSettingsFile(options.config, { root: options.root });
    const audioDir = options.dir ? path.resolve(options.dir) : settings.directories.audio;
    const imageDir = options.dir ? path.resolve(options.dir) : settings.directories.images;

    const { pairs, unmatched } = await findMediaPairs(audioDir, imageDir);
    if (spinner) {
      spinner.info(`Found ${pairs.length} matching pairs`);
      unmatched.forEach((name) => console.log(`  ⚠ No matching image for ${name}`));
      spinner.start('Encoding combined video...');
    }

    const output = await new VideoAssembler(settings, encoder).combine({
      pairs,
      outputPath: resolveCombineOutput(options.output, settings),
    });
    const report: CombineReport = { output, pairs: pairs.map((pair) => pair.stem), unmatched };

    if (spinner) spinner.succeed(`Combined ${pairs.length} pairs into ${output}`);
    if (isJsonMode) console.log(JSON.stringify({ success: true, ...report }, null, 2));
    return report;
  } catch (error) {
    if (spinner) spinner.fail('Combining failed');
    const errorMsg = errorMessage(error);

    if (isJsonMode) {
      console.log(JSON.stringify({ success: false, error: errorMsg }, null, 2));
    } else {
      console.error(`\nError: ${errorMsg}`);
    }
    process.exitCode = 1;
    return undefined;
  }
}
