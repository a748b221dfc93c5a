import * as path from 'path';
import { rename, rm } from 'fs/promises';
import { EncodingError, errorMessage } from '../errors';
import { ensureOutputDir, fileExists, partialPath } from '../generator';
import type { EncodeJob, EncodeParams, EncodeResult, MediaEncoder, MediaPair, Settings } from '../types';
import { logger } from '../utils/logger';

export interface AssembleRequest {
  audioPath: string;
  imagePaths: string[];
  outputPath: string;
}

export interface CombineRequest {
  pairs: MediaPair[];
  outputPath: string;
}

const log = logger.child('video');

export class VideoAssembler {
  constructor(
    private readonly settings: Settings,
    private readonly encoder: MediaEncoder
  ) {}

  buildJob(request: AssembleRequest, outputPath = request.outputPath): EncodeJob {
    return {
      audioPath: request.audioPath,
      imagePaths: [...request.imagePaths],
      ...this.encodeParams(outputPath),
    };
  }

  private encodeParams(outputPath: string): EncodeParams {
    const { video } = this.settings;
    return {
      outputPath,
      fps: video.fps,
      videoCodec: video.videoCodec,
      videoQuality: video.videoQuality,
      preset: video.preset,
      audioCodec: video.audioCodec,
      audioBitrate: video.audioBitrate,
      pixelFormat: video.pixelFormat,
    };
  }

  /**
   * Encodes into a temporary sibling file and renames it into place, so the
   * output path only ever holds a complete video. Not retried.
   * @throws EncodingError when an input is missing or the encoder fails
   */
  async assemble(request: AssembleRequest): Promise<string> {
    if (request.imagePaths.length === 0) {
      throw new EncodingError('At least one image is required to assemble a video');
    }
    await assertInputs([request.audioPath, ...request.imagePaths]);

    return this.encodeInto(request.outputPath, (temp) => {
      const job = this.buildJob(request, temp);
      log.debug('Encoding video', { output: request.outputPath, images: job.imagePaths.length, codec: job.videoCodec });
      return this.encoder.encode(job);
    });
  }

  /**
   * Joins audio/image pairs, in the order given, into one video.
   * @throws EncodingError when there are no pairs, an input is missing or the encoder fails
   */
  async combine(request: CombineRequest): Promise<string> {
    if (request.pairs.length === 0) {
      throw new EncodingError('No matching audio-image pairs found');
    }
    await assertInputs(request.pairs.flatMap((pair) => [pair.audioPath, pair.imagePath]));

    return this.encodeInto(request.outputPath, (temp) => {
      log.debug('Combining media pairs', { output: request.outputPath, pairs: request.pairs.length });
      return this.encoder.combine({ ...this.encodeParams(temp), pairs: [...request.pairs] });
    });
  }

  private async encodeInto(outputPath: string, encode: (temp: string) => Promise<EncodeResult>): Promise<string> {
    await ensureOutputDir(path.dirname(outputPath));
    const temp = partialPath(outputPath);
    await rm(temp, { force: true });

    let result: EncodeResult;
    try {
      result = await encode(temp);
    } catch (error) {
      await rm(temp, { force: true });
      throw new EncodingError(`Encoder could not be started: ${errorMessage(error)}`);
    }

    if (result.exitCode !== 0) {
      await rm(temp, { force: true });
      throw new EncodingError(`Encoder exited with status ${result.exitCode}`, result.stderr.trim());
    }

    if (!(await fileExists(temp))) {
      throw new EncodingError('Encoder reported success but wrote no output');
    }

    await rename(temp, outputPath);
    return outputPath;
  }
}

async function assertInputs(inputs: string[]): Promise<void> {
  for (const input of inputs) {
    if (!(await fileExists(input))) {
      throw new EncodingError(`Missing input artifact: ${input}`);
    }
  }
}
