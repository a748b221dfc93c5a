import ffmpeg from 'fluent-ffmpeg';
import { errorMessage } from '../errors';
import type { CombineJob, EncodeJob, EncodeParams, EncodeResult, MediaEncoder } from '../types';

export function buildOutputOptions(job: EncodeParams): string[] {
  return [
    `-r ${job.fps}`,
    `-c:v ${job.videoCodec}`,
    `-crf ${job.videoQuality}`,
    `-preset ${job.preset}`,
    `-pix_fmt ${job.pixelFormat}`,
    `-c:a ${job.audioCodec}`,
    `-b:a ${job.audioBitrate}`,
    '-shortest',
  ];
}

/** Each still gets an equal share of the narration. */
export function stillDurations(imageCount: number, audioSeconds: number): number[] {
  const share = audioSeconds / imageCount;
  return Array.from({ length: imageCount }, () => Number(share.toFixed(3)));
}

/** `[0:v][1:a][2:v][3:a]concat=n=2:v=1:a=1[v][a]` for inputs laid out image, audio, image, audio. */
export function pairConcatFilter(pairCount: number): string {
  const labels = Array.from({ length: pairCount }, (_, i) => `[${2 * i}:v][${2 * i + 1}:a]`).join('');
  return `${labels}concat=n=${pairCount}:v=1:a=1[v][a]`;
}

export function exitCodeFrom(error: Error): number {
  const match = error.message.match(/exited with code (\d+)/);
  return match?.[1] ? Number.parseInt(match[1], 10) : 1;
}

function probeDuration(file: string): Promise<number> {
  return new Promise((resolve, reject) => {
    ffmpeg.ffprobe(file, (err, data) => {
      if (err) return reject(err);
      const duration = data.format.duration;
      resolve(typeof duration === 'number' && duration > 0 ? duration : 0);
    });
  });
}

/**
 * Drives the ffmpeg binary through fluent-ffmpeg. Never rejects: failures come
 * back as a non-zero exit code with ffmpeg's stderr.
 */
export class FfmpegEncoder implements MediaEncoder {
  async encode(job: EncodeJob): Promise<EncodeResult> {
    try {
      const command = await this.buildCommand(job);
      return await this.run(command, job.outputPath);
    } catch (error) {
      return { exitCode: 1, stderr: errorMessage(error) };
    }
  }

  async combine(job: CombineJob): Promise<EncodeResult> {
    try {
      const command = await this.buildCombineCommand(job);
      return await this.run(command, job.outputPath);
    } catch (error) {
      return { exitCode: 1, stderr: errorMessage(error) };
    }
  }

  private async buildCombineCommand(job: CombineJob): Promise<ffmpeg.FfmpegCommand> {
    const command = ffmpeg();
    const durations = await Promise.all(job.pairs.map((pair) => probeDuration(pair.audioPath)));

    job.pairs.forEach((pair, i) => {
      command.input(pair.imagePath).inputOptions(['-loop 1', `-framerate ${job.fps}`, `-t ${(durations[i] ?? 0).toFixed(3)}`]);
      command.input(pair.audioPath);
    });

    return command
      .complexFilter(pairConcatFilter(job.pairs.length))
      .outputOptions(['-map [v]', '-map [a]', ...buildOutputOptions(job)]);
  }

  private async buildCommand(job: EncodeJob): Promise<ffmpeg.FfmpegCommand> {
    const command = ffmpeg();
    const outputOptions = buildOutputOptions(job);

    const [first] = job.imagePaths;
    if (job.imagePaths.length === 1 && first) {
      command.input(first).inputOptions(['-loop 1', `-framerate ${job.fps}`]);
      command.input(job.audioPath);
      return command.outputOptions(outputOptions);
    }

    const durations = stillDurations(job.imagePaths.length, await probeDuration(job.audioPath));
    job.imagePaths.forEach((image, i) => {
      command.input(image).inputOptions(['-loop 1', `-framerate ${job.fps}`, `-t ${durations[i] ?? 0}`]);
    });
    command.input(job.audioPath);

    const audioIndex = job.imagePaths.length;
    const labels = job.imagePaths.map((_, i) => `[${i}:v]`).join('');
    return command
      .complexFilter(`${labels}concat=n=${job.imagePaths.length}:v=1:a=0[v]`)
      .outputOptions(['-map [v]', `-map ${audioIndex}:a`, ...outputOptions]);
  }

  private run(command: ffmpeg.FfmpegCommand, outputPath: string): Promise<EncodeResult> {
    return new Promise((resolve) => {
      command
        .on('end', (_stdout: string | null, stderr: string | null) => resolve({ exitCode: 0, stderr: stderr ?? '' }))
        .on('error', (err: Error, _stdout: string | null, stderr: string | null) =>
          resolve({ exitCode: exitCodeFrom(err), stderr: stderr || err.message })
        )
        .save(outputPath);
    });
  }
}
