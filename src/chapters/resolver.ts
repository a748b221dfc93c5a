import * as path from 'path';
import { stat } from 'fs/promises';
import { fillPattern } from '../config/schema';
import { ChapterNotFoundError, isMissingFile } from '../errors';
import type { ChapterPaths, Settings } from '../types';
import { validatePathWithinDirectory } from '../validators/path-validator';

export function assertChapterNumber(chapter: number): void {
  if (!Number.isSafeInteger(chapter) || chapter < 1) {
    throw new RangeError(`Chapter number must be a positive integer, got ${chapter}`);
  }
}

function within(dir: string, fileName: string): string {
  const filePath = path.join(dir, fileName);
  validatePathWithinDirectory(filePath, dir);
  return filePath;
}

/**
 * Flattens the filled output name into one file stem:
 * `chapter_1.mp4` → `chapter_1`, `ch1/video.mp4` → `ch1_video`.
 */
export function artifactStem(videoName: string): string {
  const withoutExt = videoName.slice(0, videoName.length - path.extname(videoName).length);
  return withoutExt
    .split(/[\\/]+/)
    .filter((part) => part.length > 0 && part !== '.')
    .join('_');
}

/**
 * Derives every path a chapter reads or writes without touching the disk.
 * Audio and images are named after the whole filled output name, so a slot in
 * a directory component still gives each chapter its own files.
 */
export function describeChapterPaths(chapter: number, settings: Settings): ChapterPaths {
  assertChapterNumber(chapter);
  const { directories, story } = settings;

  const videoName = fillPattern(story.outputFilenamePattern, chapter);
  const stem = artifactStem(videoName);

  return {
    chapter,
    input: within(directories.input, fillPattern(story.chapterFilePattern, chapter)),
    audio: within(directories.audio, `${stem}.mp3`),
    image: within(directories.images, `${stem}.png`),
    video: within(directories.output, videoName),
    sceneImage: (scene: number) => within(directories.images, `${stem}_scene_${scene}.png`),
  };
}

/**
 * @throws ChapterNotFoundError when the chapter's input text file does not exist
 */
export async function resolveChapter(chapter: number, settings: Settings): Promise<ChapterPaths> {
  const paths = describeChapterPaths(chapter, settings);

  try {
    const stats = await stat(paths.input);
    if (!stats.isFile()) {
      throw new ChapterNotFoundError(chapter, paths.input);
    }
  } catch (error) {
    if (error instanceof ChapterNotFoundError) throw error;
    if (isMissingFile(error)) throw new ChapterNotFoundError(chapter, paths.input);
    throw error;
  }

  return paths;
}
