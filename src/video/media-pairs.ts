import * as path from 'path';
import { readdir } from 'fs/promises';
import { isMissingFile } from '../errors';
import type { MediaPair } from '../types';

const AUDIO_EXTENSIONS = ['.mp3'];
// First match wins when a stem has several images
const IMAGE_EXTENSIONS = ['.png', '.jpg', '.jpeg'];

export interface MediaPairing {
  pairs: MediaPair[];
  /** Audio files with no image of the same stem. */
  unmatched: string[];
}

/** `part2` sorts before `part10`. */
export function naturalCompare(a: string, b: string): number {
  return a.localeCompare(b, 'en', { numeric: true });
}

async function listFiles(dir: string, extensions: string[]): Promise<string[]> {
  let names: string[];
  try {
    names = await readdir(dir);
  } catch (error) {
    if (isMissingFile(error)) return [];
    throw error;
  }

  return names.filter((name) => {
    const { name: stem, ext } = path.parse(name);
    return extensions.includes(ext.toLowerCase()) && !stem.endsWith('.partial');
  });
}

/**
 * Matches audio files to images by file stem and returns the pairs in natural
 * order of their stems.
 */
export async function findMediaPairs(audioDir: string, imageDir: string): Promise<MediaPairing> {
  const audioFiles = await listFiles(audioDir, AUDIO_EXTENSIONS);
  const imageFiles = await listFiles(imageDir, IMAGE_EXTENSIONS);

  const images = new Map<string, string>();
  const rank = (name: string) => IMAGE_EXTENSIONS.indexOf(path.extname(name).toLowerCase());
  for (const name of [...imageFiles].sort((a, b) => rank(a) - rank(b))) {
    const stem = path.parse(name).name;
    if (!images.has(stem)) images.set(stem, path.join(imageDir, name));
  }

  const pairs: MediaPair[] = [];
  const unmatched: string[] = [];
  const stemOf = (name: string) => path.parse(name).name;

  for (const name of [...audioFiles].sort((a, b) => naturalCompare(stemOf(a), stemOf(b)))) {
    const stem = stemOf(name);
    const imagePath = images.get(stem);
    if (imagePath === undefined) {
      unmatched.push(name);
      continue;
    }
    pairs.push({ stem, audioPath: path.join(audioDir, name), imagePath });
  }

  return { pairs, unmatched };
}
