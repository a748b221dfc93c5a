import * as path from 'path';
import { readFile } from 'fs/promises';
import { fillPattern } from '../config/schema';
import type { ChapterPaths, Settings } from '../types';
import { isMissingFile } from '../errors';

export async function readChapterText(paths: ChapterPaths): Promise<string> {
  return readFile(paths.input, 'utf8');
}

export function splitIntoParagraphs(text: string): string[] {
  return text
    .split(/\r?\n\s*\r?\n/)
    .map((p) => p.trim())
    .filter((p) => p.length > 0);
}

/**
 * Reads the optional per-chapter prompt file. Returns null when no pattern is
 * configured or the file is missing or blank.
 */
export async function readBasePrompt(chapter: number, settings: Settings): Promise<string | null> {
  const pattern = settings.story.basePromptPattern;
  if (!pattern) return null;

  const promptPath = path.join(settings.directories.input, fillPattern(pattern, chapter));
  try {
    const text = (await readFile(promptPath, 'utf8')).trim();
    return text.length > 0 ? text : null;
  } catch (error) {
    if (isMissingFile(error)) return null;
    throw error;
  }
}
