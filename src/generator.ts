import * as path from 'path';
import { access, mkdir, rename, rm, writeFile } from 'fs/promises';
import { sanitizePath } from './validators/path-validator';

export async function ensureOutputDir(outputDir: string): Promise<void> {
  await mkdir(sanitizePath(outputDir), { recursive: true });
}

/**
 * Writes artifact bytes, creating parent directories. The bytes land in a
 * sibling temp file first so a crash never leaves a truncated artifact behind.
 */
export async function saveArtifact(data: Uint8Array, filePath: string): Promise<string> {
  const target = sanitizePath(filePath);
  await ensureOutputDir(path.dirname(target));

  const temp = partialPath(target);
  try {
    await writeFile(temp, data);
    await rename(temp, target);
  } catch (error) {
    await rm(temp, { force: true });
    throw error;
  }

  return target;
}

/** `out/chapter_1.mp4` → `out/chapter_1.partial.mp4` */
export function partialPath(filePath: string): string {
  const { dir, name, ext } = path.parse(filePath);
  return path.join(dir, `${name}.partial${ext}`);
}

export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await access(filePath);
    return true;
  } catch {
    return false;
  }
}
