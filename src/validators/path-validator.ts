import * as path from 'path';

/**
 * Rejects paths carrying null bytes and returns the absolute form.
 * @throws Error if the path contains a null byte
 */
export function sanitizePath(target: string): string {
  if (target.includes('\0')) {
    throw new Error('Invalid path: null byte detected');
  }

  return path.resolve(target);
}

/**
 * Validates that a resolved file path is within an intended directory
 * @throws Error if path escapes the intended directory
 */
export function validatePathWithinDirectory(filePath: string, intendedDir: string): void {
  const resolvedPath = path.resolve(filePath);
  const resolvedDir = path.resolve(intendedDir);
  const relative = path.relative(resolvedDir, resolvedPath);

  if (relative === '' || relative.startsWith('..') || path.isAbsolute(relative)) {
    throw new Error(`Path traversal detected: ${filePath} is outside ${intendedDir}`);
  }
}
