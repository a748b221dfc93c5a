import { InvalidArgumentError } from 'commander';
import type { ForceStage } from '../types';

const POSITIVE_INT = /^[1-9]\d*$/;

export function parsePositiveInt(value: string): number {
  const trimmed = value.trim();
  if (!POSITIVE_INT.test(trimmed)) {
    throw new InvalidArgumentError(`"${value}" is not a positive integer.`);
  }
  return Number.parseInt(trimmed, 10);
}

/**
 * Parses `3`, `1-5` or `1,3,7-9` into an ascending list of distinct chapter numbers.
 */
export function parseChapterList(value: string): number[] {
  const chapters = new Set<number>();

  for (const part of value.split(',')) {
    const token = part.trim();
    if (!token) {
      throw new InvalidArgumentError(`Empty entry in chapter list "${value}".`);
    }

    const range = token.match(/^(\d+)\s*-\s*(\d+)$/);
    if (range?.[1] && range[2]) {
      const from = parsePositiveInt(range[1]);
      const to = parsePositiveInt(range[2]);
      if (to < from) {
        throw new InvalidArgumentError(`Chapter range "${token}" runs backwards.`);
      }
      for (let chapter = from; chapter <= to; chapter++) chapters.add(chapter);
      continue;
    }

    chapters.add(parsePositiveInt(token));
  }

  return [...chapters].sort((a, b) => a - b);
}

/** Scene list for `--scenes`: order kept, duplicates dropped. */
export function parseSceneList(value: string): number[] {
  return [...new Set(value.split(',').map((token) => parsePositiveInt(token)))];
}

const STAGES: readonly ForceStage[] = ['narration', 'illustration', 'assembly'];

function isForceStage(value: string): value is ForceStage {
  return STAGES.some((stage) => stage === value);
}

/** Stage list for `--force-stage`, e.g. `narration,assembly`. */
export function parseStageList(value: string): ForceStage[] {
  const stages = new Set<ForceStage>();
  for (const part of value.split(',')) {
    const token = part.trim().toLowerCase();
    if (!isForceStage(token)) {
      throw new InvalidArgumentError(`Unknown stage "${part.trim()}" (expected ${STAGES.join(', ')}).`);
    }
    stages.add(token);
  }
  return [...stages];
}
