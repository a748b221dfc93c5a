import * as path from 'path';
import { readFile, unlink } from 'fs/promises';
import { errorCode, errorMessage } from '../errors';
import { saveArtifact } from '../generator';
import type { ChapterStage, ChapterState } from '../types';
import { logger } from '../utils/logger';

export interface ChapterRecord {
  state: ChapterState['state'];
  stage?: ChapterStage;
  reason?: string;
  error?: string;
  updatedAt: string;
}

export interface RunState {
  startedAt: string;
  updatedAt: string;
  chapters: Record<string, ChapterRecord>;
}

const STATE_FILE = '.chapter-reel-state.json';
const STATES = new Set<string>(['Pending', 'TextResolved', 'NarrationReady', 'IllustrationReady', 'Assembled', 'Failed']);

const log = logger.child('state');

/**
 * Persists the last batch's per-chapter states in the output directory.
 * Saves are chained so concurrent chapter workers never interleave writes.
 */
export class StateManager {
  private writes: Promise<void> = Promise.resolve();

  constructor(private readonly now: () => Date = () => new Date()) {}

  getStatePath(outputDir: string): string {
    return path.join(path.resolve(outputDir), STATE_FILE);
  }

  create(): RunState {
    const timestamp = this.now().toISOString();
    return { startedAt: timestamp, updatedAt: timestamp, chapters: {} };
  }

  record(state: RunState, chapter: number, chapterState: ChapterState): void {
    const timestamp = this.now().toISOString();
    const entry: ChapterRecord = { state: chapterState.state, updatedAt: timestamp };
    if (chapterState.state === 'Failed') {
      entry.stage = chapterState.stage;
      entry.reason = chapterState.reason;
      entry.error = chapterState.error;
    }
    state.chapters[String(chapter)] = entry;
    state.updatedAt = timestamp;
  }

  save(state: RunState, outputDir: string): Promise<void> {
    const statePath = this.getStatePath(outputDir);
    const snapshot = JSON.stringify(state, null, 2);
    const write = this.writes.then(async () => {
      await saveArtifact(Buffer.from(snapshot, 'utf8'), statePath);
    });
    // Keep the chain alive after a failed write; the caller still sees the failure
    this.writes = write.catch((error: unknown) => {
      log.warn('Failed to save run state', { path: statePath, error: errorMessage(error) });
    });
    return write;
  }

  async load(outputDir: string): Promise<RunState | null> {
    const statePath = this.getStatePath(outputDir);

    let raw: string;
    try {
      raw = await readFile(statePath, 'utf8');
    } catch {
      return null;
    }

    try {
      const state: unknown = JSON.parse(raw);

      if (!this.isValidState(state)) {
        log.warn('Invalid state file found, ignoring', { path: statePath });
        return null;
      }

      return state;
    } catch {
      log.warn('Failed to parse state file, ignoring', { path: statePath });
      return null;
    }
  }

  async clear(outputDir: string): Promise<void> {
    await this.writes;
    try {
      await unlink(this.getStatePath(outputDir));
    } catch (error) {
      if (errorCode(error) !== 'ENOENT') throw error;
    }
  }

  private isValidState(state: unknown): state is RunState {
    if (typeof state !== 'object' || state === null) return false;

    const s = state as Record<string, unknown>;
    if (
      typeof s.startedAt !== 'string' ||
      typeof s.updatedAt !== 'string' ||
      typeof s.chapters !== 'object' ||
      s.chapters === null ||
      Array.isArray(s.chapters)
    ) {
      return false;
    }

    return Object.entries(s.chapters).every(([key, value]) => {
      if (!/^[1-9]\d*$/.test(key) || typeof value !== 'object' || value === null) return false;
      const item = value as Record<string, unknown>;

      return (
        typeof item.state === 'string' &&
        STATES.has(item.state) &&
        typeof item.updatedAt === 'string' &&
        (item.reason === undefined || typeof item.reason === 'string')
      );
    });
  }
}
