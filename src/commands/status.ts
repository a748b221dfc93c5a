import { loadSettingsFile } from '../config/loader';
import { errorMessage } from '../errors';
import { StateManager, type RunState } from '../services/state-manager';

export interface StatusOptions {
  config: string;
  root?: string;
  format?: 'text' | 'json';
}

export function formatRunState(state: RunState): string[] {
  const lines = [`Last run started ${state.startedAt}, updated ${state.updatedAt}`];
  const chapters = Object.keys(state.chapters)
    .map(Number)
    .sort((a, b) => a - b);

  for (const chapter of chapters) {
    const record = state.chapters[String(chapter)];
    if (!record) continue;
    const detail = record.state === 'Failed' ? ` at ${record.stage ?? 'unknown stage'} (${record.reason ?? 'unknown'}): ${record.error ?? ''}` : '';
    lines.push(`  Chapter ${chapter}: ${record.state}${detail}`.trimEnd());
  }
  return lines;
}

export async function statusCommand(options: StatusOptions): Promise<void> {
  try {
    const settings = await loadSettingsFile(options.config, { root: options.root });
    const state = await new StateManager().load(settings.directories.output);

    if (options.format === 'json') {
      console.log(JSON.stringify(state, null, 2));
      return;
    }

    if (!state) {
      console.log('No unfinished run recorded.');
      return;
    }

    formatRunState(state).forEach((line) => console.log(line));
  } catch (error) {
    console.error(`\nError: ${errorMessage(error)}`);
    process.exitCode = 1;
  }
}
