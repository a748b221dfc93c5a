#!/usr/bin/env node
import { Command, Option } from 'commander';
import { config } from 'dotenv';
import { combineCommand, type CombineOptions } from './commands/combine';
import { generateCommand, type GenerateOptions } from './commands/generate';
import { statusCommand } from './commands/status';
import { errorMessage } from './errors';
import { parseChapterList, parsePositiveInt, parseSceneList, parseStageList } from './utils/chapter-range';

config();

const program = new Command();

const formatOption = () => new Option('--format <format>', 'Output format').choices(['text', 'json']).default('text');

program
  .name('chapter-reel')
  .description('Turn novel chapters into narrated videos')
  .version('1.0.0');

program
  .command('generate')
  .description('Narrate, illustrate and assemble chapters')
  .argument('<chapters>', 'Chapter number, range or list (e.g. 3, 1-5, 1,3,7-9)', parseChapterList)
  .option('-c, --config <file>', 'Configuration file', 'config/default.yml')
  .option('-r, --root <dir>', 'Directory the configured paths are relative to')
  .option('-v, --voice <id>', 'ElevenLabs voice ID (overrides the configured default)')
  .option('-s, --scenes <list>', 'Scene prompts to illustrate each chapter with, e.g. 1,2', parseSceneList)
  .option('-j, --concurrency <number>', 'Chapters processed at once', parsePositiveInt)
  .option('--force', 'Regenerate artifacts that already exist')
  .option('--force-stage <stages>', 'Regenerate only these stages: narration, illustration, assembly', parseStageList)
  .option('--force-scene <list>', 'Redraw only these scenes\' images, e.g. 2', parseSceneList)
  .option('--dry-run', 'Show resolved paths and cost without calling any provider')
  .addOption(formatOption())
  .action(async (chapters: number[], options: GenerateOptions) => {
    await generateCommand(chapters, options);
  });

program
  .command('combine')
  .description('Join existing audio/image pairs, matched by file name, into one video')
  .argument('[dir]', 'Directory holding both the audio and images (default: the configured directories)')
  .option('-c, --config <file>', 'Configuration file', 'config/default.yml')
  .option('-r, --root <dir>', 'Directory the configured paths are relative to')
  .option('-o, --output <file>', 'Output file name or path', 'combined_video.mp4')
  .addOption(formatOption())
  .action(async (dir: string | undefined, options: Omit<CombineOptions, 'dir'>) => {
    await combineCommand({ ...options, dir });
  });

program
  .command('status')
  .description('Show chapter states from the last unfinished run')
  .option('-c, --config <file>', 'Configuration file', 'config/default.yml')
  .option('-r, --root <dir>', 'Directory the configured paths are relative to')
  .addOption(formatOption())
  .action(statusCommand);

program.parseAsync().catch((error: unknown) => {
  console.error(errorMessage(error));
  process.exitCode = 1;
});
