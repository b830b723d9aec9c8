/**
 * Options and training shared by the CLI commands
 */

import { Command, InvalidArgumentError, Option } from 'commander';
import path from 'node:path';
import { loadConfig, loadConfigOrDefault } from '../config/loader.js';
import { configSchema, type Config } from '../config/schema.js';
import { trainCorpus, type CorpusResult } from '../corpus/index.js';

export interface TrainingFlags {
  config?: string;
  order?: number;
  tokenizer?: Config['tokenizer']['mode'];
  boundary?: Config['tokenizer']['boundary'];
  lowercase?: boolean;
  include?: string[];
  exclude?: string[];
  verbose?: boolean;
  json?: boolean;
}

export function parseNonNegativeInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return parsed;
}

export function parsePositiveInt(value: string): number {
  const parsed = parseNonNegativeInt(value);
  if (parsed === 0) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

/**
 * Adds the options every training command accepts.
 */
export function withTrainingOptions(command: Command): Command {
  return command
    .option('-c, --config <path>', 'Path to config file')
    .option('-o, --order <n>', 'Markov order (number of prior symbols)', parseNonNegativeInt)
    .addOption(new Option('--tokenizer <mode>', 'How text is split into symbols').choices(['word', 'character', 'line']))
    .addOption(new Option('--boundary <mode>', 'What one training sequence is').choices(['line', 'paragraph', 'file']))
    .option('--lowercase', 'Lowercase text before tokenizing')
    .option('--include <patterns...>', 'Glob patterns to include')
    .option('--exclude <patterns...>', 'Glob patterns to exclude')
    .option('--verbose', 'Show training progress', false)
    .option('--json', 'Output as JSON', false);
}

/**
 * Loads the config file and applies command-line overrides on top of it.
 */
export async function resolveConfig(flags: TrainingFlags, directories: string[]): Promise<Config> {
  const base = flags.config
    ? await loadConfig(flags.config)
    : await loadConfigOrDefault(process.cwd());

  const merged = {
    ...base,
    order: flags.order ?? base.order,
    corpus: {
      directories: directories.length > 0 ? directories : base.corpus.directories,
      include: flags.include ?? base.corpus.include,
      exclude: flags.exclude ?? base.corpus.exclude,
    },
    tokenizer: {
      mode: flags.tokenizer ?? base.tokenizer.mode,
      boundary: flags.boundary ?? base.tokenizer.boundary,
      lowercase: flags.lowercase ?? base.tokenizer.lowercase,
    },
  };

  const result = configSchema.safeParse(merged);
  if (!result.success) {
    const errors = result.error.errors.map(e => `  - ${e.path.join('.')}: ${e.message}`).join('\n');
    throw new Error(`Invalid options:\n${errors}`);
  }
  return result.data;
}

export async function trainFromConfig(config: Config, verbose = false): Promise<CorpusResult> {
  const directories = config.corpus.directories.map(dir => path.resolve(dir));

  if (verbose) {
    console.error(`Training order-${config.order} model from ${directories.join(', ')}...`);
  }

  const result = await trainCorpus({
    order: config.order,
    directories,
    include: config.corpus.include,
    exclude: config.corpus.exclude,
    mode: config.tokenizer.mode,
    boundary: config.tokenizer.boundary,
    lowercase: config.tokenizer.lowercase,
    onFile: verbose
      ? (filePath, counts) => {
          const relativePath = path.relative(process.cwd(), filePath);
          console.error(`  ${relativePath}: ${counts.sequences} sequences, ${counts.symbols} symbols`);
        }
      : undefined,
  });

  for (const { file, error } of result.errors) {
    console.error(`Error reading ${file}: ${error}`);
  }

  return result;
}
