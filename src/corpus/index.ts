/**
 * Corpus discovery and training
 */

import fs from 'node:fs';
import path from 'node:path';
import fg from 'fast-glob';
import { Accumulator } from '../markov/accumulator.js';
import { MarkovModel } from '../markov/model.js';
import {
  splitSequences,
  tokenize,
  type SequenceBoundary,
  type TokenizerMode,
} from '../tokenizer/index.js';

export class EmptyCorpusError extends Error {
  constructor(directories: string[], include: string[]) {
    super(`No corpus files matching ${include.join(', ')} in ${directories.join(', ')}`);
    this.name = 'EmptyCorpusError';
  }
}

export interface TextTrainingOptions {
  mode: TokenizerMode;
  boundary: SequenceBoundary;
  lowercase?: boolean;
}

export interface CorpusOptions extends TextTrainingOptions {
  order: number;
  directories: string[];
  include: string[];
  exclude: string[];
  /** Called after each file has been trained */
  onFile?: (filePath: string, counts: TrainingCounts) => void;
}

export interface TrainingCounts {
  sequences: number;
  symbols: number;
}

export interface CorpusResult extends TrainingCounts {
  model: MarkovModel<string>;
  files: string[];
  errors: Array<{ file: string; error: string }>;
}

export async function findCorpusFiles(
  rootDir: string,
  include: string[],
  exclude: string[]
): Promise<string[]> {
  const files = await fg(include, {
    cwd: path.resolve(rootDir),
    ignore: exclude,
    absolute: true,
    onlyFiles: true,
  });
  return files.sort();
}

/**
 * Trains `model` with every sequence found in `text`.
 */
export function trainFromText(
  model: MarkovModel<string>,
  text: string,
  options: TextTrainingOptions
): TrainingCounts {
  const accumulator = new Accumulator(model);
  let sequences = 0;
  let symbols = 0;

  for (const chunk of splitSequences(text, options.boundary)) {
    const tokens = tokenize(chunk, options.mode, { lowercase: options.lowercase });
    if (tokens.length === 0) continue;

    accumulator.addSequence(tokens);
    sequences++;
    symbols += tokens.length;
  }

  return { sequences, symbols };
}

/**
 * Builds a model from every file matched in the configured directories.
 * Files that cannot be read are reported in `errors` and skipped.
 */
export async function trainCorpus(options: CorpusOptions): Promise<CorpusResult> {
  const model = new MarkovModel<string>(options.order);

  const matched = new Set<string>();
  for (const directory of options.directories) {
    for (const file of await findCorpusFiles(directory, options.include, options.exclude)) {
      matched.add(file);
    }
  }

  if (matched.size === 0) {
    throw new EmptyCorpusError(options.directories, options.include);
  }

  const files: string[] = [];
  const errors: Array<{ file: string; error: string }> = [];
  let sequences = 0;
  let symbols = 0;

  for (const filePath of matched) {
    let text: string;
    try {
      text = await fs.promises.readFile(filePath, 'utf-8');
    } catch (error) {
      errors.push({
        file: filePath,
        error: error instanceof Error ? error.message : String(error),
      });
      continue;
    }

    const counts = trainFromText(model, text, options);
    files.push(filePath);
    sequences += counts.sequences;
    symbols += counts.symbols;
    options.onFile?.(filePath, counts);
  }

  return { model, files, errors, sequences, symbols };
}
