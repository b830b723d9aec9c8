/**
 * generate command - Sample new sequences from a corpus
 */

import { Command } from 'commander';
import { SequenceGenerator } from '../../markov/generator.js';
import { createRandomSource } from '../../markov/random.js';
import { detokenize } from '../../tokenizer/index.js';
import {
  parseNonNegativeInt,
  parsePositiveInt,
  resolveConfig,
  trainFromConfig,
  withTrainingOptions,
  type TrainingFlags,
} from '../shared.js';

interface GenerateFlags extends TrainingFlags {
  count?: number;
  maxLength?: number;
  seed?: number;
}

export const generateCommand = withTrainingOptions(
  new Command('generate')
    .description('Train on a corpus and generate random sequences')
    .argument('[directories...]', 'Corpus directories (defaults to the config)')
    .option('-n, --count <number>', 'Number of sequences to generate', parsePositiveInt)
    .option('-m, --max-length <number>', 'Maximum symbols per sequence', parsePositiveInt)
    .option('-s, --seed <number>', 'Seed for reproducible output', parseNonNegativeInt)
).action(async (directories: string[], options: GenerateFlags) => {
  try {
    const config = await resolveConfig(options, directories);
    const { model } = await trainFromConfig(config, options.verbose);

    const count = options.count ?? config.generation.count;
    const maxLength = options.maxLength ?? config.generation.maxLength;
    const seed = options.seed ?? config.generation.seed;

    const generator = new SequenceGenerator(model, createRandomSource(seed));
    const sequences: string[] = [];
    for (let i = 0; i < count; i++) {
      sequences.push(detokenize(generator.generate(maxLength), config.tokenizer.mode));
    }

    if (options.json) {
      console.log(JSON.stringify({ order: config.order, seed: seed ?? null, sequences }, null, 2));
    } else {
      for (const sequence of sequences) {
        console.log(sequence);
      }
    }

  } catch (error) {
    console.error('Error:', error instanceof Error ? error.message : error);
    process.exit(1);
  }
});
