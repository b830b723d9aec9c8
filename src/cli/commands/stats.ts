/**
 * stats command - Show statistics for a trained corpus
 */

import { Command } from 'commander';
import {
  resolveConfig,
  trainFromConfig,
  withTrainingOptions,
  type TrainingFlags,
} from '../shared.js';

export const statsCommand = withTrainingOptions(
  new Command('stats')
    .description('Train on a corpus and show model statistics')
    .argument('[directories...]', 'Corpus directories (defaults to the config)')
).action(async (directories: string[], options: TrainingFlags) => {
  try {
    const config = await resolveConfig(options, directories);
    const result = await trainFromConfig(config, options.verbose);
    const stats = result.model.stats();

    if (options.json) {
      console.log(JSON.stringify({
        files: result.files.length,
        sequences: result.sequences,
        symbols: result.symbols,
        ...stats,
      }, null, 2));
    } else {
      console.log('Model Statistics\n');
      console.log(`Order:            ${stats.order}`);
      console.log(`Tokenizer:        ${config.tokenizer.mode} (per ${config.tokenizer.boundary})`);
      console.log(`Files:            ${result.files.length}`);
      console.log(`Sequences:        ${result.sequences}`);
      console.log(`Symbols:          ${result.symbols}`);
      console.log(`Contexts:         ${stats.totalContexts}`);
      console.log(`Observations:     ${stats.totalObservations}`);
      console.log(`Distinct symbols: ${stats.distinctSymbols}`);
      console.log(`Largest table:    ${stats.largestTable}`);
    }

  } catch (error) {
    console.error('Error:', error instanceof Error ? error.message : error);
    process.exit(1);
  }
});
