/**
 * predict command - Most probable continuation of a prompt
 */

import { Command } from 'commander';
import { Predictor } from '../../markov/predictor.js';
import { detokenize, tokenize } from '../../tokenizer/index.js';
import {
  parsePositiveInt,
  resolveConfig,
  trainFromConfig,
  withTrainingOptions,
  type TrainingFlags,
} from '../shared.js';

interface PredictFlags extends TrainingFlags {
  maxLength?: number;
  directory?: string[];
}

export const predictCommand = withTrainingOptions(
  new Command('predict')
    .description('Train on a corpus and predict how a prompt continues')
    .argument('<prompt...>', 'Prompt text')
    .option('-d, --directory <dirs...>', 'Corpus directories (defaults to the config)')
    .option('-m, --max-length <number>', 'Maximum symbols to complete', parsePositiveInt)
).action(async (prompt: string[], options: PredictFlags) => {
  try {
    const config = await resolveConfig(options, options.directory ?? []);
    const { model } = await trainFromConfig(config, options.verbose);

    const mode = config.tokenizer.mode;
    const tokens = tokenize(prompt.join(' '), mode, { lowercase: config.tokenizer.lowercase });
    const maxLength = options.maxLength ?? config.generation.maxLength;

    const predictor = new Predictor(model);
    for (const token of tokens) {
      predictor.given(token);
    }
    const next = predictor.predict();
    const completion = predictor.complete(maxLength);

    if (options.json) {
      console.log(JSON.stringify({
        prompt: tokens,
        next: next ?? null,
        completion,
      }, null, 2));
    } else {
      console.log(`Next: ${next ?? '(no prediction)'}`);
      console.log(`Completion: ${detokenize([...tokens, ...completion], mode)}`);
    }

  } catch (error) {
    console.error('Error:', error instanceof Error ? error.message : error);
    process.exit(1);
  }
});
