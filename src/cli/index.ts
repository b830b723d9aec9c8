#!/usr/bin/env node

/**
 * markov-chain CLI
 */

import { Command } from 'commander';
import { initCommand } from './commands/init.js';
import { generateCommand } from './commands/generate.js';
import { predictCommand } from './commands/predict.js';
import { statsCommand } from './commands/stats.js';

const program = new Command();

program
  .name('markov-chain')
  .description('Train variable-order Markov chains on text and generate or predict sequences')
  .version('1.0.0');

program.addCommand(initCommand);
program.addCommand(generateCommand);
program.addCommand(predictCommand);
program.addCommand(statsCommand);

program.parse(process.argv);
