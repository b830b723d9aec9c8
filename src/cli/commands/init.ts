/**
 * init command - Write a default config file
 */

import { Command } from 'commander';
import fs from 'node:fs';
import path from 'node:path';
import { CONFIG_FILE_NAMES, getDefaultConfig } from '../../config/loader.js';
import { parseNonNegativeInt } from '../shared.js';

interface InitFlags {
  force?: boolean;
  order?: number;
}

export const initCommand = new Command('init')
  .description('Create a markov.config.json with default settings')
  .argument('[directory]', 'Directory to write the config to', '.')
  .option('-o, --order <n>', 'Markov order to write', parseNonNegativeInt)
  .option('-f, --force', 'Overwrite an existing config file', false)
  .action(async (directory: string, options: InitFlags) => {
    try {
      const configPath = path.resolve(directory, CONFIG_FILE_NAMES[0]);

      if (fs.existsSync(configPath) && !options.force) {
        console.error(`Config already exists: ${configPath}`);
        console.error('Use --force to overwrite it.');
        process.exit(1);
      }

      const config = getDefaultConfig();
      if (options.order !== undefined) {
        config.order = options.order;
      }

      await fs.promises.mkdir(path.dirname(configPath), { recursive: true });
      await fs.promises.writeFile(configPath, JSON.stringify(config, null, 2) + '\n');

      console.log(`Created ${configPath}`);

    } catch (error) {
      console.error('Error:', error instanceof Error ? error.message : error);
      process.exit(1);
    }
  });
