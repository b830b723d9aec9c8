/**
 * Configuration file loader
 */

import fs from 'node:fs';
import path from 'node:path';
import type { ZodError } from 'zod';
import { configSchema, type Config } from './schema.js';

export const CONFIG_FILE_NAMES = [
  'markov.config.json',
  '.markovrc.json',
  '.markovrc',
];

export async function loadConfig(configPath: string): Promise<Config> {
  const absolutePath = path.resolve(configPath);
  return parseConfig(await readConfigFile(absolutePath), absolutePath);
}

async function readConfigFile(absolutePath: string): Promise<string> {
  try {
    return await fs.promises.readFile(absolutePath, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new Error(`Config file not found: ${absolutePath}`);
    }
    throw error;
  }
}

function parseConfig(content: string, source: string): Config {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch {
    throw new Error(`Invalid JSON in config file: ${source}`);
  }

  const result = configSchema.safeParse(raw);
  if (!result.success) {
    throw new Error(`Invalid configuration:\n${formatIssues(result.error)}`);
  }
  return result.data;
}

// One "  - field.path: message" line per issue
function formatIssues(error: ZodError): string {
  return error.issues
    .map(issue => `  - ${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('\n');
}

export function getDefaultConfig(): Config {
  return configSchema.parse({});
}

export async function findConfig(startDir: string): Promise<Config | null> {
  let currentDir = path.resolve(startDir);
  const root = path.parse(currentDir).root;

  while (currentDir !== root) {
    for (const configName of CONFIG_FILE_NAMES) {
      const configPath = path.join(currentDir, configName);
      if (fs.existsSync(configPath)) {
        return loadConfig(configPath);
      }
    }

    // A "markov" key in package.json also counts
    const packagePath = path.join(currentDir, 'package.json');
    if (fs.existsSync(packagePath)) {
      const section = await readPackageSection(packagePath);
      if (section !== undefined) {
        const result = configSchema.safeParse(section);
        if (result.success) {
          return result.data;
        }
      }
    }

    currentDir = path.dirname(currentDir);
  }

  return null;
}

export async function loadConfigOrDefault(startDir: string): Promise<Config> {
  const config = await findConfig(startDir);
  return config ?? getDefaultConfig();
}

async function readPackageSection(packagePath: string): Promise<unknown> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(await fs.promises.readFile(packagePath, 'utf-8'));
  } catch {
    // An unreadable package.json is not a config source
    return undefined;
  }

  if (typeof parsed === 'object' && parsed !== null && 'markov' in parsed) {
    return parsed.markov;
  }
  return undefined;
}
