/**
 * Test fixture utilities
 */

import path from 'node:path';
import fs from 'node:fs';
import os from 'node:os';
import { fileURLToPath } from 'node:url';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

/**
 * Get the absolute path to a fixture file
 */
export function getFixturePath(...parts: string[]): string {
  return path.join(__dirname, '../fixtures', ...parts);
}

/**
 * Read a fixture file's contents
 */
export async function readFixture(...parts: string[]): Promise<string> {
  const fixturePath = getFixturePath(...parts);
  return fs.promises.readFile(fixturePath, 'utf-8');
}

export interface TempProjectResult {
  rootDir: string;
  cleanup: () => void;
  addFile: (relativePath: string, content: string) => string;
  getFilePath: (relativePath: string) => string;
}

/**
 * Create a temporary directory populated with files
 */
export function createTempProject(files: Record<string, string> = {}): TempProjectResult {
  const rootDir = path.join(os.tmpdir(), `markov-project-${Date.now()}-${Math.random().toString(36).slice(2)}`);
  fs.mkdirSync(rootDir, { recursive: true });

  const addFile = (relativePath: string, content: string): string => {
    const filePath = path.join(rootDir, relativePath);
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, content);
    return filePath;
  };

  for (const [relativePath, content] of Object.entries(files)) {
    addFile(relativePath, content);
  }

  const cleanup = () => {
    fs.rmSync(rootDir, { recursive: true, force: true });
  };

  const getFilePath = (relativePath: string): string => {
    return path.join(rootDir, relativePath);
  };

  return { rootDir, cleanup, addFile, getFilePath };
}

/**
 * Directory holding the sample text corpus
 */
export const CORPUS_DIR = getFixturePath('corpus');

/**
 * Config with every value left at its default
 */
export const MINIMAL_CONFIG_PATH = getFixturePath('configs', 'minimal-config.json');
