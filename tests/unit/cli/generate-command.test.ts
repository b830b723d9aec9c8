import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { createTempProject, MINIMAL_CONFIG_PATH, type TempProjectResult } from '../../helpers/fixtures.js';
import { spyOnCli } from '../../helpers/cli.js';

async function loadCommand() {
  const { generateCommand } = await import('../../../src/cli/commands/generate.js');
  return generateCommand;
}

describe('CLI generate command', () => {
  let project: TempProjectResult;
  let cli: ReturnType<typeof spyOnCli>;

  beforeEach(() => {
    vi.resetModules();
    cli = spyOnCli();
    project = createTempProject({ 'corpus.txt': 'the cat sat\n' });
  });

  afterEach(() => {
    project.cleanup();
  });

  it('prints one generated sequence per line', async () => {
    const command = await loadCommand();
    await command.parseAsync(
      [project.rootDir, '--config', MINIMAL_CONFIG_PATH, '--order', '1', '--count', '2', '--seed', '3'],
      { from: 'user' }
    );

    expect(cli.logged()).toEqual(['the cat sat', 'the cat sat']);
  });

  it('truncates sequences at the maximum length', async () => {
    const command = await loadCommand();
    await command.parseAsync(
      [project.rootDir, '--config', MINIMAL_CONFIG_PATH, '--max-length', '2'],
      { from: 'user' }
    );

    expect(cli.logged()).toEqual(['the cat']);
  });

  it('generates characters with the character tokenizer', async () => {
    project.addFile('corpus.txt', 'abc\n');

    const command = await loadCommand();
    await command.parseAsync(
      [project.rootDir, '--config', MINIMAL_CONFIG_PATH, '--tokenizer', 'character'],
      { from: 'user' }
    );

    expect(cli.logged()).toEqual(['abc']);
  });

  it('prints JSON output', async () => {
    const command = await loadCommand();
    await command.parseAsync(
      [project.rootDir, '--config', MINIMAL_CONFIG_PATH, '--order', '1', '--seed', '3', '--json'],
      { from: 'user' }
    );

    expect(JSON.parse(cli.logged().join('\n'))).toEqual({
      order: 1,
      seed: 3,
      sequences: ['the cat sat'],
    });
  });

  it('reports a missing corpus and exits', async () => {
    const empty = createTempProject({ 'readme.md': 'nothing to train on' });

    try {
      const command = await loadCommand();
      await expect(
        command.parseAsync([empty.rootDir, '--config', MINIMAL_CONFIG_PATH], { from: 'user' })
      ).rejects.toThrow('process.exit(1)');

      expect(cli.errorSpy).toHaveBeenCalledWith(
        'Error:',
        `No corpus files matching **/*.txt in ${empty.rootDir}`
      );
      expect(cli.exitSpy).toHaveBeenCalledWith(1);
    } finally {
      empty.cleanup();
    }
  });
});
