/**
 * Unit tests for the generate CLI command
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import type { Command } from 'commander';
import { createTempProject, SAMPLE_PYTHON, type TempProjectResult } from '../../helpers/fixtures.js';
import { captureConsole, ExitCalled, mockProcessExit } from '../../helpers/cli.js';

describe('CLI generate command', () => {
  let project: TempProjectResult;
  let output: ReturnType<typeof captureConsole>;
  let generateCommand: Command;

  beforeEach(async () => {
    vi.resetModules();
    ({ generateCommand } = await import('../../../src/cli/commands/generate.js'));
    project = createTempProject({ 'src/app.py': SAMPLE_PYTHON });
    output = captureConsole();
    mockProcessExit();
  });

  afterEach(() => {
    vi.restoreAllMocks();
    delete process.env.SOURCE_DATE_EPOCH;
    project.cleanup();
  });

  const run = (args: string[]): Promise<Command> => generateCommand.parseAsync(args, { from: 'user' });

  it('should write the summary and print counts', async () => {
    const target = project.getFilePath('out/app.tldr');

    await run([project.rootDir, '-o', target, '--no-timestamp']);

    const content = fs.readFileSync(target, 'utf-8');
    expect(content.split('\n').slice(0, 5)).toEqual([
      '#tldr\t1',
      '#tool\ttldr-code\t0.1.0',
      `#root\t${project.rootDir}`,
      '#generated\t\\-',
      '',
    ]);
    expect(content).toContain('F\tsrc/app.py\tpython\tcomplete\t10\t');

    const lines = output.lines();
    expect(lines[0]).toBe(`Generating TLDR for ${project.rootDir}...\n`);
    expect(lines.slice(1, 6)).toEqual([
      'TLDR generated!\n',
      '  Files:      1',
      '  Skipped:    0',
      '  Functions:  1',
      '  Methods:    2',
    ]);
    expect(lines).toContain('  Classes:    1');
    expect(lines).toContain(`  Output:     ${target}\n`);
  });

  it('should write JSON to <dirname>.tldr.json by default', async () => {
    await run([project.rootDir]);

    const name = project.rootDir.split('/').pop() ?? '';
    const parsed: unknown = JSON.parse(fs.readFileSync(project.getFilePath(`${name}.tldr.json`), 'utf-8'));
    expect(parsed).toMatchObject({ format: 'tldr', rootPath: project.rootDir });
  });

  it('should take the timestamp from SOURCE_DATE_EPOCH', async () => {
    process.env.SOURCE_DATE_EPOCH = '1700000000';
    const target = project.getFilePath('app.tldr');

    await run([project.rootDir, '-o', target]);

    expect(fs.readFileSync(target, 'utf-8').split('\n')[3]).toBe('#generated\t2023-11-14T22:13:20.000Z');
  });

  it('should follow the configuration unless --no-timestamp is given', async () => {
    project.addFile('tldr.config.json', JSON.stringify({ output: { timestamp: false } }));
    const target = project.getFilePath('app.tldr');

    await run([project.rootDir, '-o', target]);

    expect(fs.readFileSync(target, 'utf-8').split('\n')[3]).toBe('#generated\t\\-');
  });

  it('should list skipped files with --verbose', async () => {
    project.addFile('logo.png', 'png');

    await run([project.rootDir, '-o', project.getFilePath('app.tldr'), '--verbose']);

    const lines = output.lines();
    expect(lines).toContain('  python: 1 files, 1 functions, 2 methods, 1 classes');
    expect(lines).toContain('\nSkipped:');
    expect(lines).toContain('  logo.png: UNSUPPORTED_LANGUAGE (No grammar for ".png" files)');
  });

  it('should reject unknown formats', async () => {
    await expect(run([project.rootDir, '-f', 'yaml'])).rejects.toThrow(ExitCalled);

    expect(output.errors()).toEqual(['Error: Unknown format "yaml" (expected json, text, markdown)']);
  });

  it('should fail when --summaries is given without an API key', async () => {
    project.addFile('tldr.config.json', JSON.stringify({ summaries: { apiKeyEnv: 'TLDR_TEST_UNSET_KEY' } }));

    await expect(run([project.rootDir, '--summaries'])).rejects.toThrow(ExitCalled);

    expect(output.errors()).toEqual(['Error: Summaries are enabled but TLDR_TEST_UNSET_KEY is not set']);
  });

  it('should reject a concurrency below one', async () => {
    await expect(run([project.rootDir, '--concurrency', '0'])).rejects.toThrow(ExitCalled);

    expect(output.errors()).toEqual(['Error: --concurrency must be an integer of at least 1, got "0"']);
  });

  it('should exit with status 1 for a missing directory', async () => {
    const missing = project.getFilePath('nope');

    const error = await run([missing]).catch((e: unknown) => e);

    expect(error instanceof ExitCalled ? error.code : null).toBe(1);
    expect(output.errors()).toEqual([`Error: Directory not found: ${missing}`]);
  });
});
