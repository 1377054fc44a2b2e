import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import os from 'node:os';
import path from 'node:path';
import {
  formatGenerateReport,
  generateTldrTool,
  readTldrTool,
} from '../../../src/server/tools/index.js';
import type { GenerateOptions, GenerateResult } from '../../../src/indexer/generate.js';
import { computeStats, serializeText, serializeJson } from '../../../src/serializer/index.js';
import { createTestRepoSummary } from '../../helpers/database.js';
import { createTempProject, type TempProjectResult } from '../../helpers/fixtures.js';

const COUNTS = 'Summary: 2 files, 1 skipped, 1 functions, 2 methods, 1 classes';

function fakeResult(overrides: Partial<GenerateResult> = {}): GenerateResult {
  const summary = createTestRepoSummary();
  return {
    directory: '/work/project',
    outputPath: '/work/project/project.tldr',
    format: 'text',
    summary,
    content: serializeText(summary),
    stats: computeStats(summary),
    summaryErrors: [],
    ...overrides,
  };
}

describe('formatGenerateReport', () => {
  it('should list the output path and counts', () => {
    expect(formatGenerateReport(fakeResult())).toBe(
      [
        'TLDR file written to: /work/project/project.tldr',
        'Files: 2',
        'Skipped files: 1',
        'Functions: 1',
        'Methods: 2',
        'Classes: 1',
      ].join('\n')
    );
  });

  it('should append files whose summary failed', () => {
    const report = formatGenerateReport(
      fakeResult({ summaryErrors: [{ path: 'src/app.ts', message: 'Summary request failed: 429 Too Many Requests' }] })
    );

    expect(report.split('\n').at(-1)).toBe('Summary failed for src/app.ts: Summary request failed: 429 Too Many Requests');
  });
});

describe('generateTldrTool', () => {
  it('should expand the path and write next to the directory', async () => {
    const generate = vi.fn(async (_options: GenerateOptions) => fakeResult());

    const result = await generateTldrTool({ path: '~/project', output_filename: 'out.tldr' }, undefined, generate);

    const directory = path.join(os.homedir(), 'project');
    expect(generate).toHaveBeenCalledWith({
      directory,
      output: 'out.tldr',
      outputBase: directory,
      signal: undefined,
    });
    expect(result.isError).toBeUndefined();
    expect(result.content).toEqual([
      { type: 'text', text: formatGenerateReport(fakeResult()) },
      { type: 'text', text: serializeText(createTestRepoSummary()) },
    ]);
  });

  it('should pass the cancellation signal through', async () => {
    const controller = new AbortController();
    const generate = vi.fn(async (_options: GenerateOptions) => fakeResult());

    await generateTldrTool({ path: '/work/project' }, controller.signal, generate);

    expect(generate.mock.calls[0]?.[0].signal).toBe(controller.signal);
  });

  it('should turn failures into error results', async () => {
    const generate = vi.fn(async (_options: GenerateOptions): Promise<GenerateResult> => {
      throw new Error('Directory not found: /nope');
    });

    const result = await generateTldrTool({ path: '/nope' }, undefined, generate);

    expect(result).toEqual({
      content: [{ type: 'text', text: 'generate_tldr failed: Directory not found: /nope' }],
      isError: true,
    });
  });
});

describe('readTldrTool', () => {
  let project: TempProjectResult;

  beforeEach(() => {
    project = createTempProject();
  });

  afterEach(() => {
    project.cleanup();
  });

  it('should return text summaries unchanged with their counts', async () => {
    const content = serializeText(createTestRepoSummary());
    const filePath = project.addFile('project.tldr', content);

    const result = await readTldrTool({ file_path: filePath });

    expect(result.content).toEqual([
      { type: 'text', text: content },
      { type: 'text', text: COUNTS },
    ]);
  });

  it('should read JSON summaries', async () => {
    const filePath = project.addFile('project.tldr.json', serializeJson(createTestRepoSummary()));

    const result = await readTldrTool({ file_path: filePath });

    expect(result.content[1]?.text).toBe(COUNTS);
  });

  it('should sniff files without a known extension', async () => {
    const filePath = project.addFile('summary.out', serializeJson(createTestRepoSummary()));

    const result = await readTldrTool({ file_path: filePath });

    expect(result.content[1]?.text).toBe(COUNTS);
  });

  it('should return markdown without counts', async () => {
    const filePath = project.addFile('project.tldr.md', '# TLDR Summary\n');

    const result = await readTldrTool({ file_path: filePath });

    expect(result.content).toEqual([{ type: 'text', text: '# TLDR Summary\n' }]);
  });

  it('should still return content that does not parse', async () => {
    const filePath = project.addFile('broken.tldr', 'hello\n');

    const result = await readTldrTool({ file_path: filePath });

    expect(result.isError).toBeUndefined();
    expect(result.content).toEqual([
      { type: 'text', text: 'hello\n' },
      { type: 'text', text: 'Summary unavailable: Invalid .tldr content at line 1: missing #tldr header' },
    ]);
  });

  it('should report missing files as errors', async () => {
    const result = await readTldrTool({ file_path: project.getFilePath('missing.tldr') });

    expect(result.isError).toBe(true);
    expect(result.content[0]?.text).toMatch(/^read_tldr failed: ENOENT/);
  });
});
