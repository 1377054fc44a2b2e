import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import path from 'node:path';
import {
  detectFormat,
  isOutputFormat,
  parseAnySummary,
  parseSummary,
  readSummary,
  serializeJson,
  serializeSummary,
  serializeText,
  writeSummary,
} from '../../../src/serializer/index.js';
import { createTestRepoSummary } from '../../helpers/database.js';
import { createTempProject, type TempProjectResult } from '../../helpers/fixtures.js';

describe('serializer', () => {
  describe('detectFormat', () => {
    it('should map extensions to formats', () => {
      expect(detectFormat('out/summary.tldr.json')).toBe('json');
      expect(detectFormat('summary.tldr')).toBe('text');
      expect(detectFormat('README.MD')).toBe('markdown');
      expect(detectFormat('notes.markdown')).toBe('markdown');
      expect(detectFormat('summary.txt')).toBeNull();
    });
  });

  it('should recognise output format names', () => {
    expect(isOutputFormat('text')).toBe(true);
    expect(isOutputFormat('yaml')).toBe(false);
  });

  it('should dispatch serialization by format', () => {
    const summary = createTestRepoSummary();

    expect(serializeSummary(summary, 'json')).toBe(serializeJson(summary));
    expect(serializeSummary(summary, 'text')).toBe(serializeText(summary));
    expect(serializeSummary(summary, 'markdown').startsWith('# TLDR Summary\n')).toBe(true);
  });

  it('should refuse to parse markdown', () => {
    expect(() => parseSummary('# TLDR Summary', 'markdown')).toThrow(
      'Markdown summaries cannot be read back; use the json or text format'
    );
  });

  it('should sniff the format of unlabelled content', () => {
    const summary = createTestRepoSummary();

    expect(parseAnySummary(`  ${serializeJson(summary)}`)).toEqual(summary);
    expect(parseAnySummary(serializeText(summary))).toEqual(summary);
  });

  describe('files', () => {
    let project: TempProjectResult;

    beforeEach(() => {
      project = createTempProject();
    });

    afterEach(() => {
      project.cleanup();
    });

    it('should write into missing directories and return the content', async () => {
      const target = path.join(project.rootDir, 'out', 'deep', 'summary.tldr');
      const summary = createTestRepoSummary();

      const content = await writeSummary(target, summary);

      expect(content).toBe(serializeText(summary));
      expect(fs.readFileSync(target, 'utf-8')).toBe(content);
      expect(await readSummary(target)).toEqual(summary);
    });

    it('should default to JSON for unknown extensions and read it back', async () => {
      const target = path.join(project.rootDir, 'summary.out');
      const summary = createTestRepoSummary();

      const content = await writeSummary(target, summary);

      expect(content).toBe(serializeJson(summary));
      expect(await readSummary(target)).toEqual(summary);
    });

    it('should honour an explicit format over the extension', async () => {
      const target = path.join(project.rootDir, 'summary.json');
      const summary = createTestRepoSummary();

      const content = await writeSummary(target, summary, 'text');

      expect(content).toBe(serializeText(summary));
    });
  });
});
