import { describe, it, expect } from 'vitest';
import { computeStats, formatStatsLine } from '../../../src/serializer/stats.js';
import { createTestFileSummary, createTestRepoSummary, createTestSignature } from '../../helpers/database.js';

describe('computeStats', () => {
  it('should count files, kinds and languages', () => {
    expect(computeStats(createTestRepoSummary())).toEqual({
      totalFiles: 2,
      skippedFiles: 1,
      partialFiles: 1,
      totalSignatures: 4,
      functions: 1,
      methods: 1,
      constructors: 1,
      classes: 1,
      interfaces: 0,
      structs: 0,
      enums: 0,
      byLanguage: {
        typescript: { files: 1, functions: 0, methods: 2, classes: 1 },
        python: { files: 1, functions: 1, methods: 0, classes: 0 },
      },
    });
  });

  it('should count structs as classes per language', () => {
    const summary = createTestRepoSummary({
      files: [
        createTestFileSummary({
          path: 'point.go',
          language: 'go',
          signatures: [
            createTestSignature({ name: 'Point', kind: 'struct' }),
            createTestSignature({ name: 'Shape', kind: 'interface' }),
            createTestSignature({ name: 'Color', kind: 'enum' }),
          ],
        }),
      ],
      skipped: [],
    });

    const stats = computeStats(summary);

    expect(stats.structs).toBe(1);
    expect(stats.interfaces).toBe(1);
    expect(stats.enums).toBe(1);
    expect(stats.byLanguage['go']).toEqual({ files: 1, functions: 0, methods: 0, classes: 1 });
  });

  it('should return zeros for an empty summary', () => {
    const stats = computeStats(createTestRepoSummary({ files: [], skipped: [] }));

    expect(stats.totalFiles).toBe(0);
    expect(stats.totalSignatures).toBe(0);
    expect(stats.byLanguage).toEqual({});
  });
});

describe('formatStatsLine', () => {
  it('should fold constructors into methods and structs into classes', () => {
    expect(formatStatsLine(computeStats(createTestRepoSummary()))).toBe(
      '2 files, 1 skipped, 1 functions, 2 methods, 1 classes'
    );
  });
});
