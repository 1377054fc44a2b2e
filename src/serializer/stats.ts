/**
 * Counts derived from a RepoSummary
 */

import type { LanguageStats, RepoSummary, SummaryStats } from '../types/index.js';

export function computeStats(summary: RepoSummary): SummaryStats {
  const stats: SummaryStats = {
    totalFiles: summary.files.length,
    skippedFiles: summary.skipped.length,
    partialFiles: 0,
    totalSignatures: 0,
    functions: 0,
    methods: 0,
    constructors: 0,
    classes: 0,
    interfaces: 0,
    structs: 0,
    enums: 0,
    byLanguage: {},
  };

  for (const file of summary.files) {
    if (file.status === 'partial') stats.partialFiles++;

    const language: LanguageStats = stats.byLanguage[file.language] ?? {
      files: 0,
      functions: 0,
      methods: 0,
      classes: 0,
    };
    language.files++;

    for (const sig of file.signatures) {
      stats.totalSignatures++;
      switch (sig.kind) {
        case 'function':
          stats.functions++;
          language.functions++;
          break;
        case 'method':
          stats.methods++;
          language.methods++;
          break;
        case 'constructor':
          stats.constructors++;
          language.methods++;
          break;
        case 'class':
          stats.classes++;
          language.classes++;
          break;
        case 'interface':
          stats.interfaces++;
          break;
        case 'struct':
          stats.structs++;
          language.classes++;
          break;
        case 'enum':
          stats.enums++;
          break;
      }
    }

    stats.byLanguage[file.language] = language;
  }

  return stats;
}

/**
 * One-line count summary, e.g. "12 files, 1 skipped, 30 functions, 8 methods, 4 classes"
 */
export function formatStatsLine(stats: SummaryStats): string {
  return [
    `${stats.totalFiles} files`,
    `${stats.skippedFiles} skipped`,
    `${stats.functions} functions`,
    `${stats.methods + stats.constructors} methods`,
    `${stats.classes + stats.structs} classes`,
  ].join(', ');
}
