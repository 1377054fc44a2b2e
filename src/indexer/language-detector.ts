/**
 * Maps file paths to language tags
 */

import path from 'node:path';
import { UNSUPPORTED, type Language } from '../types/index.js';
import { normalizeExtension, type GrammarDefinition } from './parsers/grammar.js';

export interface LanguageDetectorOptions {
  /** Extension -> language, applied over the grammar extensions */
  extensions?: Record<string, string>;
  /** Exact file name -> language */
  filenames?: Record<string, string>;
  disabled?: string[];
}

export class LanguageDetector {
  private extensionMap = new Map<string, Language>();
  private filenameMap = new Map<string, Language>();
  private disabled: Set<Language>;

  constructor(
    grammars: readonly Pick<GrammarDefinition, 'language' | 'extensions' | 'filenames'>[],
    options: LanguageDetectorOptions = {}
  ) {
    this.disabled = new Set(options.disabled ?? []);

    for (const grammar of grammars) {
      for (const ext of grammar.extensions) {
        this.extensionMap.set(normalizeExtension(ext), grammar.language);
      }
      for (const filename of grammar.filenames) {
        this.filenameMap.set(filename, grammar.language);
      }
    }

    for (const [ext, language] of Object.entries(options.extensions ?? {})) {
      this.extensionMap.set(normalizeExtension(ext), language);
    }
    for (const [filename, language] of Object.entries(options.filenames ?? {})) {
      this.filenameMap.set(filename, language);
    }
  }

  /**
   * Language for a path, or "unsupported"
   */
  detect(filePath: string): Language {
    const language = this.lookup(filePath);
    if (language === null || this.disabled.has(language)) return UNSUPPORTED;
    return language;
  }

  isSupported(filePath: string): boolean {
    return this.detect(filePath) !== UNSUPPORTED;
  }

  /**
   * Extensions per enabled language, sorted
   */
  getExtensionsByLanguage(): Map<Language, string[]> {
    const result = new Map<Language, string[]>();
    for (const [ext, language] of this.extensionMap) {
      if (this.disabled.has(language)) continue;
      const list = result.get(language) ?? [];
      list.push(ext);
      result.set(language, list);
    }
    for (const list of result.values()) list.sort();
    return result;
  }

  private lookup(filePath: string): Language | null {
    const base = path.basename(filePath);
    const byName = this.filenameMap.get(base);
    if (byName) return byName;

    // "types.d.ts" tries "d.ts" before "ts"
    const parts = base.toLowerCase().split('.');
    for (let i = 1; i < parts.length; i++) {
      const language = this.extensionMap.get(parts.slice(i).join('.'));
      if (language) return language;
    }
    return null;
  }
}
