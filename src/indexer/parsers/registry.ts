/**
 * Parser registry for managing language parsers
 */

import type { Language } from '../../types/index.js';
import { LanguageDetector, type LanguageDetectorOptions } from '../language-detector.js';
import type { LanguageParser, ParserOptions } from './base.js';
import { GrammarParser } from './grammar-parser.js';
import { loadGrammarDefinitions, type GrammarDefinitionInput } from './grammar.js';
import type { TreeSitterRuntime } from './tree-sitter.js';

export class ParserRegistry {
  private parsers: Map<Language, LanguageParser> = new Map();

  constructor(private readonly detector: LanguageDetector) {}

  /**
   * Register a parser for a language
   */
  register(parser: LanguageParser): void {
    this.parsers.set(parser.language, parser);
  }

  /**
   * Get a parser by language
   */
  getByLanguage(language: Language): LanguageParser | undefined {
    return this.parsers.get(language);
  }

  /**
   * Get a parser for a file path through the language detector
   */
  getByFilePath(filePath: string): LanguageParser | undefined {
    return this.parsers.get(this.detector.detect(filePath));
  }

  /**
   * Check if a file can be parsed
   */
  canParse(filePath: string): boolean {
    return this.getByFilePath(filePath) !== undefined;
  }

  /**
   * Get all registered languages
   */
  getLanguages(): Language[] {
    return Array.from(this.parsers.keys()).sort();
  }

  getDetector(): LanguageDetector {
    return this.detector;
  }
}

export interface RegistryOptions {
  parser?: ParserOptions;
  languages?: LanguageDetectorOptions & { grammars?: GrammarDefinitionInput[] };
  runtime?: TreeSitterRuntime;
}

/**
 * Create a parser registry with one grammar parser per enabled language
 */
export async function createDefaultRegistry(options: RegistryOptions = {}): Promise<ParserRegistry> {
  const definitions = await loadGrammarDefinitions(options.languages?.grammars ?? []);
  const detector = new LanguageDetector(definitions, options.languages);
  const registry = new ParserRegistry(detector);
  const disabled = new Set(options.languages?.disabled ?? []);

  for (const definition of definitions) {
    if (disabled.has(definition.language)) continue;
    registry.register(new GrammarParser(definition, options.parser, options.runtime));
  }

  return registry;
}
