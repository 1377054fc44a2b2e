/**
 * Parser exports
 */

export {
  LanguageParser,
  DEFAULT_PARSER_OPTIONS,
  countLines,
  formatBytes,
  type ParseResult,
  type ParserOptions,
} from './base.js';
export { ParserRegistry, createDefaultRegistry, type RegistryOptions } from './registry.js';
export { GrammarParser } from './grammar-parser.js';
export { SignatureExtractor, MAX_SYNTAX_WARNINGS, type ExtractorOptions } from './extractor.js';
export {
  loadGrammarDefinitions,
  resolveGrammarDefinitions,
  grammarDefinitionInputSchema,
  type GrammarDefinition,
  type GrammarDefinitionInput,
  type DeclarationRule,
  type Selector,
} from './grammar.js';
export { TreeSitterRuntime, defaultRuntime, type SyntaxNodeLike } from './tree-sitter.js';
