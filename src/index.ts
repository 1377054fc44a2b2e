/**
 * tldr-code - signature summaries of source trees
 *
 * Walks a directory, extracts function and class signatures with
 * tree-sitter grammars and writes them as JSON, `.tldr` text or markdown.
 * The same workflow is exposed through the Model Context Protocol (MCP).
 */

// Types
export * from './types/index.js';
export { TOOL_NAME, TOOL_VERSION } from './version.js';

// Indexer
export {
  Indexer,
  Watcher,
  LanguageDetector,
  createClock,
  resolveGeneratedAt,
  createSummaryProvider,
  OpenAIProvider,
  type SummaryProvider,
  type SummaryRequest,
  type IndexerConfig,
  type IndexOptions,
  type FileResult,
  type Clock,
} from './indexer/index.js';
export {
  generateTldr,
  defaultOutputPath,
  type GenerateOptions,
  type GenerateResult,
} from './indexer/generate.js';

// Parsers
export {
  LanguageParser,
  GrammarParser,
  ParserRegistry,
  SignatureExtractor,
  TreeSitterRuntime,
  createDefaultRegistry,
  loadGrammarDefinitions,
  resolveGrammarDefinitions,
  type ParseResult,
  type ParserOptions,
  type GrammarDefinition,
  type GrammarDefinitionInput,
} from './indexer/parsers/index.js';

// Storage
export { SqliteCache, type CacheStorage, type CacheStats } from './indexer/storage/index.js';

// Serialization
export {
  serializeSummary,
  parseSummary,
  parseAnySummary,
  serializeJson,
  parseJson,
  serializeText,
  parseText,
  renderMarkdown,
  computeStats,
  formatStatsLine,
  detectFormat,
  readSummary,
  writeSummary,
} from './serializer/index.js';

// Server
export { createServer, startStdioServer, registerTools, type ServerOptions } from './server/index.js';

// Config
export {
  configSchema,
  loadConfig,
  getDefaultConfig,
  findConfig,
  loadConfigOrDefault,
  type Config,
} from './config/index.js';
