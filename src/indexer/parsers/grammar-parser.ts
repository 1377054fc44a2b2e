/**
 * Language parser driven by a declarative grammar definition
 */

import { createHash } from 'node:crypto';
import type Parser from 'web-tree-sitter';
import type { Language } from '../../types/index.js';
import { TOOL_VERSION } from '../../version.js';
import { LanguageParser, type ParseResult, type ParserOptions } from './base.js';
import { SignatureExtractor } from './extractor.js';
import type { GrammarDefinition } from './grammar.js';
import { defaultRuntime, type SyntaxNodeLike, type TreeSitterRuntime } from './tree-sitter.js';

export class GrammarParser extends LanguageParser {
  private parser: Promise<Parser> | null = null;
  private readonly extractor: SignatureExtractor;
  private readonly fingerprintValue: string;

  constructor(
    private readonly grammar: GrammarDefinition,
    options: ParserOptions = {},
    private readonly runtime: TreeSitterRuntime = defaultRuntime
  ) {
    super(options);
    this.extractor = new SignatureExtractor(grammar, {
      includePrivate: this.options.includePrivate,
      includeNested: this.options.includeNested,
      maxSignatureLength: this.options.maxSignatureLength,
    });
    this.fingerprintValue = createHash('sha256')
      .update(JSON.stringify({ version: TOOL_VERSION, grammar, options: this.options }))
      .digest('hex')
      .slice(0, 16);
  }

  get language(): Language {
    return this.grammar.language;
  }

  get fingerprint(): string {
    return this.fingerprintValue;
  }

  async parseFile(_filePath: string, content: string): Promise<ParseResult> {
    const parser = await this.getParser();
    const tree = parser.parse(content);

    try {
      const root = tree.rootNode as unknown as SyntaxNodeLike;
      const signatures = this.extractor.extract(root);
      const warnings = this.extractor.collectSyntaxErrors(root);
      return {
        signatures,
        warnings,
        status: warnings.length > 0 ? 'partial' : 'complete',
      };
    } finally {
      tree.delete();
    }
  }

  private getParser(): Promise<Parser> {
    if (!this.parser) {
      this.parser = this.runtime.createParser(this.grammar.wasm);
    }
    return this.parser;
  }
}
