/**
 * Tree-sitter runtime adapter
 *
 * Wraps web-tree-sitter: one WASM runtime per process, one compiled grammar
 * per language, loaded lazily and reused across files.
 */

import path from 'node:path';
import { createRequire } from 'node:module';
import Parser from 'web-tree-sitter';

const require = createRequire(import.meta.url);

export interface Point {
  row: number;
  column: number;
}

/**
 * The subset of the tree-sitter node API the extractor relies on.
 * Indices are UTF-16 code unit offsets into the parsed string.
 */
export interface SyntaxNodeLike {
  type: string;
  text: string;
  startIndex: number;
  endIndex: number;
  startPosition: Point;
  endPosition: Point;
  children: SyntaxNodeLike[];
  namedChildren: SyntaxNodeLike[];
  parent: SyntaxNodeLike | null;
  previousNamedSibling: SyntaxNodeLike | null;
  hasError?: boolean | (() => boolean);
  isMissing?: boolean | (() => boolean);
  childForFieldName(fieldName: string): SyntaxNodeLike | null;
}

/**
 * Read a node flag that is a method in some binding releases and a
 * property in others
 */
export function nodeFlag(node: SyntaxNodeLike, flag: 'hasError' | 'isMissing'): boolean {
  const value = node[flag];
  return typeof value === 'function' ? value.call(node) : value === true;
}

export class TreeSitterRuntime {
  private initPromise: Promise<void> | null = null;
  private languages = new Map<string, Promise<Parser.Language>>();
  private loadQueue: Promise<unknown> = Promise.resolve();
  private wasmDirectory: string | null = null;

  async initialize(): Promise<void> {
    this.initPromise ??= Parser.init();
    await this.initPromise;
  }

  /**
   * Bare file names resolve inside tree-sitter-wasms; anything with a
   * directory part resolves against the working directory
   */
  resolveWasmPath(wasm: string): string {
    if (path.isAbsolute(wasm) || wasm.includes('/') || wasm.includes('\\')) {
      return path.resolve(wasm);
    }
    if (!this.wasmDirectory) {
      const manifest = require.resolve('tree-sitter-wasms/package.json');
      this.wasmDirectory = path.join(path.dirname(manifest), 'out');
    }
    return path.join(this.wasmDirectory, wasm);
  }

  loadLanguage(wasm: string): Promise<Parser.Language> {
    const wasmPath = this.resolveWasmPath(wasm);
    let pending = this.languages.get(wasmPath);

    if (!pending) {
      // Grammar modules are instantiated one at a time
      pending = this.loadQueue.then(async () => {
        await this.initialize();
        try {
          return await Parser.Language.load(wasmPath);
        } catch (error) {
          const message = error instanceof Error ? error.message : String(error);
          throw new Error(`Failed to load grammar ${wasmPath}: ${message}`);
        }
      });
      // A failed load rejects its own callers; later loads still run
      this.loadQueue = pending.then(
        () => undefined,
        () => undefined
      );
      this.languages.set(wasmPath, pending);
    }

    return pending;
  }

  async createParser(wasm: string): Promise<Parser> {
    const language = await this.loadLanguage(wasm);
    const parser = new Parser();
    parser.setLanguage(language);
    return parser;
  }
}

export const defaultRuntime = new TreeSitterRuntime();
