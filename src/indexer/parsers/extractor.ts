/**
 * Generic signature extractor
 *
 * Walks a syntax tree once, in document order, and turns every node that a
 * grammar definition's declaration rules match into a Signature.
 */

import type {
  ParameterInfo,
  ParseWarning,
  Signature,
  SignatureKind,
} from '../../types/index.js';
import { CLASS_LIKE_KINDS, FUNCTION_LIKE_KINDS } from '../../types/index.js';
import type { DeclarationRule, GrammarDefinition, Selector } from './grammar.js';
import { nodeFlag, type SyntaxNodeLike } from './tree-sitter.js';

export interface ExtractorOptions {
  includePrivate: boolean;
  includeNested: boolean;
  maxSignatureLength: number;
}

export const MAX_SYNTAX_WARNINGS = 10;

interface WalkContext {
  scope: string[];
  /** Nearest enclosing declaration is class-like */
  inClass: boolean;
  inFunction: boolean;
}

interface PendingNode {
  node: SyntaxNodeLike;
  context: WalkContext;
}

const ROOT_CONTEXT: WalkContext = { scope: [], inClass: false, inFunction: false };

/**
 * Follow a selector from `node`. Returns null when any step fails.
 */
export function resolveSelector(node: SyntaxNodeLike, selector: Selector): SyntaxNodeLike | null {
  let current: SyntaxNodeLike | null = node;

  for (const step of selector) {
    if (!current) return null;

    if ('field' in step) {
      let next: SyntaxNodeLike | null = current.childForFieldName(step.field);
      if (step.until) {
        const targets = step.until;
        while (next && !targets.includes(next.type)) {
          next = next.childForFieldName(step.field);
        }
      }
      current = next;
    } else if ('child' in step) {
      const types = step.child;
      current = current.namedChildren.find(child => types.includes(child.type)) ?? null;
    } else {
      const parent: SyntaxNodeLike | null = current.parent;
      current = parent && step.parent.includes(parent.type) ? parent : null;
    }
  }

  return current;
}

/**
 * Try each selector in turn, returning the first node found
 */
export function resolveFirst(node: SyntaxNodeLike, selectors: readonly Selector[]): SyntaxNodeLike | null {
  for (const selector of selectors) {
    const found = resolveSelector(node, selector);
    if (found) return found;
  }
  return null;
}

export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/** Drop the `:` / `->` that introduces a type annotation */
export function cleanTypeText(text: string): string {
  return collapseWhitespace(text).replace(/^(?::|->)\s*/, '');
}

/** `*Server`, `&List<T>` and `Map[K, V]` all reduce to the bare type name */
export function cleanScopeName(text: string): string {
  return collapseWhitespace(text)
    .replace(/^[*&\s]+/, '')
    .replace(/\s*[<[].*$/, '');
}

/**
 * Text up to where a body would begin: `{`, `;` or a line break outside
 * any brackets
 */
function cutAtBodyStart(text: string): string {
  let depth = 0;
  for (let i = 0; i < text.length; i++) {
    const ch = text.charAt(i);
    if (ch === '(' || ch === '[') depth++;
    else if ((ch === ')' || ch === ']') && depth > 0) depth--;
    else if (depth === 0 && (ch === '{' || ch === ';' || ch === '\n')) {
      return text.slice(0, i);
    }
  }
  return text;
}

function isCommentNode(node: SyntaxNodeLike): boolean {
  return node.type.includes('comment');
}

export class SignatureExtractor {
  private rulesByNode = new Map<string, DeclarationRule[]>();

  constructor(
    private readonly grammar: GrammarDefinition,
    private readonly options: ExtractorOptions
  ) {
    for (const rule of grammar.declarations) {
      const rules = this.rulesByNode.get(rule.node) ?? [];
      rules.push(rule);
      this.rulesByNode.set(rule.node, rules);
    }
  }

  /**
   * Extract signatures in source order
   */
  extract(root: SyntaxNodeLike): Signature[] {
    const signatures: Signature[] = [];
    const seen = new Set<string>();
    // Explicit stack: deeply nested sources must not overflow the call stack
    const stack: PendingNode[] = [{ node: root, context: ROOT_CONTEXT }];

    while (stack.length > 0) {
      const pending = stack.pop();
      if (!pending) break;
      const { node, context } = pending;

      let childContext = context;
      const rule = this.matchRule(node);

      if (rule) {
        const result = this.visitDeclaration(node, rule, context);
        if (result) {
          childContext = result.context;
          if (result.signature) {
            const sig = result.signature;
            const key = `${sig.kind}|${sig.scope.join('.')}|${sig.name}|${sig.line}`;
            if (!seen.has(key)) {
              seen.add(key);
              signatures.push(sig);
            }
          }
        }
      }

      const children = node.namedChildren;
      for (let i = children.length - 1; i >= 0; i--) {
        const child = children[i];
        if (child) stack.push({ node: child, context: childContext });
      }
    }

    return signatures.sort((a, b) => a.line - b.line);
  }

  /**
   * Syntax errors and missing tokens, capped at MAX_SYNTAX_WARNINGS
   */
  collectSyntaxErrors(root: SyntaxNodeLike): ParseWarning[] {
    if (!nodeFlag(root, 'hasError')) return [];

    const warnings: ParseWarning[] = [];
    const stack: SyntaxNodeLike[] = [root];

    while (stack.length > 0 && warnings.length < MAX_SYNTAX_WARNINGS) {
      const node = stack.pop();
      if (!node) break;
      const line = node.startPosition.row + 1;

      if (node.type === 'ERROR') {
        warnings.push({ code: 'SYNTAX_ERROR', message: `Unexpected syntax at line ${line}`, line });
        continue;
      }
      if (nodeFlag(node, 'isMissing')) {
        warnings.push({ code: 'SYNTAX_ERROR', message: `Missing "${node.type}" at line ${line}`, line });
        continue;
      }
      if (!nodeFlag(node, 'hasError')) continue;

      const children = node.children;
      for (let i = children.length - 1; i >= 0; i--) {
        const child = children[i];
        if (child) stack.push(child);
      }
    }

    return warnings;
  }

  private matchRule(node: SyntaxNodeLike): DeclarationRule | null {
    const candidates = this.rulesByNode.get(node.type);
    if (!candidates) return null;

    for (const rule of candidates) {
      if (!rule.requires) return rule;
      const target = resolveSelector(node, rule.requires.selector);
      if (target && (!rule.requires.types || rule.requires.types.includes(target.type))) {
        return rule;
      }
    }
    return null;
  }

  private visitDeclaration(
    node: SyntaxNodeLike,
    rule: DeclarationRule,
    context: WalkContext
  ): { signature: Signature | null; context: WalkContext } | null {
    const nameNode = resolveFirst(node, rule.name);
    let name = nameNode ? collapseWhitespace(nameNode.text) : (rule.defaultName ?? '');
    if (!name) return null;

    const scope = [...context.scope];
    let member = context.inClass;

    if (rule.scopeName) {
      const scopeNode = resolveFirst(node, rule.scopeName);
      if (scopeNode) {
        scope.push(cleanScopeName(scopeNode.text));
        member = true;
      }
    }

    const separator = this.grammar.qualifiedNameSeparator;
    if (separator && name.includes(separator)) {
      const parts = name.split(separator).map(part => part.trim()).filter(part => part.length > 0);
      const last = parts.pop();
      if (last) {
        name = last;
        if (parts.length > 0) {
          scope.push(...parts.map(cleanScopeName));
          member = true;
        }
      }
    }

    const kind = this.resolveKind(node, rule, name, scope, member);
    const functionLike = FUNCTION_LIKE_KINDS.has(kind);
    const classLike = rule.classLike ?? CLASS_LIKE_KINDS.has(kind);

    const nextContext: WalkContext = {
      scope: [...scope, rule.emit ? name : cleanScopeName(name)],
      inClass: classLike,
      inFunction: functionLike,
    };

    if (!rule.emit) {
      return { signature: null, context: nextContext };
    }

    const modifiers = this.collectModifiers(node, rule);
    const hidden =
      (!this.options.includeNested && functionLike && context.inFunction) ||
      (!this.options.includePrivate && this.isPrivate(name, modifiers));

    if (hidden) {
      return { signature: null, context: nextContext };
    }

    const decoratorNodes = this.collectDecoratorNodes(node);
    const returnTypeNode = resolveFirst(node, rule.returnType);
    const typeParametersNode = resolveFirst(node, rule.typeParameters);
    const parametersNode = resolveFirst(node, rule.parameters);

    const signature: Signature = {
      name,
      kind,
      parameters: parametersNode ? this.extractParameters(parametersNode) : [],
      returnType: returnTypeNode ? cleanTypeText(returnTypeNode.text) : null,
      typeParameters: typeParametersNode ? collapseWhitespace(typeParametersNode.text) : null,
      scope,
      line: this.headerLine(node, decoratorNodes),
      endLine: node.endPosition.row + 1,
      signature: this.buildHeader(node, rule, decoratorNodes),
      decorators: decoratorNodes.map(d => collapseWhitespace(d.text)),
      modifiers,
    };

    return { signature, context: nextContext };
  }

  private resolveKind(
    node: SyntaxNodeLike,
    rule: DeclarationRule,
    name: string,
    scope: readonly string[],
    member: boolean
  ): SignatureKind {
    let kind: SignatureKind = rule.kind;

    if (rule.kindFrom) {
      const kindNode = resolveSelector(node, rule.kindFrom.selector);
      const mapped = kindNode ? rule.kindFrom.map[kindNode.text] : undefined;
      if (mapped) kind = mapped;
    }

    if (rule.memberKind && member) {
      kind = rule.memberKind;
    }

    if (kind === 'method') {
      const owner = scope[scope.length - 1];
      if (
        rule.constructorNames.includes(name) ||
        (rule.constructorMatchesScope && owner !== undefined && cleanScopeName(owner) === name)
      ) {
        kind = 'constructor';
      }
    }

    return kind;
  }

  private isPrivate(name: string, modifiers: readonly string[]): boolean {
    if (modifiers.includes('private')) return true;
    const prefix = this.grammar.privatePrefix;
    if (!prefix || !name.startsWith(prefix)) return false;
    // Dunder names are public protocol methods
    return !(name.startsWith('__') && name.endsWith('__'));
  }

  private extractParameters(container: SyntaxNodeLike): ParameterInfo[] {
    const rule = this.grammar.parameters;

    if (rule.single.includes(container.type)) {
      return [{ name: collapseWhitespace(container.text), type: null }];
    }

    const parameters: ParameterInfo[] = [];

    for (const child of container.namedChildren) {
      if (rule.ignore.includes(child.type) || isCommentNode(child)) continue;
      if (rule.types && !rule.types.includes(child.type)) continue;

      if (rule.verbatim.includes(child.type)) {
        parameters.push({ name: collapseWhitespace(child.text), type: null });
        continue;
      }

      const typeNode = resolveFirst(child, rule.type);
      const type = typeNode ? cleanTypeText(typeNode.text) : null;

      if (rule.multiName) {
        const nameTypes = rule.multiName;
        const names = child.namedChildren.filter(
          c => nameTypes.includes(c.type) && c.startIndex !== typeNode?.startIndex
        );
        if (names.length > 0) {
          for (const n of names) parameters.push({ name: n.text, type });
          continue;
        }
      }

      const nameNode = resolveFirst(child, rule.name);
      let name: string;
      if (nameNode) {
        name = collapseWhitespace(nameNode.text);
      } else {
        name = typeNode ? '' : collapseWhitespace(child.text);
      }

      if (name === '' && type !== null && rule.typeOnlyIgnored.includes(type)) continue;
      parameters.push({ name, type });
    }

    return parameters;
  }

  /**
   * Decorator nodes in source order: wrapper children, preceding siblings,
   * then direct and container children
   */
  private collectDecoratorNodes(node: SyntaxNodeLike): SyntaxNodeLike[] {
    const rule = this.grammar.decorators;
    if (rule.types.length === 0) return [];

    const found: SyntaxNodeLike[] = [];
    const parent = node.parent;

    if (parent && rule.wrappers.includes(parent.type)) {
      found.push(...parent.namedChildren.filter(c => rule.types.includes(c.type)));
    }

    if (rule.siblings) {
      const preceding: SyntaxNodeLike[] = [];
      let sibling = node.previousNamedSibling;
      while (sibling && (rule.types.includes(sibling.type) || isCommentNode(sibling))) {
        if (!isCommentNode(sibling)) preceding.unshift(sibling);
        sibling = sibling.previousNamedSibling;
      }
      found.push(...preceding);
    }

    for (const child of node.namedChildren) {
      if (rule.types.includes(child.type)) {
        found.push(child);
      } else if (rule.containers.includes(child.type)) {
        found.push(...child.namedChildren.filter(c => rule.types.includes(c.type)));
      }
    }

    return found;
  }

  private collectModifiers(node: SyntaxNodeLike, rule: DeclarationRule): string[] {
    const modifierRule = this.grammar.modifiers;
    const modifiers: string[] = [];

    const parent = node.parent;
    const grandparent = parent?.parent ?? null;
    if (
      (parent && modifierRule.exportWrappers.includes(parent.type)) ||
      (grandparent && modifierRule.exportWrappers.includes(grandparent.type))
    ) {
      modifiers.push('export');
    }

    const sources = [node];
    if (rule.modifiersFrom) {
      const extra = resolveSelector(node, rule.modifiersFrom);
      if (extra) sources.push(extra);
    }

    for (const source of sources) {
      for (const child of source.children) {
        if (modifierRule.types.includes(child.type)) {
          modifiers.push(collapseWhitespace(child.text));
        } else if (modifierRule.containers.includes(child.type)) {
          for (const inner of child.children) {
            if (modifierRule.types.includes(inner.type)) {
              modifiers.push(collapseWhitespace(inner.text));
            }
          }
        }
      }
    }

    return Array.from(new Set(modifiers));
  }

  /**
   * Line of the first header token that is not a decorator
   */
  private headerLine(node: SyntaxNodeLike, decorators: readonly SyntaxNodeLike[]): number {
    const decoratorStarts = new Set(decorators.map(d => d.startIndex));
    const containers = this.grammar.decorators.containers;

    for (const child of node.children) {
      if (decoratorStarts.has(child.startIndex) || isCommentNode(child)) continue;
      if (containers.includes(child.type)) {
        const first = child.children.find(c => !decoratorStarts.has(c.startIndex));
        if (!first) continue;
        return first.startPosition.row + 1;
      }
      return child.startPosition.row + 1;
    }
    return node.startPosition.row + 1;
  }

  /**
   * Declaration header: node text up to the body, decorators removed,
   * whitespace collapsed, capped at maxSignatureLength
   */
  private buildHeader(
    node: SyntaxNodeLike,
    rule: DeclarationRule,
    decorators: readonly SyntaxNodeLike[]
  ): string {
    const text = node.text;
    const body = resolveFirst(node, rule.body);

    let end: number;
    if (body && body.startIndex > node.startIndex) {
      end = body.startIndex - node.startIndex;
    } else {
      end = cutAtBodyStart(text).length;
    }

    let header = '';
    let cursor = 0;
    const inside = decorators
      .filter(d => d.startIndex >= node.startIndex && d.endIndex <= node.startIndex + end)
      .sort((a, b) => a.startIndex - b.startIndex);

    for (const decorator of inside) {
      const from = decorator.startIndex - node.startIndex;
      if (from < cursor) continue;
      header += text.slice(cursor, from) + ' ';
      cursor = decorator.endIndex - node.startIndex;
    }
    header += text.slice(cursor, end);

    header = collapseWhitespace(header).replace(/(?:\s*(?:\{|:|;|=>))+$/, '').trim();

    // Counted in code points so a surrogate pair is never split
    const max = this.options.maxSignatureLength;
    const chars = Array.from(header);
    if (chars.length > max) {
      header = chars.slice(0, max - 1).join('').trimEnd() + '…';
    }
    return header;
  }
}
