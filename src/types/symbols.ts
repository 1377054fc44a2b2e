/**
 * Core signature types for the extractor
 */

export type SignatureKind =
  | 'function'
  | 'method'
  | 'constructor'
  | 'class'
  | 'struct'
  | 'interface'
  | 'enum';

/**
 * Language identifier. Built-in grammars use the ids below; grammar
 * definitions supplied through configuration may add more.
 */
export type Language = string;

export const BUILTIN_LANGUAGES = [
  'javascript',
  'typescript',
  'tsx',
  'python',
  'java',
  'c',
  'cpp',
  'csharp',
  'go',
  'rust',
  'swift',
  'objc',
  'ruby',
  'php',
] as const;

export const UNSUPPORTED = 'unsupported';

export interface ParameterInfo {
  name: string;
  type: string | null;
}

export interface Signature {
  name: string;
  kind: SignatureKind;
  parameters: ParameterInfo[];
  returnType: string | null;
  typeParameters: string | null;
  /** Enclosing scope path, outermost first */
  scope: string[];
  line: number;
  endLine: number;
  /** Declaration header with the body removed and whitespace collapsed */
  signature: string;
  decorators: string[];
  modifiers: string[];
}

export const CLASS_LIKE_KINDS: ReadonlySet<SignatureKind> = new Set<SignatureKind>([
  'class',
  'struct',
  'interface',
  'enum',
]);

export const FUNCTION_LIKE_KINDS: ReadonlySet<SignatureKind> = new Set<SignatureKind>([
  'function',
  'method',
  'constructor',
]);

// Parse status tracking
export type ParseStatus = 'complete' | 'partial';
export type ParseWarningCode = 'SYNTAX_ERROR';

export interface ParseWarning {
  code: ParseWarningCode;
  message: string;
  line: number;
}

export type SkipReason =
  | 'UNSUPPORTED_LANGUAGE'
  | 'FILE_TOO_LARGE'
  | 'BINARY_FILE'
  | 'READ_ERROR'
  | 'PARSE_ERROR';

export const SKIP_REASONS: readonly SkipReason[] = [
  'UNSUPPORTED_LANGUAGE',
  'FILE_TOO_LARGE',
  'BINARY_FILE',
  'READ_ERROR',
  'PARSE_ERROR',
];
