/**
 * Compact `.tldr` text notation
 *
 * One record per line, fields separated by tabs:
 *
 *   #tldr      <formatVersion>
 *   #tool      <name> <version>
 *   #root      <rootPath>
 *   #generated <timestamp | \->
 *   F <path> <language> <status> <lineCount> <checksum>
 *   D <summary>
 *   W <code> <line> <message>
 *   S <line> <endLine> <kind> <signature> <name> <scope> <params> <returnType> <typeParameters> <decorators> <modifiers>
 *   X <path> <reason> <message>
 *
 * D, W and S records belong to the closest preceding F record; D only
 * appears for files that carry a prose summary. Lists are
 * `|`-separated, parameters are `name:type`. Escapes: `\\` `\t` `\n` `\r`
 * `\|` `\:`; `\-` is a null field and `\_` an empty list item.
 */

import {
  FORMAT_VERSION,
  SKIP_REASONS,
  type FileSummary,
  type ParameterInfo,
  type ParseStatus,
  type RepoSummary,
  type Signature,
  type SignatureKind,
  type SkipReason,
} from '../types/index.js';

const NULL_FIELD = '\\-';
const EMPTY_ITEM = '\\_';

const SIGNATURE_KINDS: readonly SignatureKind[] = [
  'function',
  'method',
  'constructor',
  'class',
  'struct',
  'interface',
  'enum',
];
const STATUSES: readonly ParseStatus[] = ['complete', 'partial'];

const FIELD_ESCAPES: Record<string, string> = {
  '\\': '\\\\',
  '\t': '\\t',
  '\n': '\\n',
  '\r': '\\r',
  '|': '\\|',
  ':': '\\:',
};

function escapeField(value: string): string {
  return value.replace(/[\\\t\n\r]/g, ch => FIELD_ESCAPES[ch] ?? ch);
}

function escapeItem(value: string): string {
  if (value === '') return EMPTY_ITEM;
  return value.replace(/[\\\t\n\r|:]/g, ch => FIELD_ESCAPES[ch] ?? ch);
}

function nullable(value: string | null): string {
  return value === null ? NULL_FIELD : escapeField(value);
}

function list(values: readonly string[]): string {
  return values.map(escapeItem).join('|');
}

function parameterItem(param: ParameterInfo): string {
  const name = escapeItem(param.name);
  return param.type === null ? name : `${name}:${escapeItem(param.type)}`;
}

function signatureRecord(sig: Signature): string {
  return [
    'S',
    String(sig.line),
    String(sig.endLine),
    sig.kind,
    escapeField(sig.signature),
    escapeField(sig.name),
    list(sig.scope),
    sig.parameters.map(parameterItem).join('|'),
    nullable(sig.returnType),
    nullable(sig.typeParameters),
    list(sig.decorators),
    list(sig.modifiers),
  ].join('\t');
}

function fileRecords(file: FileSummary): string[] {
  const lines = [
    ['F', escapeField(file.path), escapeField(file.language), file.status, String(file.lineCount), escapeField(file.checksum)].join('\t'),
  ];
  if (file.summary !== undefined) {
    lines.push(`D\t${escapeField(file.summary)}`);
  }
  for (const warning of file.warnings) {
    lines.push(['W', warning.code, String(warning.line), escapeField(warning.message)].join('\t'));
  }
  for (const sig of file.signatures) {
    lines.push(signatureRecord(sig));
  }
  return lines;
}

export function serializeText(summary: RepoSummary): string {
  const lines = [
    `#tldr\t${summary.formatVersion}`,
    `#tool\t${escapeField(summary.tool.name)}\t${escapeField(summary.tool.version)}`,
    `#root\t${escapeField(summary.rootPath)}`,
    `#generated\t${nullable(summary.generatedAt)}`,
  ];

  for (const file of summary.files) {
    lines.push('', ...fileRecords(file));
  }

  if (summary.skipped.length > 0) {
    lines.push('');
    for (const skipped of summary.skipped) {
      lines.push(['X', escapeField(skipped.path), skipped.reason, escapeField(skipped.message)].join('\t'));
    }
  }

  return lines.join('\n') + '\n';
}

// ---------------------------------------------------------------------------
// Reading
// ---------------------------------------------------------------------------

class TextFormatError extends Error {
  constructor(lineNumber: number, message: string) {
    super(`Invalid .tldr content at line ${lineNumber}: ${message}`);
    this.name = 'TextFormatError';
  }
}

function unescape(raw: string, lineNumber: number): string {
  let out = '';
  for (let i = 0; i < raw.length; i++) {
    const ch = raw.charAt(i);
    if (ch !== '\\') {
      out += ch;
      continue;
    }
    const next = raw.charAt(++i);
    switch (next) {
      case '\\': out += '\\'; break;
      case 't': out += '\t'; break;
      case 'n': out += '\n'; break;
      case 'r': out += '\r'; break;
      case '|': out += '|'; break;
      case ':': out += ':'; break;
      case '_': break;
      default:
        throw new TextFormatError(lineNumber, `unknown escape "\\${next}"`);
    }
  }
  return out;
}

/**
 * Split on a separator that is not preceded by an escaping backslash
 */
function splitUnescaped(raw: string, separator: string, limit = Infinity): string[] {
  const parts: string[] = [];
  let current = '';
  for (let i = 0; i < raw.length; i++) {
    const ch = raw.charAt(i);
    if (ch === '\\') {
      current += ch + raw.charAt(i + 1);
      i++;
    } else if (ch === separator && parts.length < limit) {
      parts.push(current);
      current = '';
    } else {
      current += ch;
    }
  }
  parts.push(current);
  return parts;
}

function readList(raw: string, lineNumber: number): string[] {
  if (raw === '') return [];
  return splitUnescaped(raw, '|').map(item => unescape(item, lineNumber));
}

function readNullable(raw: string, lineNumber: number): string | null {
  return raw === NULL_FIELD ? null : unescape(raw, lineNumber);
}

function readParameters(raw: string, lineNumber: number): ParameterInfo[] {
  if (raw === '') return [];
  return splitUnescaped(raw, '|').map(item => {
    const [name = '', type] = splitUnescaped(item, ':', 1);
    return {
      name: unescape(name, lineNumber),
      type: type === undefined ? null : unescape(type, lineNumber),
    };
  });
}

function readInt(raw: string, lineNumber: number, field: string): number {
  if (!/^\d+$/.test(raw)) {
    throw new TextFormatError(lineNumber, `${field} must be a non-negative integer, got "${raw}"`);
  }
  return Number.parseInt(raw, 10);
}

function readEnum<T extends string>(raw: string, allowed: readonly T[], lineNumber: number, field: string): T {
  const match = allowed.find(value => value === raw);
  if (match === undefined) {
    throw new TextFormatError(lineNumber, `unknown ${field} "${raw}"`);
  }
  return match;
}

function expectFields(fields: string[], count: number, lineNumber: number, record: string): void {
  if (fields.length !== count) {
    throw new TextFormatError(lineNumber, `${record} record needs ${count} fields, found ${fields.length}`);
  }
}

export function parseText(content: string): RepoSummary {
  const summary: RepoSummary = {
    formatVersion: FORMAT_VERSION,
    tool: { name: '', version: '' },
    rootPath: '',
    generatedAt: null,
    files: [],
    skipped: [],
  };
  const seenHeaders = new Set<string>();
  let current: FileSummary | null = null;

  const lines = content.split('\n');
  for (const [index, rawLine] of lines.entries()) {
    const lineNumber = index + 1;
    const line = rawLine.endsWith('\r') ? rawLine.slice(0, -1) : rawLine;
    if (line === '') continue;

    const fields = line.split('\t');
    const tag = fields[0] ?? '';

    if (lineNumber === 1 && tag !== '#tldr') {
      throw new TextFormatError(lineNumber, 'missing #tldr header');
    }

    switch (tag) {
      case '#tldr': {
        expectFields(fields, 2, lineNumber, tag);
        const version = readInt(fields[1] ?? '', lineNumber, 'format version');
        if (version !== FORMAT_VERSION) {
          throw new TextFormatError(lineNumber, `unsupported format version ${version}`);
        }
        summary.formatVersion = version;
        seenHeaders.add(tag);
        break;
      }
      case '#tool':
        expectFields(fields, 3, lineNumber, tag);
        summary.tool = {
          name: unescape(fields[1] ?? '', lineNumber),
          version: unescape(fields[2] ?? '', lineNumber),
        };
        seenHeaders.add(tag);
        break;
      case '#root':
        expectFields(fields, 2, lineNumber, tag);
        summary.rootPath = unescape(fields[1] ?? '', lineNumber);
        seenHeaders.add(tag);
        break;
      case '#generated':
        expectFields(fields, 2, lineNumber, tag);
        summary.generatedAt = readNullable(fields[1] ?? '', lineNumber);
        seenHeaders.add(tag);
        break;
      case 'F': {
        expectFields(fields, 6, lineNumber, tag);
        current = {
          path: unescape(fields[1] ?? '', lineNumber),
          language: unescape(fields[2] ?? '', lineNumber),
          status: readEnum(fields[3] ?? '', STATUSES, lineNumber, 'status'),
          lineCount: readInt(fields[4] ?? '', lineNumber, 'line count'),
          checksum: unescape(fields[5] ?? '', lineNumber),
          signatures: [],
          warnings: [],
        };
        summary.files.push(current);
        break;
      }
      case 'D':
        expectFields(fields, 2, lineNumber, tag);
        if (!current) throw new TextFormatError(lineNumber, 'D record before any F record');
        current.summary = unescape(fields[1] ?? '', lineNumber);
        break;
      case 'W':
        expectFields(fields, 4, lineNumber, tag);
        if (!current) throw new TextFormatError(lineNumber, 'W record before any F record');
        current.warnings.push({
          code: readEnum(fields[1] ?? '', ['SYNTAX_ERROR'] as const, lineNumber, 'warning code'),
          line: readInt(fields[2] ?? '', lineNumber, 'line'),
          message: unescape(fields[3] ?? '', lineNumber),
        });
        break;
      case 'S':
        expectFields(fields, 12, lineNumber, tag);
        if (!current) throw new TextFormatError(lineNumber, 'S record before any F record');
        current.signatures.push({
          line: readInt(fields[1] ?? '', lineNumber, 'line'),
          endLine: readInt(fields[2] ?? '', lineNumber, 'end line'),
          kind: readEnum(fields[3] ?? '', SIGNATURE_KINDS, lineNumber, 'kind'),
          signature: unescape(fields[4] ?? '', lineNumber),
          name: unescape(fields[5] ?? '', lineNumber),
          scope: readList(fields[6] ?? '', lineNumber),
          parameters: readParameters(fields[7] ?? '', lineNumber),
          returnType: readNullable(fields[8] ?? '', lineNumber),
          typeParameters: readNullable(fields[9] ?? '', lineNumber),
          decorators: readList(fields[10] ?? '', lineNumber),
          modifiers: readList(fields[11] ?? '', lineNumber),
        });
        break;
      case 'X': {
        expectFields(fields, 4, lineNumber, tag);
        current = null;
        const reason: SkipReason = readEnum(fields[2] ?? '', SKIP_REASONS, lineNumber, 'skip reason');
        summary.skipped.push({
          path: unescape(fields[1] ?? '', lineNumber),
          reason,
          message: unescape(fields[3] ?? '', lineNumber),
        });
        break;
      }
      default:
        throw new TextFormatError(lineNumber, `unknown record type "${tag}"`);
    }
  }

  for (const header of ['#tldr', '#tool', '#root', '#generated']) {
    if (!seenHeaders.has(header)) {
      throw new Error(`Invalid .tldr content: missing ${header} header`);
    }
  }

  return summary;
}
