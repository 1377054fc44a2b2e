import { describe, it, expect } from 'vitest';
import { parseText, serializeText } from '../../../src/serializer/text.js';
import { createTestFileSummary, createTestRepoSummary, createTestSignature } from '../../helpers/database.js';

const HEADER = [
  '#tldr\t1',
  '#tool\ttldr-code\t0.1.0',
  '#root\t/work/project',
  '#generated\t\\-',
].join('\n');

describe('.tldr text format', () => {
  describe('serializeText', () => {
    it('should write headers, file blocks and skipped records', () => {
      expect(serializeText(createTestRepoSummary())).toBe(
        [
          '#tldr\t1',
          '#tool\ttldr-code\t0.1.0',
          '#root\t/work/project',
          '#generated\t2024-01-02T03:04:05.000Z',
          '',
          'F\tsrc/service.ts\ttypescript\tcomplete\t12\tabc123',
          'S\t1\t12\tclass\texport class UserService\tUserService\t\t\t\\-\t\\-\t\texport',
          'S\t2\t2\tconstructor\tconstructor(private db: Database)\tconstructor\tUserService\tdb:Database\t\\-\t\\-\t\t',
          'S\t4\t6\tmethod\tasync find(id: string, options): Promise<User | null>\tfind\tUserService\tid:string|options\tPromise<User | null>\t\\-\t@cached()\tasync',
          '',
          'F\tsrc/broken.py\tpython\tpartial\t4\tdef456',
          'W\tSYNTAX_ERROR\t3\tUnexpected syntax at line 3',
          'S\t1\t3\tfunction\tdef ok()\tok\t\t\t\\-\t\\-\t\t',
          '',
          'X\tassets/logo.png\tUNSUPPORTED_LANGUAGE\tNo grammar for ".png" files',
          '',
        ].join('\n')
      );
    });

    it('should write a null timestamp and no skipped block when nothing was skipped', () => {
      const text = serializeText(createTestRepoSummary({ generatedAt: null, files: [], skipped: [] }));

      expect(text).toBe(`${HEADER}\n`);
    });

    it('should escape separators inside fields and list items', () => {
      const summary = createTestRepoSummary({
        files: [
          createTestFileSummary({
            path: 'odd\tname.ts',
            signatures: [
              createTestSignature({
                scope: ['a|b'],
                parameters: [
                  { name: 'opts', type: 'Record<string, number>' },
                  { name: '', type: 'int' },
                  { name: 'k:v', type: null },
                ],
                decorators: [''],
              }),
            ],
          }),
        ],
        skipped: [],
      });

      const lines = serializeText(summary).split('\n');

      expect(lines[5]).toBe('F\todd\\tname.ts\ttypescript\tcomplete\t3\tchecksum-1');
      expect(lines[6]?.split('\t').slice(6, 11)).toEqual([
        'a\\|b',
        'opts:Record<string, number>|\\_:int|k\\:v',
        'string',
        '\\-',
        '\\_',
      ]);
    });
    it('should write a file summary right after its F record', () => {
      const summary = createTestRepoSummary({
        files: [createTestFileSummary({ summary: 'Greets people.\nUsed by the CLI.', signatures: [] })],
        skipped: [],
      });

      expect(serializeText(summary).split('\n').slice(5)).toEqual([
        'F\tsrc/greet.ts\ttypescript\tcomplete\t3\tchecksum-1',
        'D\tGreets people.\\nUsed by the CLI.',
        '',
      ]);
    });
  });

  describe('parseText', () => {
    it('should read back what it writes', () => {
      const summary = createTestRepoSummary();

      expect(parseText(serializeText(summary))).toEqual(summary);
    });

    it('should read back file summaries', () => {
      const summary = createTestRepoSummary({
        files: [
          createTestFileSummary({ path: 'a.ts', summary: 'Tab\tand newline\nin prose.' }),
          createTestFileSummary({ path: 'b.ts' }),
        ],
      });

      const parsed = parseText(serializeText(summary));

      expect(parsed).toEqual(summary);
      expect(parsed.files[1] && 'summary' in parsed.files[1]).toBe(false);
    });

    it('should reject a summary outside a file block', () => {
      expect(() => parseText(`${HEADER}\nD\tOrphan prose\n`)).toThrow(
        'Invalid .tldr content at line 5: D record before any F record'
      );
    });

    it('should restore escaped values', () => {
      const summary = createTestRepoSummary({
        rootPath: 'C:\\work\\project',
        files: [
          createTestFileSummary({
            signatures: [
              createTestSignature({
                name: 'weird\nname',
                signature: 'def a(x)\t# tab',
                scope: ['a|b', ''],
                parameters: [{ name: 'k:v', type: 'A|B' }, { name: '', type: 'void' }],
                returnType: '',
                decorators: ['@x\\y'],
              }),
            ],
          }),
        ],
        skipped: [],
      });

      expect(parseText(serializeText(summary))).toEqual(summary);
    });

    it('should accept CRLF line endings', () => {
      const summary = createTestRepoSummary();

      expect(parseText(serializeText(summary).replace(/\n/g, '\r\n'))).toEqual(summary);
    });

    it('should require the #tldr header on the first line', () => {
      expect(() => parseText('hello\n')).toThrow('Invalid .tldr content at line 1: missing #tldr header');
    });

    it('should require every header', () => {
      expect(() => parseText('#tldr\t1\n#tool\ta\tb\n#generated\t\\-\n')).toThrow(
        'Invalid .tldr content: missing #root header'
      );
    });

    it('should reject other format versions', () => {
      expect(() => parseText('#tldr\t2\n')).toThrow('Invalid .tldr content at line 1: unsupported format version 2');
    });

    it('should reject records with the wrong number of fields', () => {
      expect(() => parseText(`${HEADER}\nF\ta.ts\ttypescript\n`)).toThrow(
        'Invalid .tldr content at line 5: F record needs 6 fields, found 3'
      );
    });

    it('should reject signatures outside a file block', () => {
      expect(() => parseText(`${HEADER}\nS\t1\t1\tfunction\tf()\tf\t\t\t\\-\t\\-\t\t\n`)).toThrow(
        'Invalid .tldr content at line 5: S record before any F record'
      );
    });

    it('should reject unknown kinds and reasons', () => {
      const file = 'F\ta.ts\ttypescript\tcomplete\t1\tabc';

      expect(() => parseText(`${HEADER}\n${file}\nS\t1\t1\tmacro\tf()\tf\t\t\t\\-\t\\-\t\t\n`)).toThrow(
        'Invalid .tldr content at line 6: unknown kind "macro"'
      );
      expect(() => parseText(`${HEADER}\nX\ta.bin\tTOO_SHINY\tnope\n`)).toThrow(
        'Invalid .tldr content at line 5: unknown skip reason "TOO_SHINY"'
      );
    });

    it('should reject unknown escapes and record types', () => {
      expect(() => parseText('#tldr\t1\n#tool\ta\tb\n#root\t\\q\n')).toThrow(
        'Invalid .tldr content at line 3: unknown escape "\\q"'
      );
      expect(() => parseText(`${HEADER}\nZ\tx\n`)).toThrow('Invalid .tldr content at line 5: unknown record type "Z"');
    });

    it('should reject non-numeric line numbers', () => {
      expect(() => parseText(`${HEADER}\nF\ta.ts\ttypescript\tcomplete\tmany\tabc\n`)).toThrow(
        'Invalid .tldr content at line 5: line count must be a non-negative integer, got "many"'
      );
    });
  });
});
