/**
 * Declarative grammar definitions
 *
 * A grammar definition describes, for one language, which syntax tree nodes
 * are declarations and where their name, parameters, return type and body
 * live. The generic extractor interprets these definitions; no language has
 * bespoke extraction code.
 */

import fs from 'node:fs/promises';
import { z } from 'zod';

/**
 * One step of a selector.
 *
 * `field` follows a named field; with `until`, the field is followed
 * repeatedly until a node of one of the listed types is reached.
 * `child` takes the first named child of one of the listed types.
 * `parent` moves to the parent node when it has one of the listed types,
 * e.g. the `template_declaration` wrapping a C++ function.
 */
export const selectorStepSchema = z.union([
  z.object({
    field: z.string().min(1),
    until: z.array(z.string()).min(1).optional(),
  }).strict(),
  z.object({
    child: z.array(z.string()).min(1),
  }).strict(),
  z.object({
    parent: z.array(z.string()).min(1),
  }).strict(),
]);

/** An empty selector resolves to the node itself */
export const selectorSchema = z.array(selectorStepSchema);

const signatureKindSchema = z.enum([
  'function',
  'method',
  'constructor',
  'class',
  'struct',
  'interface',
  'enum',
]);

export const declarationRuleSchema = z.object({
  node: z.string().min(1),
  kind: signatureKindSchema,
  /** Kind used instead when the nearest enclosing declaration is class-like */
  memberKind: signatureKindSchema.optional(),
  /** When false the node only contributes a scope segment */
  emit: z.boolean().default(true),
  /** Whether functions nested directly in this declaration are members */
  classLike: z.boolean().optional(),
  name: z.array(selectorSchema).default([[{ field: 'name' }]]),
  defaultName: z.string().optional(),
  parameters: z.array(selectorSchema).default([[{ field: 'parameters' }]]),
  returnType: z.array(selectorSchema).default([[{ field: 'return_type' }]]),
  typeParameters: z.array(selectorSchema).default([[{ field: 'type_parameters' }]]),
  body: z.array(selectorSchema).default([[{ field: 'body' }]]),
  requires: z.object({
    selector: selectorSchema,
    types: z.array(z.string()).min(1).optional(),
  }).optional(),
  /** Extra scope segment taken from the node, e.g. a Go method receiver */
  scopeName: z.array(selectorSchema).optional(),
  /** Node whose keyword children also count as modifiers */
  modifiersFrom: selectorSchema.optional(),
  kindFrom: z.object({
    selector: selectorSchema,
    map: z.record(z.string(), signatureKindSchema),
  }).optional(),
  constructorNames: z.array(z.string()).default([]),
  constructorMatchesScope: z.boolean().default(false),
});

export const parameterRuleSchema = z.object({
  /** Parameter node types; every named child counts when omitted */
  types: z.array(z.string()).optional(),
  ignore: z.array(z.string()).default(['comment', 'line_comment', 'block_comment']),
  /** Container types that are themselves a single parameter, e.g. `x => x` */
  single: z.array(z.string()).default([]),
  /** Parameter types whose whole text is the name */
  verbatim: z.array(z.string()).default([]),
  /** Child types that each name a parameter sharing one type (`a, b int`) */
  multiName: z.array(z.string()).optional(),
  name: z.array(selectorSchema).default([[{ field: 'name' }]]),
  type: z.array(selectorSchema).default([[{ field: 'type' }]]),
  /** Unnamed parameters with these types are dropped (`f(void)`) */
  typeOnlyIgnored: z.array(z.string()).default([]),
});

export const decoratorRuleSchema = z.object({
  types: z.array(z.string()).default([]),
  containers: z.array(z.string()).default([]),
  wrappers: z.array(z.string()).default([]),
  siblings: z.boolean().default(false),
});

export const modifierRuleSchema = z.object({
  types: z.array(z.string()).default([]),
  containers: z.array(z.string()).default([]),
  exportWrappers: z.array(z.string()).default([]),
});

/** Shape accepted in grammars/languages.json and in user configuration */
export const grammarDefinitionInputSchema = z.object({
  language: z.string().min(1).regex(/^[a-z0-9_+-]+$/, 'must be a lowercase identifier'),
  extends: z.string().optional(),
  wasm: z.string().min(1),
  extensions: z.array(z.string()).default([]),
  filenames: z.array(z.string()).default([]),
  declarations: z.array(declarationRuleSchema).optional(),
  parameters: parameterRuleSchema.optional(),
  decorators: decoratorRuleSchema.optional(),
  modifiers: modifierRuleSchema.optional(),
  qualifiedNameSeparator: z.string().min(1).optional(),
  privatePrefix: z.string().min(1).optional(),
});

export const grammarFileSchema = z.object({
  grammars: z.array(grammarDefinitionInputSchema),
});

export type SelectorStep = z.infer<typeof selectorStepSchema>;
export type Selector = z.infer<typeof selectorSchema>;
export type DeclarationRule = z.infer<typeof declarationRuleSchema>;
export type ParameterRule = z.infer<typeof parameterRuleSchema>;
export type DecoratorRule = z.infer<typeof decoratorRuleSchema>;
export type ModifierRule = z.infer<typeof modifierRuleSchema>;
export type GrammarDefinitionInput = z.input<typeof grammarDefinitionInputSchema>;
type ParsedGrammarInput = z.infer<typeof grammarDefinitionInputSchema>;

/** A fully resolved grammar definition */
export interface GrammarDefinition {
  language: string;
  wasm: string;
  extensions: string[];
  filenames: string[];
  declarations: DeclarationRule[];
  parameters: ParameterRule;
  decorators: DecoratorRule;
  modifiers: ModifierRule;
  qualifiedNameSeparator?: string;
  privatePrefix?: string;
}

const BUILTIN_GRAMMARS_URL = new URL('../../../grammars/languages.json', import.meta.url);

/**
 * Resolve `extends` chains and fill defaults.
 * Later definitions replace earlier ones with the same language.
 */
export function resolveGrammarDefinitions(inputs: readonly GrammarDefinitionInput[]): GrammarDefinition[] {
  const parsed = new Map<string, ParsedGrammarInput>();

  for (const [index, input] of inputs.entries()) {
    const result = grammarDefinitionInputSchema.safeParse(input);
    if (!result.success) {
      const errors = result.error.errors
        .map(e => `  - grammars[${index}].${e.path.join('.')}: ${e.message}`)
        .join('\n');
      throw new Error(`Invalid grammar definition:\n${errors}`);
    }
    parsed.set(result.data.language, result.data);
  }

  const resolved = new Map<string, GrammarDefinition>();

  const resolve = (language: string, chain: string[]): GrammarDefinition => {
    const done = resolved.get(language);
    if (done) return done;

    const input = parsed.get(language);
    if (!input) {
      throw new Error(`Grammar "${chain[chain.length - 1]}" extends unknown language "${language}"`);
    }
    if (chain.includes(language)) {
      throw new Error(`Grammar inheritance cycle: ${[...chain, language].join(' -> ')}`);
    }

    const base = input.extends ? resolve(input.extends, [...chain, language]) : null;
    const declarations = input.declarations ?? base?.declarations ?? [];
    if (declarations.length === 0) {
      throw new Error(`Grammar "${language}" declares no declaration rules`);
    }

    const definition: GrammarDefinition = {
      language,
      wasm: input.wasm,
      extensions: input.extensions.map(normalizeExtension),
      filenames: input.filenames,
      declarations,
      parameters: input.parameters ?? base?.parameters ?? parameterRuleSchema.parse({}),
      decorators: input.decorators ?? base?.decorators ?? decoratorRuleSchema.parse({}),
      modifiers: input.modifiers ?? base?.modifiers ?? modifierRuleSchema.parse({}),
      qualifiedNameSeparator: input.qualifiedNameSeparator ?? base?.qualifiedNameSeparator,
      privatePrefix: input.privatePrefix ?? base?.privatePrefix,
    };
    resolved.set(language, definition);
    return definition;
  };

  return Array.from(parsed.keys()).map(language => resolve(language, []));
}

/**
 * Load the grammar definitions shipped with the package
 */
export async function loadBuiltinGrammarInputs(): Promise<GrammarDefinitionInput[]> {
  const content = await fs.readFile(BUILTIN_GRAMMARS_URL, 'utf-8');
  const result = grammarFileSchema.safeParse(JSON.parse(content));
  if (!result.success) {
    const errors = result.error.errors
      .map(e => `  - ${e.path.join('.')}: ${e.message}`)
      .join('\n');
    throw new Error(`Invalid built-in grammar file:\n${errors}`);
  }
  return result.data.grammars;
}

/**
 * Built-in definitions merged with user-supplied ones
 */
export async function loadGrammarDefinitions(
  extra: readonly GrammarDefinitionInput[] = []
): Promise<GrammarDefinition[]> {
  const builtin = await loadBuiltinGrammarInputs();
  return resolveGrammarDefinitions([...builtin, ...extra]);
}

export function normalizeExtension(extension: string): string {
  return extension.replace(/^\.+/, '').toLowerCase();
}
