/**
 * generate_tldr tool implementation
 */

import { generateTldr, type GenerateOptions, type GenerateResult } from '../../indexer/generate.js';
import { resolveUserPath } from '../../utils/paths.js';
import { errorResult, type ToolResult } from './result.js';

export interface GenerateTldrInput {
  path: string;
  output_filename?: string;
}

export type GenerateFn = (options: GenerateOptions) => Promise<GenerateResult>;

export function formatGenerateReport(result: GenerateResult): string {
  const { stats } = result;
  const lines = [
    `TLDR file written to: ${result.outputPath}`,
    `Files: ${stats.totalFiles}`,
    `Skipped files: ${stats.skippedFiles}`,
    `Functions: ${stats.functions}`,
    `Methods: ${stats.methods + stats.constructors}`,
    `Classes: ${stats.classes + stats.structs}`,
  ];
  for (const failure of result.summaryErrors) {
    lines.push(`Summary failed for ${failure.path}: ${failure.message}`);
  }
  return lines.join('\n');
}

export async function generateTldrTool(
  input: GenerateTldrInput,
  signal?: AbortSignal,
  generate: GenerateFn = generateTldr
): Promise<ToolResult> {
  try {
    const directory = resolveUserPath(input.path);
    const result = await generate({
      directory,
      output: input.output_filename,
      outputBase: directory,
      signal,
    });

    return {
      content: [
        { type: 'text', text: formatGenerateReport(result) },
        { type: 'text', text: result.content },
      ],
    };
  } catch (error) {
    return errorResult('generate_tldr', error);
  }
}
