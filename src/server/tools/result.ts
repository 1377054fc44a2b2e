/**
 * Tool result shapes
 */

// Must stay a type alias: the SDK result type has an index signature
export type ToolResult = {
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
};

export function errorResult(tool: string, error: unknown): ToolResult {
  const message = error instanceof Error ? error.message : String(error);
  return {
    content: [{ type: 'text', text: `${tool} failed: ${message}` }],
    isError: true,
  };
}
