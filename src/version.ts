export const TOOL_NAME = 'tldr-code';
export const TOOL_VERSION = '0.1.0';
