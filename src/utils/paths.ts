/**
 * Path helpers shared by the CLI and the protocol server
 */

import os from 'node:os';
import path from 'node:path';

/**
 * Expand a leading "~" to the home directory
 */
export function expandHome(inputPath: string): string {
  if (inputPath === '~') return os.homedir();
  if (inputPath.startsWith('~/') || inputPath.startsWith('~\\')) {
    return path.join(os.homedir(), inputPath.slice(2));
  }
  return inputPath;
}

/**
 * Expand "~" and resolve against a base directory
 */
export function resolveUserPath(inputPath: string, baseDir: string = process.cwd()): string {
  return path.resolve(baseDir, expandHome(inputPath));
}
