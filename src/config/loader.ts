/**
 * Configuration file loader
 */

import fs from 'node:fs';
import path from 'node:path';
import { configSchema, type Config } from './schema.js';

export const CONFIG_FILE_NAMES = ['tldr.config.json', '.tldrrc.json', '.tldrrc'];

function parseConfig(rawConfig: unknown, source: string): Config {
  const result = configSchema.safeParse(rawConfig);

  if (!result.success) {
    const errors = result.error.errors.map(e => `  - ${e.path.join('.')}: ${e.message}`).join('\n');
    throw new Error(`Invalid configuration in ${source}:\n${errors}`);
  }

  return result.data;
}

export async function loadConfig(configPath: string): Promise<Config> {
  const absolutePath = path.resolve(configPath);

  if (!fs.existsSync(absolutePath)) {
    throw new Error(`Config file not found: ${absolutePath}`);
  }

  const content = await fs.promises.readFile(absolutePath, 'utf-8');

  let rawConfig: unknown;
  try {
    rawConfig = JSON.parse(content);
  } catch {
    throw new Error(`Invalid JSON in config file: ${absolutePath}`);
  }

  return parseConfig(rawConfig, absolutePath);
}

export function getDefaultConfig(): Config {
  return configSchema.parse({});
}

async function readPackageConfig(packagePath: string): Promise<unknown> {
  let packageContent: unknown;
  try {
    packageContent = JSON.parse(await fs.promises.readFile(packagePath, 'utf-8'));
  } catch {
    // An unreadable package.json is not a configuration source
    return undefined;
  }
  if (typeof packageContent === 'object' && packageContent !== null && 'tldr' in packageContent) {
    return packageContent.tldr;
  }
  return undefined;
}

/**
 * Find the nearest configuration, walking up from startDir
 */
export async function findConfig(startDir: string): Promise<Config | null> {
  let currentDir = path.resolve(startDir);

  for (;;) {
    for (const configName of CONFIG_FILE_NAMES) {
      const configPath = path.join(currentDir, configName);
      if (fs.existsSync(configPath)) {
        return loadConfig(configPath);
      }
    }

    // Check package.json for a tldr key
    const packagePath = path.join(currentDir, 'package.json');
    if (fs.existsSync(packagePath)) {
      const packageConfig = await readPackageConfig(packagePath);
      if (packageConfig !== undefined) {
        return parseConfig(packageConfig, `${packagePath} (tldr key)`);
      }
    }

    const parent = path.dirname(currentDir);
    if (parent === currentDir) return null;
    currentDir = parent;
  }
}

export async function loadConfigOrDefault(startDir: string): Promise<Config> {
  const config = await findConfig(startDir);
  return config ?? getDefaultConfig();
}
