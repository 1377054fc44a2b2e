/**
 * init command - Write a starter configuration
 */

import { Command } from 'commander';
import fs from 'node:fs';
import path from 'node:path';
import { CONFIG_FILE_NAMES, DEFAULT_EXCLUDE } from '../../config/index.js';

interface InitOptions {
  force: boolean;
  cache: boolean;
  gitignore: boolean;
}

const CACHE_DIR_ENTRY = '.tldr/';

export function buildStarterConfig(cache: boolean): Record<string, unknown> {
  return {
    include: ['**/*'],
    exclude: DEFAULT_EXCLUDE,
    output: {
      format: 'json',
      timestamp: true,
    },
    parser: {
      maxFileSize: 1024 * 1024,
      includePrivate: true,
      includeNested: true,
    },
    cache: {
      enabled: cache,
      path: '.tldr/cache.db',
    },
  };
}

/**
 * Add the cache directory to .gitignore
 */
export async function updateGitignore(projectPath: string): Promise<boolean> {
  const gitignorePath = path.join(projectPath, '.gitignore');

  if (fs.existsSync(gitignorePath)) {
    const content = await fs.promises.readFile(gitignorePath, 'utf-8');
    if (content.split(/\r?\n/).some(line => line.trim() === CACHE_DIR_ENTRY || line.trim() === '.tldr')) {
      return false;
    }
    await fs.promises.writeFile(gitignorePath, `${content.trimEnd()}\n\n# TLDR cache\n${CACHE_DIR_ENTRY}\n`);
    return true;
  }

  await fs.promises.writeFile(gitignorePath, `# TLDR cache\n${CACHE_DIR_ENTRY}\n`);
  return true;
}

export const initCommand = new Command('init')
  .description(`Write a ${CONFIG_FILE_NAMES[0]} with the default settings`)
  .argument('[directory]', 'Project directory', '.')
  .option('--force', 'Overwrite an existing config file', false)
  .option('--cache', 'Enable the extraction cache', false)
  .option('--no-gitignore', 'Leave .gitignore untouched')
  .action(async (directory: string, options: InitOptions) => {
    const projectPath = path.resolve(directory);
    const configPath = path.join(projectPath, 'tldr.config.json');

    try {
      if (fs.existsSync(configPath) && !options.force) {
        console.error(`Error: ${configPath} already exists (use --force to overwrite)`);
        process.exit(1);
        return;
      }

      await fs.promises.mkdir(projectPath, { recursive: true });
      await fs.promises.writeFile(configPath, JSON.stringify(buildStarterConfig(options.cache), null, 2) + '\n');
      console.log(`Created ${configPath}`);

      if (options.cache && options.gitignore && (await updateGitignore(projectPath))) {
        console.log(`Added ${CACHE_DIR_ENTRY} to .gitignore`);
      }
    } catch (error) {
      console.error('Error:', error instanceof Error ? error.message : error);
      process.exit(1);
    }
  });
