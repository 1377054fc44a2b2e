/**
 * languages command - List the languages a run would extract
 */

import { Command } from 'commander';
import { loadConfig, loadConfigOrDefault } from '../../config/index.js';
import { LanguageDetector } from '../../indexer/language-detector.js';
import { loadGrammarDefinitions } from '../../indexer/parsers/grammar.js';

interface LanguagesOptions {
  config?: string;
  json: boolean;
}

export const languagesCommand = new Command('languages')
  .description('List supported languages and their file extensions')
  .option('-c, --config <path>', 'Path to config file')
  .option('--json', 'Print as JSON', false)
  .action(async (options: LanguagesOptions) => {
    try {
      const config = options.config ? await loadConfig(options.config) : await loadConfigOrDefault(process.cwd());
      const grammars = await loadGrammarDefinitions(config.languages.grammars);
      const detector = new LanguageDetector(grammars, config.languages);
      const byLanguage = detector.getExtensionsByLanguage();
      const languages = Array.from(byLanguage.keys()).sort();

      if (options.json) {
        const entries = languages.map(language => [language, byLanguage.get(language) ?? []]);
        console.log(JSON.stringify(Object.fromEntries(entries), null, 2));
        return;
      }

      console.log(`Supported languages (${languages.length}):\n`);
      for (const language of languages) {
        const extensions = (byLanguage.get(language) ?? []).map(ext => `.${ext}`).join(', ');
        console.log(`  ${language.padEnd(12)} ${extensions}`);
      }
    } catch (error) {
      console.error('Error:', error instanceof Error ? error.message : error);
      process.exit(1);
    }
  });
