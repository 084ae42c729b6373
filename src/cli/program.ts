import { Command } from 'commander';
import type { ConversionResult, ConvertOptions } from '../models/entities.js';

export interface CLIOptions {
  templateName: string;
  lang?: string;
  slug?: string;
  to?: string;
  logLevel?: string;
}

export type ConvertHandler = (archive: string, options: CLIOptions) => Promise<ConversionResult>;

export function toConvertOptions(options: CLIOptions): ConvertOptions {
  return {
    templateName: options.templateName,
    lang: options.lang,
    slug: options.slug,
    to: options.to,
  };
}

export function createProgram(handler: ConvertHandler): Command {
  const program = new Command();

  program
    .name('zds-to-grav')
    .description(
      'Converts a Zeste de Savoir article or opinion for Grav.\n\n' +
      'The archive argument can either be a path to a downloaded archive or the URL\n' +
      'of an article or an opinion. URLs are preferred as they give access to metadata\n' +
      'the archive does not contain (tags, categories, authors, date).'
    )
    .version('1.0.0')
    .argument('<zds-archive>', 'Path to a downloaded archive, or URL of the published content')
    .option('--template-name <name>', 'Template name to use (item for blog entries)', 'item')
    .option('--lang <lang>', 'Language suffix of the markdown file')
    .option(
      '--slug <slug>',
      'Page directory name. Defaults to the content slug; the directory is never numbered'
    )
    .option(
      '--to <directory>',
      'Where to create the page directory (default: the archive directory, or the current directory for URLs)'
    )
    .option('--log-level <level>', 'Log level: error, warn, info, debug')
    .action(async (archive: string, options: CLIOptions) => {
      await handler(archive, options);
    });

  return program;
}
