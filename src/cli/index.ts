#!/usr/bin/env node

/**
 * CLI entry point: zds-to-grav <zds-archive>
 */

import { createProgram, toConvertOptions, type CLIOptions } from './program.js';
import { Converter } from '../core/converter.js';
import { HttpClient } from '../http/httpClient.js';
import { buildConfig, loadEnvironment } from '../util/config.js';
import { ConversionError, errorMessage } from '../util/errors.js';
import { logger } from '../util/logger.js';

async function handleConvertAction(archive: string, options: CLIOptions) {
  const config = buildConfig(loadEnvironment(), { logLevel: options.logLevel });
  logger.setLevel(config.logLevel);
  logger.setFormat(config.logFormat);

  const converter = new Converter({
    http: new HttpClient({ timeoutMs: config.httpTimeoutMs }),
    config,
  });

  const result = await converter.convert(archive, toConvertOptions(options));
  logger.info(`Markdown file wrote to ${result.markdownPath} successfully`, { images: result.imageCount });
  return result;
}

createProgram(handleConvertAction)
  .parseAsync()
  .catch((error: unknown) => {
    if (error instanceof ConversionError) {
      logger.error(error.message, error.details);
    } else {
      logger.error('Error while processing archive', {
        error: errorMessage(error),
        stack: error instanceof Error ? error.stack : undefined,
      });
    }
    process.exitCode = 1;
  });
