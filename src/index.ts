/**
 * Zeste de Savoir to Grav converter: library entry point.
 */

export { shiftHeaders } from './transform/headerShifter.js';
export {
  ImageLocalizer,
  findImageReferences,
  imageExtension,
  resolveImageUrl,
  type ImageLocalizerOptions,
} from './transform/imageLocalizer.js';
export { ImageRegistry } from './transform/imageRegistry.js';
export { Converter, markdownFilename, type ConverterDeps } from './core/converter.js';
export { HttpClient, type HttpClientConfig, type HttpFetcher } from './http/httpClient.js';
export { ContentArchive } from './zds/archive.js';
export { parseManifest, validateManifest } from './zds/manifest.js';
export { parsePageMetadata } from './zds/pageMetadata.js';
export { loadSource, type ContentSource } from './zds/source.js';
export { buildFrontMatter, renderFrontMatter, type FrontMatter } from './grav/frontMatter.js';
export { buildConfig, loadEnvironment, DEFAULT_SITE_ORIGIN, type AppConfig } from './util/config.js';
export { slugify, UniqueSlugger } from './util/slugify.js';
export { ConversionError } from './util/errors.js';
export { logger, Logger } from './util/logger.js';
export type * from './models/entities.js';
