import { join, posix } from 'path';
import type { ImageReference } from '../models/entities.js';
import type { HttpFetcher } from '../http/httpClient.js';
import { atomicWriteFile } from '../fs/atomicWriter.js';
import { contentHash } from '../util/hash.js';
import { errorMessage } from '../util/errors.js';
import { logger } from '../util/logger.js';
import { joinOrigin } from '../util/url.js';
import type { ImageRegistry } from './imageRegistry.js';

const IMAGE_REGEX = /!\[([^\]]+)\]\(([^)]+)\)/g;

export interface ImageLocalizerOptions {
  http: HttpFetcher;
  /** Prefix for root-relative URLs such as `/media/foo.png`. */
  siteOrigin: string;
}

/**
 * Find `![alt](url)` references in document order.
 */
export function findImageReferences(markdown: string): ImageReference[] {
  return Array.from(markdown.matchAll(IMAGE_REGEX), (match) => ({
    markup: match[0],
    altText: match[1],
    url: match[2],
    index: match.index ?? 0,
  }));
}

/**
 * Absolute http(s) URLs are kept, root-relative ones are prefixed with the
 * site origin, anything else cannot be fetched.
 */
export function resolveImageUrl(url: string, siteOrigin: string): string | undefined {
  if (url.startsWith('http://') || url.startsWith('https://')) {
    return url;
  }
  if (url.startsWith('/')) {
    return joinOrigin(siteOrigin, url);
  }
  return undefined;
}

// Longer suffixes are not file extensions and could push the name past the
// file system's limit.
const MAX_EXTENSION_LENGTH = 10;

/**
 * Extension of the last path segment, dot included, or '' when it has none
 * or it is longer than ten characters.
 */
export function imageExtension(url: string): string {
  let pathname: string;
  try {
    pathname = new URL(url).pathname;
  } catch {
    pathname = url.split(/[?#]/)[0];
  }
  const lastSegment = pathname.slice(pathname.lastIndexOf('/') + 1);
  const extension = posix.extname(lastSegment);
  return extension.length > MAX_EXTENSION_LENGTH ? '' : extension;
}

/**
 * Downloads the remote images of a markdown fragment next to the document and
 * points the references at the local copies.
 *
 * A reference that cannot be resolved or downloaded is logged and left as it
 * was. Failing to write a downloaded image aborts the run.
 */
export class ImageLocalizer {
  private readonly http: HttpFetcher;
  private readonly siteOrigin: string;

  constructor(options: ImageLocalizerOptions) {
    this.http = options.http;
    this.siteOrigin = options.siteOrigin;
  }

  async localize(markdown: string, destinationDir: string, registry: ImageRegistry): Promise<string> {
    const references = findImageReferences(markdown);
    if (references.length === 0) {
      return markdown;
    }

    let result = '';
    let cursor = 0;

    // One at a time, left to right: the registry is read then written per image
    for (const reference of references) {
      result += markdown.slice(cursor, reference.index);
      result += await this.localizeReference(reference, destinationDir, registry);
      cursor = reference.index + reference.markup.length;
    }

    return result + markdown.slice(cursor);
  }

  private async localizeReference(
    reference: ImageReference,
    destinationDir: string,
    registry: ImageRegistry
  ): Promise<string> {
    const { altText } = reference;
    const url = resolveImageUrl(reference.url, this.siteOrigin);

    if (url === undefined) {
      logger.warn("Skipping image download, don't know where to fetch it", { alt: altText, url: reference.url });
      return reference.markup;
    }

    logger.info('Downloading image', { alt: altText, url });

    let content: Buffer;
    try {
      content = await this.http.getBuffer(url);
    } catch (error) {
      logger.warn('Unable to download image, skipping', { alt: altText, url, error: errorMessage(error) });
      return reference.markup;
    }

    const hash = contentHash(content);
    const known = registry.lookup(hash);

    if (known !== undefined) {
      logger.debug('Image already downloaded', { alt: altText, filename: known });
      return `![${altText}](${known})`;
    }

    const image = registry.register(hash, altText, imageExtension(url));
    await atomicWriteFile(join(destinationDir, image.filename), content, { ensureDir: false });

    return `![${altText}](${image.filename})`;
  }
}
