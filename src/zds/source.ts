import { readFile } from 'fs/promises';
import { dirname, resolve } from 'path';
import type { PageMetadata } from '../models/entities.js';
import type { HttpFetcher } from '../http/httpClient.js';
import { ConversionError, errorMessage } from '../util/errors.js';
import { logger } from '../util/logger.js';
import { joinOrigin } from '../util/url.js';
import { emptyMetadata, parsePageMetadata } from './pageMetadata.js';

export interface ContentSource {
  archive: Buffer;
  metadata: PageMetadata;
  /** Page URL, when converted from the published page. */
  canonical?: string;
  /** Where the page directory goes when no destination is given. */
  defaultOutputRoot: string;
}

export function isRemoteSource(input: string): boolean {
  return input.startsWith('http://') || input.startsWith('https://');
}

/**
 * Only pages of the configured site are accepted, over either scheme.
 */
export function validateContentUrl(url: string, siteOrigin: string): void {
  const { host } = new URL(siteOrigin);
  if (!url.startsWith(`http://${host}/`) && !url.startsWith(`https://${host}/`)) {
    throw new ConversionError(`Invalid URL, only ${host} URLs are accepted`, { url });
  }
}

export function resolveSiteUrl(link: string, siteOrigin: string): string {
  return link.startsWith('/') ? joinOrigin(siteOrigin, link) : link;
}

async function loadRemoteSource(url: string, http: HttpFetcher, siteOrigin: string): Promise<ContentSource> {
  validateContentUrl(url, siteOrigin);

  logger.info('Downloading archive and metadata', { url });

  let html: string;
  try {
    html = await http.getText(url);
  } catch (error) {
    throw new ConversionError(`Cannot download content page: ${errorMessage(error)}`, { url });
  }

  logger.info('Retrieving metadata');
  const metadata = parsePageMetadata(html);

  if (!metadata.downloadLink) {
    throw new ConversionError(
      'Cannot find the download link on the page. Maybe it was not generated by Zeste de Savoir?',
      { url }
    );
  }

  const downloadUrl = resolveSiteUrl(metadata.downloadLink, siteOrigin);
  logger.info('Downloading content archive', { url: downloadUrl });

  let archive: Buffer;
  try {
    archive = await http.getBuffer(downloadUrl);
  } catch (error) {
    throw new ConversionError(`Cannot download content archive: ${errorMessage(error)}`, { url: downloadUrl });
  }

  return {
    archive,
    metadata,
    canonical: url,
    defaultOutputRoot: process.cwd(),
  };
}

async function loadLocalSource(path: string): Promise<ContentSource> {
  const absolutePath = resolve(path);

  let archive: Buffer;
  try {
    archive = await readFile(absolutePath);
  } catch (error) {
    throw new ConversionError(`Cannot read archive: ${errorMessage(error)}`, { path: absolutePath });
  }

  return {
    archive,
    metadata: emptyMetadata(),
    defaultOutputRoot: dirname(absolutePath),
  };
}

/**
 * Get the archive bytes from a page URL or a local file. Only the page
 * carries authors, categories, tags and date; a local archive yields empty
 * metadata.
 */
export async function loadSource(input: string, http: HttpFetcher, siteOrigin: string): Promise<ContentSource> {
  return isRemoteSource(input)
    ? loadRemoteSource(input, http, siteOrigin)
    : loadLocalSource(input);
}
