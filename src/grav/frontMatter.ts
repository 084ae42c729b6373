import { stringify } from 'yaml';
import type { Manifest, PageMetadata } from '../models/entities.js';

export interface GravTaxonomy {
  author: string[];
  category: string[];
  tag: string[];
}

export interface FrontMatter {
  title: string;
  abstract: string;
  taxonomy: GravTaxonomy;
  date?: string;
  license?: string;
  canonical?: string;
}

const ISO_DATE_REGEX = /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2}))?/;

/**
 * Grav `date` header, `HH:mm dd-MM-yyyy`, read in the timezone the
 * timestamp was written in. A date without time is midnight.
 */
export function formatGravDate(iso: string): string | undefined {
  const match = ISO_DATE_REGEX.exec(iso.trim());
  if (!match) return undefined;

  const [, year, month, day, hours = '00', minutes = '00'] = match;
  return `${hours}:${minutes} ${day}-${month}-${year}`;
}

/**
 * Creative Commons licences only: `CC BY-SA` -> `by-sa`.
 */
export function gravLicense(licence: string | undefined): string | undefined {
  if (!licence || !licence.startsWith('CC')) return undefined;
  return licence.toLowerCase().replaceAll('cc ', '');
}

export function buildFrontMatter(manifest: Manifest, metadata: PageMetadata, canonical?: string): FrontMatter {
  const frontMatter: FrontMatter = {
    title: manifest.title ?? `Unnamed ${manifest.type.toLowerCase()}`,
    abstract: manifest.description ?? '',
    taxonomy: {
      author: metadata.authors,
      category: metadata.categories,
      tag: metadata.tags,
    },
  };

  const date = metadata.publishedAt ? formatGravDate(metadata.publishedAt) : undefined;
  if (date) frontMatter.date = date;

  const license = gravLicense(manifest.licence);
  if (license) frontMatter.license = license;

  if (canonical) frontMatter.canonical = canonical;

  return frontMatter;
}

export function renderFrontMatter(frontMatter: FrontMatter): string {
  const yaml = stringify(frontMatter, { indent: 4, indentSeq: false, sortMapEntries: true });
  return `---\n${yaml}---\n\n`;
}
