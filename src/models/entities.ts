// Core domain & DTO interfaces

/** 1 is the most prominent heading. */
export type HeaderLevel = 1 | 2 | 3 | 4 | 5 | 6;

export interface ImageReference {
  altText: string;
  url: string;
  /** Full `![alt](url)` markup as found in the fragment. */
  markup: string;
  /** Offset of the markup in the fragment text. */
  index: number;
}

export interface DownloadedImage {
  hash: string; // SHA-256 hex of the raw bytes
  filename: string; // bare name inside the destination directory
}

export type ContentType = 'ARTICLE' | 'OPINION';

export interface ManifestChild {
  object: string; // 'extract' | 'container' | ...
  title: string;
  text?: string; // archive path of the extract body
  slug?: string;
}

/** Shape of `manifest.json` inside a content archive (version 2). */
export interface Manifest {
  version: number;
  type: ContentType;
  title?: string;
  slug?: string;
  description?: string;
  licence?: string;
  introduction?: string;
  conclusion?: string;
  children?: ManifestChild[];
}

/** Metadata that only the published page carries. */
export interface PageMetadata {
  authors: string[];
  categories: string[];
  tags: string[];
  /** Raw `datetime` attribute of the publication date, ISO 8601. */
  publishedAt?: string;
  downloadLink?: string;
}

export interface ConvertOptions {
  templateName: string;
  lang?: string;
  slug?: string;
  /** Parent of the page directory; defaults depend on the source. */
  to?: string;
}

export interface ConversionResult {
  markdownPath: string;
  outputDir: string;
  imageCount: number;
}
