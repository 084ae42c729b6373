import { load } from 'cheerio';
import type { PageMetadata } from '../models/entities.js';

export function emptyMetadata(): PageMetadata {
  return { authors: [], categories: [], tags: [] };
}

/**
 * Scrape what the archive does not carry (authors, categories, tags,
 * publication date) plus the archive download link from a published
 * article or opinion page.
 */
export function parsePageMetadata(html: string): PageMetadata {
  const $ = load(html);
  const metadata = emptyMetadata();

  const downloadLink = $('aside.sidebar').first().find('a.download').first().attr('href');
  if (downloadLink) {
    metadata.downloadLink = downloadLink;
  }

  metadata.tags = $('ul.taglist')
    .first()
    .find('li')
    .map((_, li) => $(li).text().trim())
    .get();

  const header = $('article.content-wrapper').first().find('header').first();

  // First list: authors, second list: categories
  const lists = header.find('div.authors').first().find('ul');

  metadata.authors = lists
    .eq(0)
    .find('li')
    .map((_, li) => $(li).find('a span').first().text().trim())
    .get()
    .filter((author) => author.length > 0);

  metadata.categories = lists
    .eq(1)
    .find('a')
    .map((_, a) => $(a).text().trim())
    .get();

  const publishedAt = header.find('span.pubdate').first().find('time').first().attr('datetime');
  if (publishedAt) {
    metadata.publishedAt = publishedAt;
  }

  return metadata;
}
