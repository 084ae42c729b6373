import type { DownloadedImage } from '../models/entities.js';
import { UniqueSlugger, type SlugifyOptions } from '../util/slugify.js';

/**
 * Content hash -> local filename for one conversion run.
 *
 * Shared by every fragment of the run so that byte-identical images land in
 * a single file whatever alt text or fragment referenced them. Also owns the
 * filename uniqueness state. Create one per run; never share across runs.
 */
export class ImageRegistry {
  private readonly filenames = new Map<string, string>();
  private readonly slugger: UniqueSlugger;

  constructor(slugOptions: SlugifyOptions = {}) {
    this.slugger = new UniqueSlugger({ fallback: 'image', ...slugOptions });
  }

  lookup(hash: string): string | undefined {
    return this.filenames.get(hash);
  }

  /**
   * Assign a filename to `hash` unless it already has one. Check and insert
   * happen together, so callers that go concurrent must keep it that way.
   */
  register(hash: string, altText: string, extension: string): DownloadedImage {
    const existing = this.filenames.get(hash);
    if (existing !== undefined) {
      return { hash, filename: existing };
    }

    const filename = `${this.slugger.next(altText)}${extension}`;
    this.filenames.set(hash, filename);
    return { hash, filename };
  }

  get size(): number {
    return this.filenames.size;
  }

  entries(): DownloadedImage[] {
    return Array.from(this.filenames, ([hash, filename]) => ({ hash, filename }));
  }
}
