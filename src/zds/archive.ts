import JSZip from 'jszip';
import type { Manifest } from '../models/entities.js';
import { ConversionError, errorMessage } from '../util/errors.js';
import { parseManifest } from './manifest.js';

export const MANIFEST_ENTRY = 'manifest.json';

/**
 * Read access to a content export: `manifest.json` plus the markdown
 * fragments it points at.
 */
export class ContentArchive {
  private constructor(private readonly zip: JSZip) {}

  static async open(data: Buffer): Promise<ContentArchive> {
    try {
      return new ContentArchive(await JSZip.loadAsync(data));
    } catch (error) {
      throw new ConversionError(`Not a readable content archive: ${errorMessage(error)}`);
    }
  }

  async readManifest(): Promise<Manifest> {
    return parseManifest(await this.readText(MANIFEST_ENTRY));
  }

  /**
   * Fragment text with line endings normalized to `\n` and outer whitespace
   * trimmed.
   */
  async readFragment(path: string): Promise<string> {
    const text = await this.readText(path);
    return text.replace(/\r\n?/g, '\n').trim();
  }

  private async readText(path: string): Promise<string> {
    const entry = this.zip.file(path);
    if (entry === null) {
      throw new ConversionError(`Archive entry not found: ${path}`);
    }
    return entry.async('string');
  }
}
