import { join, resolve } from 'path';
import type { ConversionResult, ConvertOptions, Manifest } from '../models/entities.js';
import type { HttpFetcher } from '../http/httpClient.js';
import type { AppConfig } from '../util/config.js';
import { atomicWriteFile, ensureDirectory } from '../fs/atomicWriter.js';
import { buildFrontMatter, renderFrontMatter } from '../grav/frontMatter.js';
import { shiftHeaders } from '../transform/headerShifter.js';
import { ImageLocalizer } from '../transform/imageLocalizer.js';
import { ImageRegistry } from '../transform/imageRegistry.js';
import { ContentArchive } from '../zds/archive.js';
import { loadSource, type ContentSource } from '../zds/source.js';
import { logger } from '../util/logger.js';

export const EXTRACT_SEPARATOR = '\n\n\n';
export const CONCLUSION_SEPARATOR = '\n\n\n------\n\n\n';

export interface ConverterDeps {
  http: HttpFetcher;
  config: Pick<AppConfig, 'siteOrigin'>;
  now?: () => Date;
}

export function markdownFilename(templateName: string, lang?: string): string {
  return `${templateName}${lang ? `.${lang}` : ''}.md`;
}

/**
 * Turns a content export into a Grav page directory: one markdown file with
 * front matter, plus the images it embeds.
 */
export class Converter {
  private readonly http: HttpFetcher;
  private readonly siteOrigin: string;
  private readonly now: () => Date;
  private readonly localizer: ImageLocalizer;

  constructor(deps: ConverterDeps) {
    this.http = deps.http;
    this.siteOrigin = deps.config.siteOrigin;
    this.now = deps.now ?? (() => new Date());
    this.localizer = new ImageLocalizer({ http: this.http, siteOrigin: this.siteOrigin });
  }

  /**
   * @param input page URL or path to a downloaded archive
   */
  async convert(input: string, options: ConvertOptions): Promise<ConversionResult> {
    const source = await loadSource(input, this.http, this.siteOrigin);
    return this.convertSource(source, options);
  }

  async convertSource(source: ContentSource, options: ConvertOptions): Promise<ConversionResult> {
    const archive = await ContentArchive.open(source.archive);
    const manifest = await archive.readManifest();

    const slug = options.slug || manifest.slug || `unnamed-content-${Math.floor(this.now().getTime() / 1000)}`;
    const outputDir = join(resolve(options.to ?? source.defaultOutputRoot), slug);
    await ensureDirectory(outputDir);

    // Images are deduplicated across every fragment of this run only
    const registry = new ImageRegistry();
    const body = await this.buildBody(archive, manifest, outputDir, registry);

    const frontMatter = buildFrontMatter(manifest, source.metadata, source.canonical);
    const markdownPath = join(outputDir, markdownFilename(options.templateName, options.lang));

    await atomicWriteFile(markdownPath, renderFrontMatter(frontMatter) + body.trim());

    logger.info('Markdown file written', { path: markdownPath, images: registry.size });

    return { markdownPath, outputDir, imageCount: registry.size };
  }

  private async buildBody(
    archive: ContentArchive,
    manifest: Manifest,
    outputDir: string,
    registry: ImageRegistry
  ): Promise<string> {
    let markdown = '';

    if (manifest.introduction) {
      const introduction = await archive.readFragment(manifest.introduction);
      markdown = await this.localizer.localize(introduction, outputDir, registry);
    }

    for (const child of manifest.children ?? []) {
      if (child.object !== 'extract') continue;

      if (!child.text) {
        logger.warn('Extract without text, skipping', { title: child.title });
        continue;
      }

      // Extract bodies sit under their own `# title`, hence the shift
      const extract = shiftHeaders(await archive.readFragment(child.text));
      markdown += EXTRACT_SEPARATOR;
      markdown += `# ${child.title}\n\n`;
      markdown += await this.localizer.localize(extract, outputDir, registry);
    }

    if (manifest.conclusion) {
      const conclusion = await archive.readFragment(manifest.conclusion);
      markdown += CONCLUSION_SEPARATOR;
      markdown += await this.localizer.localize(conclusion, outputDir, registry);
    }

    return markdown;
  }
}
