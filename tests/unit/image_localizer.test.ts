import { mkdtemp, readdir, readFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join, resolve } from 'path';
import {
  ImageLocalizer,
  findImageReferences,
  imageExtension,
  resolveImageUrl,
} from '../../src/transform/imageLocalizer';
import { ImageRegistry } from '../../src/transform/imageRegistry';
import { logger } from '../../src/util/logger';
import { FakeHttp, JPG_C, PNG_A, PNG_B } from '../fixtures/fakeHttp';

const ORIGIN = 'https://zestedesavoir.com';

describe('Unit: image localization', () => {
  describe('findImageReferences', () => {
    it('finds references in document order', () => {
      const text = 'a ![One](https://x.test/1.png) b ![Two](/media/2.jpg)';
      expect(findImageReferences(text)).toEqual([
        { markup: '![One](https://x.test/1.png)', altText: 'One', url: 'https://x.test/1.png', index: 2 },
        { markup: '![Two](/media/2.jpg)', altText: 'Two', url: '/media/2.jpg', index: 33 },
      ]);
    });

    it('ignores links and images without alt text', () => {
      expect(findImageReferences('[link](https://x.test) ![](https://x.test/a.png)')).toEqual([]);
    });
  });

  describe('resolveImageUrl', () => {
    it('keeps absolute http and https URLs', () => {
      expect(resolveImageUrl('https://cdn.test/a.png', ORIGIN)).toBe('https://cdn.test/a.png');
      expect(resolveImageUrl('http://cdn.test/a.png', ORIGIN)).toBe('http://cdn.test/a.png');
    });

    it('prefixes root-relative URLs with the site origin', () => {
      expect(resolveImageUrl('/media/foo.png', ORIGIN)).toBe('https://zestedesavoir.com/media/foo.png');
      expect(resolveImageUrl('/media/foo.png', `${ORIGIN}/`)).toBe('https://zestedesavoir.com/media/foo.png');
    });

    it('cannot resolve other relative URLs', () => {
      expect(resolveImageUrl('images/foo.png', ORIGIN)).toBeUndefined();
      expect(resolveImageUrl('data:image/png;base64,AAAA', ORIGIN)).toBeUndefined();
    });
  });

  describe('imageExtension', () => {
    it('takes the extension of the last path segment', () => {
      expect(imageExtension('https://x.test/media/galleries/12/logo.png')).toBe('.png');
      expect(imageExtension('https://x.test/a.b/photo.JPEG')).toBe('.JPEG');
    });

    it('ignores query strings and fragments', () => {
      expect(imageExtension('https://x.test/logo.svg?v=3#top')).toBe('.svg');
    });

    it('returns an empty extension when there is none', () => {
      expect(imageExtension('https://x.test/avatar')).toBe('');
      expect(imageExtension('https://x.test.example')).toBe('');
    });

    it('drops suffixes too long to be an extension', () => {
      expect(imageExtension('https://x.test/photo.webp')).toBe('.webp');
      expect(imageExtension('https://x.test/shot.abcdefghi')).toBe('.abcdefghi');
      expect(imageExtension('https://x.test/shot.abcdefghij')).toBe('');
      expect(imageExtension(`https://x.test/v1.${'a'.repeat(300)}`)).toBe('');
    });
  });

  describe('ImageLocalizer.localize', () => {
    let tempDir: string;
    let warnSpy: jest.SpyInstance;

    beforeEach(async () => {
      tempDir = await mkdtemp(resolve(tmpdir(), 'zds-images-'));
      warnSpy = jest.spyOn(logger, 'warn').mockImplementation(() => undefined);
      jest.spyOn(logger, 'info').mockImplementation(() => undefined);
    });

    afterEach(async () => {
      jest.restoreAllMocks();
      await rm(tempDir, { recursive: true, force: true });
    });

    it('downloads an image and rewrites the reference to the bare filename', async () => {
      const http = new FakeHttp().serve('https://zestedesavoir.com/media/logo.png', PNG_A);
      const localizer = new ImageLocalizer({ http, siteOrigin: ORIGIN });

      const result = await localizer.localize('Intro ![Le logo](/media/logo.png) end', tempDir, new ImageRegistry());

      expect(result).toBe('Intro ![Le logo](le-logo.png) end');
      expect(http.requests).toEqual(['https://zestedesavoir.com/media/logo.png']);
      expect(await readFile(join(tempDir, 'le-logo.png'))).toEqual(PNG_A);
    });

    it('stores an image whose URL ends in a long suffix without an extension', async () => {
      const url = `https://a.test/render.${'x'.repeat(300)}`;
      const http = new FakeHttp().serve(url, PNG_A);
      const localizer = new ImageLocalizer({ http, siteOrigin: ORIGIN });

      const result = await localizer.localize(`![Rendu](${url})`, tempDir, new ImageRegistry());

      expect(result).toBe('![Rendu](rendu)');
      expect(await readdir(tempDir)).toEqual(['rendu']);
    });

    it('stores byte-identical images once and keeps each alt text', async () => {
      const http = new FakeHttp()
        .serve('https://a.test/one.png', PNG_A)
        .serve('https://b.test/copy.png', PNG_A);
      const localizer = new ImageLocalizer({ http, siteOrigin: ORIGIN });
      const registry = new ImageRegistry();

      const result = await localizer.localize(
        '![First](https://a.test/one.png)\n![Again](https://b.test/copy.png)',
        tempDir,
        registry
      );

      expect(result).toBe('![First](first.png)\n![Again](first.png)');
      expect(await readdir(tempDir)).toEqual(['first.png']);
      expect(registry.size).toBe(1);
    });

    it('shares the registry across fragments of a run', async () => {
      const http = new FakeHttp().serve('https://a.test/one.png', PNG_A);
      const localizer = new ImageLocalizer({ http, siteOrigin: ORIGIN });
      const registry = new ImageRegistry();

      const first = await localizer.localize('![Intro](https://a.test/one.png)', tempDir, registry);
      const second = await localizer.localize('![Conclusion](https://a.test/one.png)', tempDir, registry);

      expect(first).toBe('![Intro](intro.png)');
      expect(second).toBe('![Conclusion](intro.png)');
      expect(await readdir(tempDir)).toEqual(['intro.png']);
    });

    it('gives distinct images with the same alt text distinct filenames', async () => {
      const http = new FakeHttp()
        .serve('https://a.test/1.png', PNG_A)
        .serve('https://a.test/2.png', PNG_B)
        .serve('https://a.test/3.jpg', JPG_C);
      const localizer = new ImageLocalizer({ http, siteOrigin: ORIGIN });

      const result = await localizer.localize(
        '![Schema](https://a.test/1.png) ![Schema](https://a.test/2.png) ![Schéma](https://a.test/3.jpg)',
        tempDir,
        new ImageRegistry()
      );

      expect(result).toBe('![Schema](schema.png) ![Schema](schema-1.png) ![Schéma](schema-2.jpg)');
      expect((await readdir(tempDir)).sort()).toEqual(['schema-1.png', 'schema-2.jpg', 'schema.png']);
      expect(await readFile(join(tempDir, 'schema-1.png'))).toEqual(PNG_B);
    });

    it('leaves a reference untouched when the download fails and carries on', async () => {
      const http = new FakeHttp().serve('https://a.test/ok.png', PNG_A);
      const localizer = new ImageLocalizer({ http, siteOrigin: ORIGIN });

      const result = await localizer.localize(
        '![Broken](https://a.test/missing.png) and ![Fine](https://a.test/ok.png)',
        tempDir,
        new ImageRegistry()
      );

      expect(result).toBe('![Broken](https://a.test/missing.png) and ![Fine](fine.png)');
      expect(await readdir(tempDir)).toEqual(['fine.png']);
      expect(warnSpy).toHaveBeenCalledWith('Unable to download image, skipping', {
        alt: 'Broken',
        url: 'https://a.test/missing.png',
        error: 'Request failed with status code 404',
      });
    });

    it('does not fetch references it cannot resolve', async () => {
      const http = new FakeHttp();
      const localizer = new ImageLocalizer({ http, siteOrigin: ORIGIN });

      const text = 'See ![Local](images/local.png).';
      const result = await localizer.localize(text, tempDir, new ImageRegistry());

      expect(result).toBe(text);
      expect(http.requests).toEqual([]);
      expect(warnSpy).toHaveBeenCalledWith("Skipping image download, don't know where to fetch it", {
        alt: 'Local',
        url: 'images/local.png',
      });
    });

    it('returns text without images as is', async () => {
      const http = new FakeHttp();
      const localizer = new ImageLocalizer({ http, siteOrigin: ORIGIN });

      expect(await localizer.localize('No images here.', tempDir, new ImageRegistry())).toBe('No images here.');
      expect(http.requests).toEqual([]);
    });

    it('propagates write failures', async () => {
      jest.spyOn(logger, 'error').mockImplementation(() => undefined);
      const http = new FakeHttp().serve('https://a.test/one.png', PNG_A);
      const localizer = new ImageLocalizer({ http, siteOrigin: ORIGIN });

      await expect(
        localizer.localize('![One](https://a.test/one.png)', join(tempDir, 'missing-dir'), new ImageRegistry())
      ).rejects.toThrow();
    });
  });
});
