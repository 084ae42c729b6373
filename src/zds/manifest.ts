import type { ContentType, Manifest, ManifestChild } from '../models/entities.js';
import { ConversionError, errorMessage } from '../util/errors.js';

export const SUPPORTED_MANIFEST_VERSION = 2;
export const SUPPORTED_CONTENT_TYPES: readonly ContentType[] = ['ARTICLE', 'OPINION'];

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isContentType(value: unknown): value is ContentType {
  return SUPPORTED_CONTENT_TYPES.some((type) => type === value);
}

function optionalString(data: JsonObject, key: string): string | undefined {
  const value = data[key];
  return typeof value === 'string' ? value : undefined;
}

function parseChildren(value: unknown): ManifestChild[] | undefined {
  if (!Array.isArray(value)) return undefined;

  return value.filter(isObject).map((child) => ({
    object: optionalString(child, 'object') ?? '',
    title: optionalString(child, 'title') ?? '',
    text: optionalString(child, 'text'),
    slug: optionalString(child, 'slug'),
  }));
}

/**
 * Check a decoded `manifest.json` and keep the fields the converter reads.
 * Only version 2 manifests of articles and opinions are accepted.
 */
export function validateManifest(data: unknown): Manifest {
  if (!isObject(data)) {
    throw new ConversionError('Manifest must be a JSON object');
  }

  const { version, type } = data;

  if (typeof version !== 'number') {
    throw new ConversionError('Manifest has no version');
  }
  if (version < SUPPORTED_MANIFEST_VERSION) {
    throw new ConversionError(
      `Unsupported manifest version ${version} (only version ${SUPPORTED_MANIFEST_VERSION} is supported)`
    );
  }
  if (!isContentType(type)) {
    throw new ConversionError(
      `Unsupported content type ${String(type)} (only articles and opinions are supported at the moment)`
    );
  }

  return {
    version,
    type,
    title: optionalString(data, 'title'),
    slug: optionalString(data, 'slug'),
    description: optionalString(data, 'description'),
    licence: optionalString(data, 'licence'),
    introduction: optionalString(data, 'introduction'),
    conclusion: optionalString(data, 'conclusion'),
    children: parseChildren(data.children),
  };
}

export function parseManifest(raw: string): Manifest {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    throw new ConversionError(`manifest.json is not valid JSON: ${errorMessage(error)}`);
  }
  return validateManifest(data);
}
