const COMBINING_MARKS_REGEX = /[\u0300-\u036f]/g;
const NON_ALPHANUMERIC_REGEX = /[^a-z0-9]+/g;
const EDGE_HYPHENS_REGEX = /^-+|-+$/g;

export interface SlugifyOptions {
  maxLength?: number;
  /** Returned when nothing survives normalization. */
  fallback?: string;
}

/**
 * Generate a lower-case, ASCII-only, filesystem-friendly slug.
 * - NFKD normalize and drop combining marks (é -> e)
 * - Lowercase
 * - Every run of characters outside [a-z0-9] becomes a single '-'
 * - Trim leading/trailing '-'
 * - Truncate to maxLength, at a word boundary when one is close enough
 */
export function slugify(text: string, opts: SlugifyOptions = {}): string {
  const maxLength = opts.maxLength ?? 80;
  const fallback = opts.fallback ?? 'untitled';

  let s = text.normalize('NFKD').replace(COMBINING_MARKS_REGEX, '').toLowerCase();
  s = s.replace(NON_ALPHANUMERIC_REGEX, '-');
  s = s.replace(EDGE_HYPHENS_REGEX, '');

  if (s.length > maxLength) {
    const softLimit = Math.floor(maxLength * 0.95);
    const cutIndex = s.lastIndexOf('-', softLimit);
    s = cutIndex > 20 ? s.slice(0, cutIndex) : s.slice(0, maxLength);
    s = s.replace(EDGE_HYPHENS_REGEX, '');
  }

  return s || fallback;
}

/**
 * Hands out slugs that are unique for the lifetime of the instance.
 * The first use of a base slug gets it as is; later collisions get
 * `-1`, `-2`, ... in order of first encounter.
 */
export class UniqueSlugger {
  private readonly issued = new Set<string>();

  constructor(private readonly options: SlugifyOptions = {}) {}

  next(text: string): string {
    const base = slugify(text, this.options);
    let candidate = base;
    let counter = 0;

    while (this.issued.has(candidate)) {
      counter++;
      candidate = `${base}-${counter}`;
    }

    this.issued.add(candidate);
    return candidate;
  }

  has(slug: string): boolean {
    return this.issued.has(slug);
  }

  get size(): number {
    return this.issued.size;
  }
}
