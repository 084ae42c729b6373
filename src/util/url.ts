/**
 * Prefix a root-relative path with an origin, tolerating a trailing slash on
 * the origin.
 */
export function joinOrigin(origin: string, rootRelativePath: string): string {
  return `${origin.replace(/\/+$/, '')}${rootRelativePath}`;
}
