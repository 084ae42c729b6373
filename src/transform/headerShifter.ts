import type { HeaderLevel } from '../models/entities.js';

/**
 * Demotes every markdown heading by one level, so a fragment can sit under a
 * heading supplied by the surrounding document.
 *
 * Works on raw text with line-anchored patterns, not on a parse tree: a
 * pattern's left boundary is the start of the text or a line break, its right
 * boundary a line break or the end of the text, and both are kept verbatim.
 * The right boundary is only looked at, so adjacent headings all match.
 *
 * Fenced code is not special-cased: a `# comment` line inside a fence is
 * shifted like any other heading.
 */

// Deepest first, otherwise a freshly written `## ` would be picked up again
// by the level 2 pass.
const ATX_LEVELS: readonly HeaderLevel[] = [5, 4, 3, 2, 1];

const ATX_PATTERNS = ATX_LEVELS.map((level) => ({
  replacement: `$1${'#'.repeat(level + 1)} $2`,
  pattern: new RegExp(`(^|\\r?\\n)${'#'.repeat(level)} ([^\\n]+?)(?=\\r?\\n|$)`, 'g'),
}));

const SETEXT_LEVEL_2 = /(^|\r?\n)([^\n]+?)\r?\n-{2,}(?=\r?\n|$)/g;
const SETEXT_LEVEL_1 = /(^|\r?\n)([^\n]+?)(\r?\n)(={2,})(?=\r?\n|$)/g;

/**
 * Shift headings one level down: `#` -> `##`, ..., `#####` -> `######`.
 * `######` stays as is. Setext level 2 becomes ATX `###`; setext level 1
 * becomes setext level 2 with an underline of the same length.
 *
 * Not idempotent: every call demotes once more.
 */
export function shiftHeaders(markdown: string): string {
  let shifted = markdown;

  for (const { pattern, replacement } of ATX_PATTERNS) {
    shifted = shifted.replace(pattern, replacement);
  }

  shifted = shifted.replace(SETEXT_LEVEL_2, '$1### $2');
  shifted = shifted.replace(
    SETEXT_LEVEL_1,
    (_match: string, boundary: string, text: string, lineBreak: string, underline: string) =>
      `${boundary}${text}${lineBreak}${'-'.repeat(underline.length)}`
  );

  return shifted;
}
