/**
 * Normalizes line endings to Unix-style (`\n`).
 *
 * Converts Windows (`\r\n`) and old Mac (`\r`) line endings to Unix style
 * for consistent line splitting across platforms.
 *
 * @param content - Raw content with potentially mixed line endings
 * @returns Content with all line endings normalized to `\n`
 */
// OPTIMIZATION: Fast-path when no \r present (common case for Unix/Mac content)
export const normalizeLineEndings = (content: string) => {
    return content.includes('\r') ? content.replace(/\r\n?/g, '\n') : content;
};

const LEADING_INDENT = /^[\s\u3000]{2,}/;
const LEADING_HALF_WIDTH_SPACES = /^ +/;
const LEADING_PROBE_WHITESPACE = /^[ \u3000]+/;

/**
 * Output form of a line: trailing whitespace removed, leading half-width
 * spaces removed, full-width (U+3000) indentation kept.
 *
 * @example
 * toStrippedLine('  　　他說。  ') // → '　　他說。'
 */
export const toStrippedLine = (raw: string) => raw.trimEnd().replace(LEADING_HALF_WIDTH_SPACES, '');

/**
 * Classification form of a line: leading half-width and ideographic spaces
 * removed. Never used for output.
 *
 * @example
 * toProbe('　　第一章') // → '第一章'
 */
export const toProbe = (stripped: string) => stripped.replace(LEADING_PROBE_WHITESPACE, '');

/**
 * Returns true when the raw line starts with at least two indentation
 * characters (any whitespace, including U+3000).
 */
export const hasLeadingIndent = (raw: string) => LEADING_INDENT.test(raw);

/**
 * Collapses whitespace runs into single spaces and trims the result.
 *
 * @example
 * collapseWhitespace('  CONFIDENTIAL\t DRAFT ') // → 'CONFIDENTIAL DRAFT'
 */
export const collapseWhitespace = (s: string) => s.replace(/\s+/g, ' ').trim();
