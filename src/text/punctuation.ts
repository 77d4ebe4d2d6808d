/**
 * Static punctuation and bracket tables used by the reflow engine.
 *
 * The sets are fixed, not user-configurable: every boundary heuristic in the
 * reflow engine is tuned against them.
 *
 * @module punctuation
 */

import { isWhitespace } from './cjk.js';

// ─────────────────────────────────────────────────────────────
// Dialogue quotes
// ─────────────────────────────────────────────────────────────

/** Dialogue openers (curly quotes, corner brackets, vertical corner brackets) */
export const DIALOGUE_OPENERS = '“‘「『﹁﹃';

/** Dialogue closers, index-aligned with {@link DIALOGUE_OPENERS} */
export const DIALOGUE_CLOSERS = '”’」』﹂﹄';

export const isDialogueOpener = (ch: string) => ch.length > 0 && DIALOGUE_OPENERS.includes(ch);

export const isDialogueCloser = (ch: string) => ch.length > 0 && DIALOGUE_CLOSERS.includes(ch);

/**
 * Returns true if the first non-whitespace character is a dialogue opener.
 */
export const beginsWithDialogueOpener = (s: string): boolean => {
    for (const ch of s) {
        if (!isWhitespace(ch)) {
            return isDialogueOpener(ch);
        }
    }
    return false;
};

// ─────────────────────────────────────────────────────────────
// Soft continuation punctuation
// ─────────────────────────────────────────────────────────────

const COMMA_LIKE = new Set(['，', ',', '、']);

export const isCommaLike = (ch: string) => COMMA_LIKE.has(ch);

export const containsAnyCommaLike = (s: string): boolean => {
    for (const ch of s) {
        if (COMMA_LIKE.has(ch)) {
            return true;
        }
    }
    return false;
};

export const isColonLike = (ch: string) => ch === '：' || ch === ':';

// ─────────────────────────────────────────────────────────────
// Sentence endings (two tiers)
// ─────────────────────────────────────────────────────────────

const STRONG_SENTENCE_END = new Set(['。', '！', '？', '!', '?']);

/** Tier 1: hard sentence enders, safe for "flush now". */
export const isStrongSentenceEnd = (ch: string) => STRONG_SENTENCE_END.has(ch);

export const containsStrongSentenceEnd = (s: string): boolean => {
    for (const ch of s) {
        if (STRONG_SENTENCE_END.has(ch)) {
            return true;
        }
    }
    return false;
};

// prettier-ignore
const CLAUSE_OR_END = new Set([
    '。', '！', '？', '；', '：', '…', '—',
    '”', '」', '’', '』',
    '）', '】', '》', '〗', '〕', '］', '｝', '＞', '〉', '>',
    '.', ')', ':', '!', '?',
]);

/** Tier 2: clause-or-end punctuation. Looser, not always a true sentence end. */
export const isClauseOrEndPunct = (ch: string) => CLAUSE_OR_END.has(ch);

/** Closers allowed directly after a strong ender, e.g. `。）`. */
export const isAllowedPostfixCloser = (ch: string) => ch === '）' || ch === ')';

// ─────────────────────────────────────────────────────────────
// Brackets
// ─────────────────────────────────────────────────────────────

export const BRACKET_PAIRS: ReadonlyMap<string, string> = new Map([
    ['（', '）'],
    ['(', ')'],
    ['[', ']'],
    ['［', '］'],
    ['{', '}'],
    ['｛', '｝'],
    ['<', '>'],
    ['＜', '＞'],
    ['〈', '〉'],
    ['【', '】'],
    ['《', '》'],
    ['〔', '〕'],
    ['〖', '〗'],
]);

const CLOSE_BRACKETS = new Set(BRACKET_PAIRS.values());

export const isBracketOpener = (ch: string) => BRACKET_PAIRS.has(ch);

export const isBracketCloser = (ch: string) => CLOSE_BRACKETS.has(ch);

export const isMatchingBracket = (open: string, close: string) => BRACKET_PAIRS.get(open) === close;

/**
 * Checks that a single bracket type is balanced within the span.
 * Unknown openers are ignored (treated as balanced).
 *
 * @example
 * isBracketTypeBalanced('【第一卷】', '【') // → true
 * isBracketTypeBalanced('【上】下】', '【') // → false
 */
export const isBracketTypeBalanced = (s: string, open: string): boolean => {
    const close = BRACKET_PAIRS.get(open);
    if (!close) {
        return true;
    }

    let depth = 0;
    for (const ch of s) {
        if (ch === open) {
            depth++;
        } else if (ch === close) {
            depth--;
            if (depth < 0) {
                return false;
            }
        }
    }
    return depth === 0;
};

/**
 * Returns true if the span contains any unclosed or mismatched bracket.
 *
 * A stray closer or a mismatched pair is treated as unsafe, same as an
 * opener that is never closed. Spans without any bracket are safe.
 *
 * If the previous paragraph buffer sits inside an unclosed bracket such as
 * "（......", the engine must not flush it on blank lines or sentence ends.
 */
export const hasUnclosedBracket = (s: string): boolean => {
    const stack: string[] = [];

    for (const ch of s) {
        if (isBracketOpener(ch)) {
            stack.push(ch);
            continue;
        }
        if (!isBracketCloser(ch)) {
            continue;
        }
        const open = stack.pop();
        if (open === undefined || !isMatchingBracket(open, ch)) {
            return true;
        }
    }

    return stack.length > 0;
};

// ─────────────────────────────────────────────────────────────
// Metadata separators
// ─────────────────────────────────────────────────────────────

// ASCII colon, full-width colon, ideographic space, middle dot, katakana middle dot
const METADATA_SEPARATORS = new Set([':', '：', '\u3000', '·', '・']);

export const isMetadataSeparator = (ch: string) => METADATA_SEPARATORS.has(ch);

// ─────────────────────────────────────────────────────────────
// Layout / visual dividers
// ─────────────────────────────────────────────────────────────

const ASCII_DIVIDER_CHARS = '-=_~～';
const STAR_DIVIDER_CHARS = '*＊★☆';

const isBoxDrawingChar = (ch: string) => {
    const c = ch.charCodeAt(0);
    return c >= 0x2500 && c <= 0x257f;
};

const isDividerChar = (ch: string) =>
    isBoxDrawingChar(ch) || ASCII_DIVIDER_CHARS.includes(ch) || STAR_DIVIDER_CHARS.includes(ch);

/**
 * Returns true if the line consists exclusively of box-drawing or divider
 * glyphs (ignoring whitespace), with at least `minVisualChars` of them.
 *
 * Meant to run on a probe string (indentation removed). Such lines are
 * hard layout boundaries.
 *
 * @example
 * isVisualDividerLine('──────')  // → true
 * isVisualDividerLine('* * *')   // → true
 * isVisualDividerLine('--')      // → false (too short)
 * isVisualDividerLine('---a---') // → false
 */
export const isVisualDividerLine = (s: string, minVisualChars = 3): boolean => {
    let visualCount = 0;

    for (const ch of s) {
        if (isWhitespace(ch)) {
            continue;
        }
        if (!isDividerChar(ch)) {
            return false;
        }
        visualCount++;
    }

    return visualCount >= minVisualChars;
};

// ─────────────────────────────────────────────────────────────
// Page markers
// ─────────────────────────────────────────────────────────────

/**
 * Checks for the literal page marker form `=== [Page X/Y] ===`
 * (any `=== ... ===` line qualifies).
 */
export const isPageMarkerLine = (s: string) => s.startsWith('=== ') && s.endsWith('===');

/**
 * Builds the page marker line inserted by the extraction driver.
 *
 * @example
 * formatPageMarker(3, 120) // → '=== [Page 3/120] ==='
 */
export const formatPageMarker = (page: number, total: number) => `=== [Page ${page}/${total}] ===`;

// ─────────────────────────────────────────────────────────────
// Tail scanning
// ─────────────────────────────────────────────────────────────

export type CharAt = { index: number; ch: string };

/**
 * Finds the last non-whitespace character of a span.
 *
 * @returns The UTF-16 index and character, or `null` for whitespace-only spans
 */
export const lastNonWhitespace = (s: string): CharAt | null => {
    for (let i = s.length - 1; i >= 0; i--) {
        if (!isWhitespace(s[i])) {
            return { ch: s[i], index: i };
        }
    }
    return null;
};

/**
 * Finds the last non-whitespace character strictly before `beforeIndex`.
 */
export const prevNonWhitespace = (s: string, beforeIndex: number): CharAt | null => {
    for (let i = Math.min(beforeIndex, s.length) - 1; i >= 0; i--) {
        if (!isWhitespace(s[i])) {
            return { ch: s[i], index: i };
        }
    }
    return null;
};

export const endsWithCommaLike = (s: string) => isCommaLike(lastNonWhitespace(s)?.ch ?? '');

export const endsWithColonLike = (s: string) => isColonLike(lastNonWhitespace(s)?.ch ?? '');

export const endsWithStrongSentenceEnd = (s: string) => isStrongSentenceEnd(lastNonWhitespace(s)?.ch ?? '');
