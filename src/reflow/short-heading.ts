import type { ShortHeadingSettings } from '../types/options.js';
import { isAllAscii, isAllAsciiDigits, isAllCjk, isMixedCjkAscii } from '../text/cjk.js';
import {
    containsAnyCommaLike,
    containsStrongSentenceEnd,
    hasUnclosedBracket,
    isClauseOrEndPunct,
    isColonLike,
    isPageMarkerLine,
    lastNonWhitespace,
} from '../text/punctuation.js';

export const MIN_HEADING_LEN = 3;
export const MAX_HEADING_LEN = 30;

export const DEFAULT_SHORT_HEADING_SETTINGS: Readonly<ShortHeadingSettings> = Object.freeze({
    allAscii: true,
    allAsciiDigits: true,
    allCjk: true,
    maxLen: 8,
    mixedCjkAscii: false,
});

const clamp = (value: number, min: number, max: number) => Math.min(max, Math.max(min, value));

/**
 * Clamps a heading length limit into 3–30. Non-finite values fall back to
 * the default.
 */
export const clampHeadingLength = (maxLen: number) =>
    Number.isFinite(maxLen)
        ? clamp(Math.round(maxLen), MIN_HEADING_LEN, MAX_HEADING_LEN)
        : DEFAULT_SHORT_HEADING_SETTINGS.maxLen;

export type ShortHeadingMatch = {
    /** Item-list lead-in such as `物品准备：` (all-CJK prefix + colon) */
    colonLeadIn: boolean;
    /** Every non-whitespace character is a CJK ideograph */
    allCjk: boolean;
};

/**
 * Decides whether a line looks like a short standalone heading, ignoring
 * any surrounding context.
 *
 * In order:
 * 1. page markers and lines with unclosed brackets are never headings
 * 2. an all-CJK prefix followed by a colon, within `maxLen`, is a heading
 * 3. clause-or-end endings, commas and strong enders anywhere reject
 * 4. the length limit is `maxLen`, doubled (clamped 10–30) for all-ASCII or
 *    mixed CJK/ASCII lines when that class is enabled
 * 5. at least one enabled pattern class must match
 *
 * @param line - Probe form of the line
 * @returns Match details, or `null` when the line is not a heading candidate
 *
 * @example
 * matchShortHeading('序', settings)          // → { colonLeadIn: false, allCjk: true }
 * matchShortHeading('物品准备：', settings)  // → { colonLeadIn: true, allCjk: false }
 * matchShortHeading('他走了。', settings)    // → null
 */
export const matchShortHeading = (line: string, settings: Readonly<ShortHeadingSettings>): ShortHeadingMatch | null => {
    const s = line.trim();
    if (!s || isPageMarkerLine(s) || hasUnclosedBracket(s)) {
        return null;
    }

    const last = lastNonWhitespace(s);
    if (!last) {
        return null;
    }

    const baseMax = clampHeadingLength(settings.maxLen);

    if (isColonLike(last.ch) && s.length <= baseMax && isAllCjk(s.slice(0, -1))) {
        return { allCjk: false, colonLeadIn: true };
    }

    if (isClauseOrEndPunct(last.ch) || containsAnyCommaLike(s)) {
        return null;
    }

    const allAscii = settings.allAscii && isAllAscii(s);
    const mixed = settings.mixedCjkAscii && isMixedCjkAscii(s);
    const effectiveMax = allAscii || mixed ? clamp(baseMax * 2, 10, 30) : baseMax;

    if (s.length > effectiveMax || containsStrongSentenceEnd(s)) {
        return null;
    }

    const allCjk = isAllCjk(s, true);
    const matches = allAscii || (settings.allCjk && isAllCjk(s)) || (settings.allAsciiDigits && isAllAsciiDigits(s)) || mixed;

    return matches ? { allCjk, colonLeadIn: false } : null;
};

export const isShortHeadingCandidate = (line: string, settings: Readonly<ShortHeadingSettings>) =>
    matchShortHeading(line, settings) !== null;

