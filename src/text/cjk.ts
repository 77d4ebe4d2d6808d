/**
 * Character classification for CJK reflow heuristics.
 *
 * These predicates are intentionally BMP-focused: they exist to drive
 * paragraph reconstruction, not to provide full Unicode script detection.
 * Every predicate is total - unexpected input (lone surrogates, control
 * characters, empty strings) simply classifies as "not CJK".
 *
 * @module cjk
 */

// ─────────────────────────────────────────────────────────────
// Single characters
// ─────────────────────────────────────────────────────────────

const WHITESPACE = /\s/u;
const ASCII_LETTER = /[A-Za-z]/;
const ASCII_ALNUM = /[A-Za-z0-9]/;

/**
 * Checks whether a character is whitespace (ASCII, ideographic space U+3000, NBSP, etc.).
 */
export const isWhitespace = (ch: string) => WHITESPACE.test(ch);

/**
 * Checks whether a character is a CJK ideograph.
 *
 * Covers:
 * - U+3400–U+4DBF: CJK Unified Ideographs Extension A
 * - U+4E00–U+9FFF: CJK Unified Ideographs
 * - U+F900–U+FAFF: CJK Compatibility Ideographs
 *
 * Only the first UTF-16 code unit of `ch` is inspected.
 *
 * @example
 * isCjk('中') // → true
 * isCjk('。') // → false (punctuation)
 * isCjk('A')  // → false
 */
export const isCjk = (ch: string): boolean => {
    const c = ch.charCodeAt(0);
    return (c >= 0x3400 && c <= 0x4dbf) || (c >= 0x4e00 && c <= 0x9fff) || (c >= 0xf900 && c <= 0xfaff);
};

/**
 * Checks whether a character is an ASCII digit (`0-9`) or a full-width digit (`０-９`).
 */
export const isDigitAsciiOrFullWidth = (ch: string): boolean => {
    const c = ch.charCodeAt(0);
    return (c >= 0x30 && c <= 0x39) || (c >= 0xff10 && c <= 0xff19);
};

const isFullWidthDigit = (ch: string) => {
    const c = ch.charCodeAt(0);
    return c >= 0xff10 && c <= 0xff19;
};

const isAsciiLetter = (ch: string) => ASCII_LETTER.test(ch);

// ─────────────────────────────────────────────────────────────
// Spans
// ─────────────────────────────────────────────────────────────

/**
 * Returns true when the span contains at least one CJK character and
 * no fewer CJK characters than ASCII letters.
 *
 * Whitespace, digits (ASCII and full-width) and punctuation are neutral,
 * so punctuation-heavy OCR artifacts cannot tip the balance away from CJK.
 *
 * @example
 * isMostlyCjk('第3章 Intro') // → false (2 CJK vs 5 ASCII letters)
 * isMostlyCjk('他說:...')    // → true
 */
export const isMostlyCjk = (s: string): boolean => {
    let cjk = 0;
    let ascii = 0;

    for (const ch of s) {
        if (isWhitespace(ch) || isDigitAsciiOrFullWidth(ch)) {
            continue;
        }
        if (isCjk(ch)) {
            cjk++;
        } else if (isAsciiLetter(ch)) {
            ascii++;
        }
    }

    return cjk > 0 && cjk >= ascii;
};

/**
 * Returns true if the span consists entirely of CJK characters.
 *
 * @param allowWhitespace - When true, whitespace is skipped instead of rejected
 * @returns false for empty or whitespace-only spans
 */
export const isAllCjk = (s: string, allowWhitespace = false): boolean => {
    let seen = false;

    for (const ch of s) {
        if (isWhitespace(ch)) {
            if (!allowWhitespace) {
                return false;
            }
            continue;
        }
        seen = true;
        if (!isCjk(ch)) {
            return false;
        }
    }

    return seen;
};

export const containsAnyCjk = (s: string): boolean => {
    for (const ch of s) {
        if (isCjk(ch)) {
            return true;
        }
    }
    return false;
};

/**
 * Returns true if every code unit is ASCII. Empty spans are not ASCII.
 */
export const isAllAscii = (s: string): boolean => {
    if (!s) {
        return false;
    }
    for (let i = 0; i < s.length; i++) {
        if (s.charCodeAt(i) > 0x7f) {
            return false;
        }
    }
    return true;
};

/**
 * Returns true if the span is made of ASCII or full-width digits, with ASCII
 * spaces allowed as neutral separators. At least one digit is required.
 *
 * @example
 * isAllAsciiDigits('2 0 2 4') // → true
 * isAllAsciiDigits('１２３')   // → true
 * isAllAsciiDigits('12a')     // → false
 */
export const isAllAsciiDigits = (s: string): boolean => {
    let hasDigit = false;

    for (const ch of s) {
        if (ch === ' ') {
            continue;
        }
        if (!isDigitAsciiOrFullWidth(ch)) {
            return false;
        }
        hasDigit = true;
    }

    return hasDigit;
};

/**
 * Returns true if the span mixes CJK characters with ASCII letters/digits
 * (full-width digits count as ASCII content) and contains nothing else
 * apart from the neutral separators ` - / : .`.
 *
 * @example
 * isMixedCjkAscii('第3章')      // → true
 * isMixedCjkAscii('Python入門') // → true
 * isMixedCjkAscii('中文')       // → false (no ASCII)
 * isMixedCjkAscii('A、B中')     // → false ('、' is neither)
 */
export const isMixedCjkAscii = (s: string): boolean => {
    let hasCjk = false;
    let hasAscii = false;

    for (const ch of s) {
        if (ch === ' ' || ch === '-' || ch === '/' || ch === ':' || ch === '.') {
            continue;
        }

        if (ch.charCodeAt(0) <= 0x7f) {
            if (!ASCII_ALNUM.test(ch)) {
                return false;
            }
            hasAscii = true;
        } else if (isFullWidthDigit(ch)) {
            hasAscii = true;
        } else if (isCjk(ch)) {
            hasCjk = true;
        } else {
            return false;
        }

        if (hasCjk && hasAscii) {
            return true;
        }
    }

    return false;
};

/**
 * Returns true when a mostly-CJK span ends with an ellipsis: either the
 * single `…` glyph or the OCR form `...`.
 */
export const endsWithEllipsis = (s: string): boolean => {
    if (!s || !isMostlyCjk(s)) {
        return false;
    }
    const trimmed = s.trimEnd();
    return trimmed.endsWith('…') || trimmed.endsWith('...');
};
