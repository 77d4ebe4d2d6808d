/**
 * Paragraph-boundary predicates over the accumulated paragraph buffer.
 *
 * @module boundaries
 */

import type { SentenceBoundaryLevel } from '../types/options.js';
import { containsAnyCjk, endsWithEllipsis, isCjk, isMostlyCjk, isWhitespace } from '../text/cjk.js';
import {
    isAllowedPostfixCloser,
    isBracketCloser,
    isBracketTypeBalanced,
    isDialogueCloser,
    isMatchingBracket,
    isStrongSentenceEnd,
    lastNonWhitespace,
    prevNonWhitespace,
} from '../text/punctuation.js';

/**
 * ASCII `.`/`:` used as a CJK terminator: the character right before it is
 * CJK and the whole span is mostly CJK.
 */
const isOcrTerminatorAtEnd = (s: string, index: number) => index > 0 && isCjk(s[index - 1]) && isMostlyCjk(s);

/** After `index` only whitespace, quote closers and bracket closers remain. */
const isAtEndAllowingClosers = (s: string, index: number) => {
    for (let j = index + 1; j < s.length; j++) {
        const ch = s[j];
        if (!isWhitespace(ch) && !isDialogueCloser(ch) && !isBracketCloser(ch)) {
            return false;
        }
    }
    return true;
};

/**
 * OCR `.` followed only by closers, e.g. `走了.」`.
 */
const isOcrTerminatorBeforeClosers = (s: string, index: number) => {
    if (!isAtEndAllowingClosers(s, index)) {
        return false;
    }
    const prev = prevNonWhitespace(s, index);
    return prev !== null && isCjk(prev.ch) && isMostlyCjk(s);
};

/**
 * Decides whether the span ends at a sentence boundary.
 *
 * Tiers are cumulative: level 2 accepts everything level 3 accepts, and
 * level 1 everything level 2 accepts.
 *
 * - Level 3: a strong ender (`。！？!?`), or ASCII `.`/`:` directly after a
 *   CJK character in a mostly-CJK span.
 * - Level 2: a quote closer or `）)` right after a strong ender (`。」`),
 *   OCR `.` before closers (`.」`), a trailing `：` in a mostly-CJK span, an
 *   ellipsis (`…` or `...`).
 * - Level 1: bare `；：;:`.
 *
 * @example
 * endsWithSentenceBoundary('他走了。', 3)     // → true
 * endsWithSentenceBoundary('「走吧。」', 3)   // → false
 * endsWithSentenceBoundary('「走吧。」', 2)   // → true
 * endsWithSentenceBoundary('首先；', 2)       // → false
 * endsWithSentenceBoundary('首先；', 1)       // → true
 */
export const endsWithSentenceBoundary = (s: string, level: SentenceBoundaryLevel = 2): boolean => {
    const last = lastNonWhitespace(s);
    if (!last) {
        return false;
    }

    if (isStrongSentenceEnd(last.ch)) {
        return true;
    }
    if ((last.ch === '.' || last.ch === ':') && isOcrTerminatorAtEnd(s, last.index)) {
        return true;
    }
    if (level >= 3) {
        return false;
    }

    if (isDialogueCloser(last.ch) || isAllowedPostfixCloser(last.ch)) {
        const prev = prevNonWhitespace(s, last.index);
        if (prev && isStrongSentenceEnd(prev.ch)) {
            return true;
        }
        if (prev?.ch === '.' && isOcrTerminatorBeforeClosers(s, prev.index)) {
            return true;
        }
    }

    if (last.ch === '：' && isMostlyCjk(s)) {
        return true;
    }
    if (endsWithEllipsis(s)) {
        return true;
    }
    if (level >= 2) {
        return false;
    }

    return last.ch === '；' || last.ch === '：' || last.ch === ';' || last.ch === ':';
};

/**
 * Returns true if the trimmed span is exactly one bracket pair around
 * mostly-CJK content, e.g. `【第一卷】` or `（完）`.
 *
 * ASCII `()`/`[]` additionally require a CJK character inside, so `(test)`
 * and `[1.2]` are never structural. The outer bracket type must be balanced
 * within the span (`【上】下】` is rejected).
 */
export const endsWithCjkBracketBoundary = (s: string): boolean => {
    const trimmed = s.trim();
    if (trimmed.length < 2) {
        return false;
    }

    const open = trimmed[0];
    const close = trimmed[trimmed.length - 1];
    if (!isMatchingBracket(open, close)) {
        return false;
    }

    const inner = trimmed.slice(1, -1).trim();
    if (!inner || !isMostlyCjk(inner)) {
        return false;
    }
    if ((open === '(' || open === '[') && !containsAnyCjk(inner)) {
        return false;
    }

    return isBracketTypeBalanced(trimmed, open);
};
