/**
 * Incremental open-quote and open-bracket tracking for one paragraph buffer.
 *
 * Both trackers are fed each line as it is appended to the buffer and reset
 * when the buffer is flushed. They never rescan earlier lines: a paragraph
 * can span hundreds of wrapped PDF lines.
 *
 * @module dialog-state
 */

import { isBracketCloser, isBracketOpener, isMatchingBracket } from '../text/punctuation.js';

// ─────────────────────────────────────────────────────────────
// Dialogue quotes
// ─────────────────────────────────────────────────────────────

type QuoteFamily = 'double' | 'single' | 'corner' | 'cornerBold' | 'verticalCorner' | 'verticalCornerBold';

const QUOTE_OPEN: ReadonlyMap<string, QuoteFamily> = new Map([
    ['“', 'double'],
    ['‘', 'single'],
    ['「', 'corner'],
    ['『', 'cornerBold'],
    ['﹁', 'verticalCorner'],
    ['﹃', 'verticalCornerBold'],
]);

const QUOTE_CLOSE: ReadonlyMap<string, QuoteFamily> = new Map([
    ['”', 'double'],
    ['’', 'single'],
    ['」', 'corner'],
    ['』', 'cornerBold'],
    ['﹂', 'verticalCorner'],
    ['﹄', 'verticalCornerBold'],
]);

export type DialogState = {
    /** Scans a fragment, opening and closing quote families */
    update(fragment: string): void;
    /** True when any quote family has more openers than closers so far */
    readonly isUnclosed: boolean;
    reset(): void;
};

/**
 * Creates a dialogue-quote tracker.
 *
 * One counter per quote family: incremented on the opener, decremented
 * (never below zero) on the closer. A stray closer is ignored.
 *
 * @example
 * const dialog = createDialogState();
 * dialog.update('他說：「今天');
 * dialog.isUnclosed; // → true
 * dialog.update('不去了。」');
 * dialog.isUnclosed; // → false
 */
export const createDialogState = (): DialogState => {
    const counts = new Map<QuoteFamily, number>();

    return {
        update(fragment: string) {
            for (const ch of fragment) {
                const opened = QUOTE_OPEN.get(ch);
                if (opened) {
                    counts.set(opened, (counts.get(opened) ?? 0) + 1);
                    continue;
                }
                const closed = QUOTE_CLOSE.get(ch);
                if (closed) {
                    const current = counts.get(closed) ?? 0;
                    if (current > 0) {
                        counts.set(closed, current - 1);
                    }
                }
            }
        },
        get isUnclosed() {
            for (const count of counts.values()) {
                if (count > 0) {
                    return true;
                }
            }
            return false;
        },
        reset() {
            counts.clear();
        },
    };
};

// ─────────────────────────────────────────────────────────────
// Brackets
// ─────────────────────────────────────────────────────────────

export type BracketTracker = {
    update(fragment: string): void;
    /**
     * True when the text fed so far has an unmatched opener, a stray closer
     * or a mismatched pair. Same answer as `hasUnclosedBracket()` on the
     * concatenated fragments.
     */
    readonly isUnclosed: boolean;
    reset(): void;
};

/**
 * Creates a bracket-pair tracker with stack discipline.
 *
 * Once a stray or mismatched closer is seen the tracker stays "broken" until
 * reset, since no later text can rebalance the paragraph.
 */
export const createBracketTracker = (): BracketTracker => {
    const stack: string[] = [];
    let broken = false;

    return {
        update(fragment: string) {
            if (broken) {
                return;
            }
            for (const ch of fragment) {
                if (isBracketOpener(ch)) {
                    stack.push(ch);
                } else if (isBracketCloser(ch)) {
                    const open = stack.pop();
                    if (open === undefined || !isMatchingBracket(open, ch)) {
                        broken = true;
                        return;
                    }
                }
            }
        },
        get isUnclosed() {
            return broken || stack.length > 0;
        },
        reset() {
            stack.length = 0;
            broken = false;
        },
    };
};
