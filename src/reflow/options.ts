import type {
    Logger,
    ReflowOptions,
    SentenceBoundaryLevel,
    ShortHeadingSettings,
} from '../types/options.js';
import { clampHeadingLength, DEFAULT_SHORT_HEADING_SETTINGS } from './short-heading.js';
import { compileTitlePattern } from './title-heading.js';

export const DEFAULT_SENTENCE_BOUNDARY_LEVEL: SentenceBoundaryLevel = 2;

/**
 * Options with every default applied. Built once per call and never mutated.
 */
export type ResolvedReflowOptions = Readonly<{
    addPdfPageHeader: boolean;
    compact: boolean;
    sentenceBoundaryLevel: SentenceBoundaryLevel;
    shortHeading: Readonly<ShortHeadingSettings>;
    titlePattern: RegExp | null;
    debug: boolean;
    logger?: Logger;
}>;

/**
 * Rounds and clamps a boundary level into 1–3. Non-numbers fall back to 2.
 */
export const toSentenceBoundaryLevel = (level: number | undefined): SentenceBoundaryLevel => {
    if (level === undefined || !Number.isFinite(level)) {
        return DEFAULT_SENTENCE_BOUNDARY_LEVEL;
    }
    const rounded = Math.round(level);
    if (rounded <= 1) {
        return 1;
    }
    return rounded >= 3 ? 3 : 2;
};

export const resolveShortHeadingSettings = (
    overrides: Partial<ShortHeadingSettings> | undefined,
): Readonly<ShortHeadingSettings> => {
    const merged = { ...DEFAULT_SHORT_HEADING_SETTINGS, ...overrides };
    return Object.freeze({ ...merged, maxLen: clampHeadingLength(merged.maxLen) });
};

/**
 * Applies defaults, clamps numeric settings and compiles the custom title
 * pattern. Never throws: an invalid pattern is logged and dropped.
 *
 * @example
 * resolveReflowOptions({ sentenceBoundaryLevel: 7, shortHeading: { maxLen: 1 } });
 * // → { sentenceBoundaryLevel: 3, shortHeading: { maxLen: 3, ... }, addPdfPageHeader: false, ... }
 */
export const resolveReflowOptions = (options: ReflowOptions = {}): ResolvedReflowOptions => {
    const { logger } = options;

    return Object.freeze({
        addPdfPageHeader: options.addPdfPageHeader ?? false,
        compact: options.compact ?? false,
        debug: options.debug ?? false,
        logger,
        sentenceBoundaryLevel: toSentenceBoundaryLevel(options.sentenceBoundaryLevel),
        shortHeading: resolveShortHeadingSettings(options.shortHeading),
        titlePattern: compileTitlePattern(options.titlePattern, logger),
    });
};
