import type { Logger } from '../types/options.js';

/**
 * Built-in chapter/section title pattern.
 *
 * Matches, on lines of at most 50 characters without commas:
 * - 前言 / 序章 / 楔子 / 终章 / 終章 / 尾声 / 尾聲 / 后记 / 後記
 * - 番外 followed by up to 15 characters
 * - 第…章 / 节 / 部 / 卷 / 節 / 回 (up to 10 leading characters), not followed
 *   by 分 / 合 / 的 (`第一部分`, `第二回合` and `第三章的` are prose)
 * - 卷一 / 章三 style numbering
 */
export const TITLE_HEADING_PATTERN =
    /^(?!.*[,，])(?=.{0,50}$)(?:前言|序章|楔子|终章|終章|尾声|尾聲|后记|後記|番外.{0,15}|.{0,10}?第.{0,5}?[章节部卷節回](?:$|[^分合的])|[卷章][一二三四五六七八九十](?:$|.{0,20}?))/u;

/**
 * @param probe - Line with indentation removed
 *
 * @example
 * isTitleHeading('第一章')          // → true
 * isTitleHeading('第十二回 大鬧天宮') // → true
 * isTitleHeading('第一部分')        // → false
 * isTitleHeading('第一章，開始')     // → false (comma)
 */
export const isTitleHeading = (probe: string) => TITLE_HEADING_PATTERN.test(probe);

/**
 * Compiles a user-supplied title pattern.
 *
 * Strings are compiled with the `u` flag. The stateful `g`/`y` flags are
 * dropped from RegExp inputs so repeated `test()` calls stay independent.
 *
 * @returns The compiled pattern, or `null` when the pattern is empty or invalid
 */
export const compileTitlePattern = (pattern: string | RegExp | undefined, logger?: Logger): RegExp | null => {
    if (pattern === undefined) {
        return null;
    }

    if (pattern instanceof RegExp) {
        return pattern.source === '(?:)' ? null : new RegExp(pattern.source, pattern.flags.replace(/[gy]/g, ''));
    }

    if (!pattern.trim()) {
        return null;
    }

    try {
        return new RegExp(pattern, 'u');
    } catch (error) {
        logger?.warn?.('[reflow] Ignoring invalid custom title pattern', {
            error: error instanceof Error ? error.message : String(error),
            pattern,
        });
        return null;
    }
};
