/**
 * Up-front checks for reflow options.
 *
 * The engine itself never rejects options: it clamps numbers and ignores a
 * broken title pattern. These checks surface those silent corrections so a
 * settings screen can warn about them.
 */

import { MAX_HEADING_LEN, MIN_HEADING_LEN } from '../reflow/short-heading.js';
import type { ReflowOptions } from '../types/options.js';
import type { OptionIssue } from '../types/validation.js';

const validateTitlePattern = (pattern: string | RegExp): OptionIssue | undefined => {
    if (pattern instanceof RegExp) {
        if (pattern.global || pattern.sticky) {
            return {
                message: `Title pattern /${pattern.source}/${pattern.flags} is stateful; the g and y flags are ignored`,
                option: 'titlePattern',
                suggestion: 'Remove the g and y flags',
                type: 'global_title_pattern',
            };
        }
        return undefined;
    }

    try {
        new RegExp(pattern, 'u');
        return undefined;
    } catch (error) {
        return {
            message: `Invalid title pattern "${pattern}": ${error instanceof Error ? error.message : String(error)}`,
            option: 'titlePattern',
            suggestion: 'Check the pattern syntax; it is compiled with the u flag',
            type: 'invalid_title_pattern',
        };
    }
};

/**
 * Reports option values the engine would clamp, coerce or ignore.
 *
 * @returns An empty array when the options are used as given
 *
 * @example
 * validateReflowOptions({ titlePattern: '第(' , sentenceBoundaryLevel: 5 });
 * // → [
 * //   { type: 'invalid_title_pattern', option: 'titlePattern', ... },
 * //   { type: 'invalid_boundary_level', option: 'sentenceBoundaryLevel', ... },
 * // ]
 */
export const validateReflowOptions = (options: ReflowOptions): OptionIssue[] => {
    const issues: OptionIssue[] = [];

    if (options.titlePattern !== undefined) {
        const issue = validateTitlePattern(options.titlePattern);
        if (issue) {
            issues.push(issue);
        }
    }

    const level = options.sentenceBoundaryLevel;
    if (level !== undefined && level !== 1 && level !== 2 && level !== 3) {
        issues.push({
            message: `sentenceBoundaryLevel must be 1, 2 or 3 (got ${level})`,
            option: 'sentenceBoundaryLevel',
            suggestion: 'Use 3 for strict, 2 for normal or 1 for lenient boundaries',
            type: 'invalid_boundary_level',
        });
    }

    const heading = options.shortHeading;
    const maxLen = heading?.maxLen;
    if (maxLen !== undefined && !(Number.isInteger(maxLen) && maxLen >= MIN_HEADING_LEN && maxLen <= MAX_HEADING_LEN)) {
        issues.push({
            message: `shortHeading.maxLen must be an integer from ${MIN_HEADING_LEN} to ${MAX_HEADING_LEN} (got ${maxLen})`,
            option: 'shortHeading.maxLen',
            suggestion: `The value will be clamped into ${MIN_HEADING_LEN}–${MAX_HEADING_LEN}`,
            type: 'max_len_out_of_range',
        });
    }

    if (
        heading &&
        heading.allAscii === false &&
        heading.allAsciiDigits === false &&
        heading.allCjk === false &&
        !heading.mixedCjkAscii
    ) {
        issues.push({
            message: 'All short-heading pattern classes are disabled; only colon lead-ins can be headings',
            option: 'shortHeading',
            suggestion: 'Enable at least one of allCjk, allAscii, allAsciiDigits or mixedCjkAscii',
            type: 'no_heading_classes',
        });
    }

    return issues;
};
