/**
 * Types of configuration problems reported by `validateReflowOptions()`.
 */
export type OptionIssueType =
    | 'invalid_title_pattern'
    | 'global_title_pattern'
    | 'max_len_out_of_range'
    | 'invalid_boundary_level'
    | 'no_heading_classes';

/**
 * A configuration problem. Options with issues still work: the engine
 * clamps, coerces or ignores the offending value.
 */
export type OptionIssue = {
    type: OptionIssueType;
    /** Option path, e.g. `shortHeading.maxLen` */
    option: string;
    message: string;
    suggestion?: string;
};

export type ReflowIssueType = 'content_lost' | 'content_added';

/**
 * A character-level discrepancy between reflow input and output.
 */
export type ReflowIssue = {
    type: ReflowIssueType;
    /** The non-whitespace character whose count differs */
    char: string;
    /** Occurrences in the input */
    expected: number;
    /** Occurrences in the output */
    actual: number;
    /** First input line containing the character (1-based), when known */
    line?: number;
    /** Whitespace-collapsed preview of that line */
    preview?: string;
};

export type ReflowValidationReport = {
    ok: boolean;
    summary: {
        inputChars: number;
        outputChars: number;
        issues: number;
    };
    issues: ReflowIssue[];
};
