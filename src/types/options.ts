/**
 * Logger interface for custom logging implementations.
 *
 * All methods are optional - only implement the verbosity levels you need.
 * When no logger is provided, no logging overhead is incurred.
 *
 * @example
 * // Simple console logger
 * const logger: Logger = {
 *   debug: console.debug,
 *   info: console.info,
 *   warn: console.warn,
 *   error: console.error,
 * };
 *
 * @example
 * // Production logger (only warnings and errors)
 * const prodLogger: Logger = {
 *   warn: (msg, ...args) => myLoggingService.warn(msg, args),
 *   error: (msg, ...args) => myLoggingService.error(msg, args),
 * };
 */
export interface Logger {
    /** Log a debug message (verbose debugging output) */
    debug?: (message: string, ...args: unknown[]) => void;
    /** Log an error message (critical failures) */
    error?: (message: string, ...args: unknown[]) => void;
    /** Log an informational message (key progress points) */
    info?: (message: string, ...args: unknown[]) => void;
    /** Log a trace message (extremely verbose, per-line details) */
    trace?: (message: string, ...args: unknown[]) => void;
    /** Log a warning message (potential issues) */
    warn?: (message: string, ...args: unknown[]) => void;
}

/**
 * Sentence-boundary strictness.
 *
 * - `3`: strict, only hard enders (`。！？!?`) and OCR `.`/`:` after CJK
 * - `2`: normal (default), adds quote closers after enders, OCR `.` before
 *   closers, full-width colon and ellipsis
 * - `1`: lenient, adds bare `；：;:`
 */
export type SentenceBoundaryLevel = 1 | 2 | 3;

/**
 * Controls which short lines may be treated as headings.
 *
 * `maxLen` is the base length limit (clamped to 3–30). ASCII and mixed
 * CJK/ASCII candidates get twice the budget, clamped to 10–30.
 */
export type ShortHeadingSettings = {
    maxLen: number;
    allCjk: boolean;
    allAscii: boolean;
    allAsciiDigits: boolean;
    mixedCjkAscii: boolean;
};

/**
 * Options for `reflowCjkParagraphs()` / `segmentText()`.
 *
 * @example
 * const options: ReflowOptions = {
 *   addPdfPageHeader: true,
 *   compact: true,
 *   sentenceBoundaryLevel: 3,
 *   shortHeading: { maxLen: 12, mixedCjkAscii: true },
 *   titlePattern: /^卷[一二三四五六七八九十]+$/u,
 * };
 */
export type ReflowOptions = {
    /**
     * When true, `=== [Page X/Y] ===` lines are kept as structural segments and
     * blank lines always end a paragraph. When false, page markers are
     * stripped and a blank line only ends a paragraph whose text ends with a
     * strong sentence ender (PDF page breaks inside sentences are healed).
     *
     * @default false
     */
    addPdfPageHeader?: boolean;

    /**
     * Join output segments with a single `\n` instead of a blank line.
     *
     * @default false
     */
    compact?: boolean;

    /**
     * Values outside 1–3 are clamped; non-integers are rounded.
     *
     * @default 2
     */
    sentenceBoundaryLevel?: number;

    /** Partial overrides merged onto `DEFAULT_SHORT_HEADING_SETTINGS` */
    shortHeading?: Partial<ShortHeadingSettings>;

    /**
     * Extra title pattern tested (before the built-in one) against each line
     * with its indentation removed. Strings are compiled with the `u` flag.
     * Patterns that fail to compile are ignored with a warning.
     */
    titlePattern?: string | RegExp;

    /** Attach the flush reason to each emitted segment */
    debug?: boolean;

    logger?: Logger;
};
