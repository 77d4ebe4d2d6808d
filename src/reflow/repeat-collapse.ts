/**
 * Collapses emphasis repeats that styled PDF headings leave behind, e.g.
 * `背负着一切的麒麟 背负着一切的麒麟 背负着一切的麒麟` or `AbcdAbcdAbcd`.
 *
 * Runs on a stripped line before it is classified.
 */

const MIN_PHRASE_REPEATS = 3;
const MAX_PHRASE_TOKENS = 8;

const MIN_UNIT_LENGTH = 4;
const MAX_UNIT_LENGTH = 10;
const MIN_TOKEN_LENGTH = 4;
const MAX_TOKEN_LENGTH = 200;

const TOKEN_SEPARATOR = /[ \t]+/;

const phraseEquals = (parts: string[], a: number, b: number, length: number) => {
    for (let k = 0; k < length; k++) {
        if (parts[a + k] !== parts[b + k]) {
            return false;
        }
    }
    return true;
};

/**
 * Collapses the first run of a token phrase (1–8 tokens) repeated at least
 * three times in a row into one copy. Prefix and tail tokens are kept.
 *
 * @returns A new array when a run was collapsed, otherwise the same array
 */
export const collapseRepeatedPhrases = (parts: string[]): string[] => {
    const n = parts.length;
    if (n < MIN_PHRASE_REPEATS) {
        return parts;
    }

    for (let start = 0; start < n; start++) {
        for (let len = 1; len <= MAX_PHRASE_TOKENS && start + len <= n; len++) {
            let count = 1;
            while (start + (count + 1) * len <= n && phraseEquals(parts, start, start + count * len, len)) {
                count++;
            }

            if (count >= MIN_PHRASE_REPEATS) {
                return [...parts.slice(0, start + len), ...parts.slice(start + count * len)];
            }
        }
    }

    return parts;
};

/**
 * Collapses a token made entirely of one 4–10 character unit repeated at
 * least three times. Shorter units are left alone so natural repeats such as
 * `哈哈哈哈哈哈` survive.
 *
 * @example
 * collapseRepeatedToken('第一季大结局第一季大结局第一季大结局') // → '第一季大结局'
 * collapseRepeatedToken('哈哈哈哈哈哈')                         // → '哈哈哈哈哈哈'
 */
export const collapseRepeatedToken = (token: string): string => {
    if (token.length < MIN_TOKEN_LENGTH || token.length > MAX_TOKEN_LENGTH) {
        return token;
    }

    for (let unitLen = MIN_UNIT_LENGTH; unitLen <= MAX_UNIT_LENGTH && unitLen <= token.length / 3; unitLen++) {
        if (token.length % unitLen !== 0) {
            continue;
        }
        const unit = token.slice(0, unitLen);
        let allMatch = true;
        for (let pos = unitLen; pos < token.length; pos += unitLen) {
            if (!token.startsWith(unit, pos)) {
                allMatch = false;
                break;
            }
        }
        if (allMatch) {
            return unit;
        }
    }

    return token;
};

/**
 * Collapses styled repeats in a line: first a repeated phrase, then each
 * token on its own. Tokens are split on spaces and tabs and rejoined with a
 * single space. A line with nothing to collapse is returned unchanged,
 * spacing included.
 *
 * @example
 * collapseRepeatedSegments('（第一季大结局） （第一季大结局） （第一季大结局）') // → '（第一季大结局）'
 * collapseRepeatedSegments('序 AbcdAbcdAbcd')                                     // → '序 Abcd'
 */
export const collapseRepeatedSegments = (line: string): string => {
    const parts = line.split(TOKEN_SEPARATOR).filter(Boolean);
    if (parts.length === 0) {
        return line;
    }

    const phrases = collapseRepeatedPhrases(parts);
    let changed = phrases !== parts;

    const tokens = phrases.map((token) => {
        const collapsed = collapseRepeatedToken(token);
        if (collapsed !== token) {
            changed = true;
        }
        return collapsed;
    });

    return changed ? tokens.join(' ') : line;
};
