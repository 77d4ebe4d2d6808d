import { isWhitespace } from '../text/cjk.js';
import { isDialogueOpener, isMetadataSeparator } from '../text/punctuation.js';
import metadataKeys from './metadata-keys.json' with { type: 'json' };

/** Publishing/CIP metadata keys (Simplified and Traditional forms) */
export const METADATA_KEYS: ReadonlySet<string> = new Set(metadataKeys);

const MAX_METADATA_KEY_LENGTH = Math.max(...metadataKeys.map((k) => k.length));

const MAX_METADATA_LINE_LENGTH = 30;

export type MetadataLine = {
    key: string;
    separator: string;
    value: string;
};

/**
 * Parses a short `key separator value` line such as `作者：王小明` or
 * `ISBN: 978-7-00-000000-0`.
 *
 * The key runs from the first non-whitespace character to the first metadata
 * separator (`:` `：` U+3000 `·` `・`). Whitespace before the separator is
 * trimmed, the trimmed key must be in {@link METADATA_KEYS}, and the length
 * limit applies to the untrimmed key. Lines over 30 characters, lines without a value and values that
 * open with a dialogue quote (`作者：「…`) are not metadata.
 *
 * @returns The parsed parts, or `null` when the line is not metadata
 */
export const parseMetadataLine = (line: string): MetadataLine | null => {
    if (!line || line.length > MAX_METADATA_LINE_LENGTH) {
        return null;
    }

    let start = 0;
    while (start < line.length && isWhitespace(line[start])) {
        start++;
    }

    let sepIndex = -1;
    for (let i = start; i < line.length; i++) {
        if (isMetadataSeparator(line[i])) {
            sepIndex = i;
            break;
        }
    }

    const keyLength = sepIndex - start;
    if (keyLength <= 0 || keyLength > MAX_METADATA_KEY_LENGTH) {
        return null;
    }

    let valueStart = sepIndex + 1;
    while (valueStart < line.length && isWhitespace(line[valueStart])) {
        valueStart++;
    }
    if (valueStart >= line.length) {
        return null;
    }

    const key = line.slice(start, sepIndex).trimEnd();
    if (!METADATA_KEYS.has(key) || isDialogueOpener(line[valueStart])) {
        return null;
    }

    return { key, separator: line[sepIndex], value: line.slice(valueStart).trimEnd() };
};

export const isMetadataLine = (line: string) => parseMetadataLine(line) !== null;
