import { describe, expect, it } from 'vitest';
import {
    containsAnyCjk,
    endsWithEllipsis,
    isAllAscii,
    isAllAsciiDigits,
    isAllCjk,
    isCjk,
    isDigitAsciiOrFullWidth,
    isMixedCjkAscii,
    isMostlyCjk,
    isWhitespace,
} from './cjk.js';

describe('cjk', () => {
    describe('isCjk', () => {
        it('should accept unified ideographs', () => {
            expect(isCjk('中')).toBe(true);
            expect(isCjk('一')).toBe(true);
            expect(isCjk('鿿')).toBe(true);
        });

        it('should accept extension A and compatibility ideographs', () => {
            expect(isCjk('㐀')).toBe(true);
            expect(isCjk('䶿')).toBe(true);
            expect(isCjk('豈')).toBe(true);
        });

        it('should reject CJK punctuation, kana and Latin', () => {
            expect(isCjk('。')).toBe(false);
            expect(isCjk('「')).toBe(false);
            expect(isCjk('あ')).toBe(false);
            expect(isCjk('A')).toBe(false);
        });

        it('should never throw on empty strings or lone surrogates', () => {
            expect(isCjk('')).toBe(false);
            expect(isCjk('\ud800')).toBe(false);
        });
    });

    describe('isDigitAsciiOrFullWidth', () => {
        it('should accept ASCII and full-width digits only', () => {
            expect(isDigitAsciiOrFullWidth('0')).toBe(true);
            expect(isDigitAsciiOrFullWidth('９')).toBe(true);
            expect(isDigitAsciiOrFullWidth('a')).toBe(false);
            expect(isDigitAsciiOrFullWidth('一')).toBe(false);
        });
    });

    describe('isWhitespace', () => {
        it('should treat the ideographic space as whitespace', () => {
            expect(isWhitespace('　')).toBe(true);
            expect(isWhitespace('\t')).toBe(true);
            expect(isWhitespace('中')).toBe(false);
        });
    });

    describe('isMostlyCjk', () => {
        it('should require at least one CJK character', () => {
            expect(isMostlyCjk('')).toBe(false);
            expect(isMostlyCjk('123 ...')).toBe(false);
        });

        it('should ignore digits and punctuation when weighing', () => {
            expect(isMostlyCjk('他說:...')).toBe(true);
            expect(isMostlyCjk('２０２４年')).toBe(true);
        });

        it('should compare CJK characters against ASCII letters', () => {
            expect(isMostlyCjk('第3章 Intro')).toBe(false);
            expect(isMostlyCjk('中文ab')).toBe(true);
            expect(isMostlyCjk('中abc')).toBe(false);
        });
    });

    describe('isAllCjk', () => {
        it('should reject whitespace unless allowed', () => {
            expect(isAllCjk('今天天氣')).toBe(true);
            expect(isAllCjk('今天 天氣')).toBe(false);
            expect(isAllCjk('今天 天氣', true)).toBe(true);
        });

        it('should reject empty and punctuated spans', () => {
            expect(isAllCjk('')).toBe(false);
            expect(isAllCjk('   ', true)).toBe(false);
            expect(isAllCjk('天氣。')).toBe(false);
        });
    });

    describe('containsAnyCjk', () => {
        it('should find a single ideograph in Latin text', () => {
            expect(containsAnyCjk('abc中')).toBe(true);
            expect(containsAnyCjk('abc')).toBe(false);
        });
    });

    describe('isAllAscii', () => {
        it('should treat empty strings as not ASCII', () => {
            expect(isAllAscii('')).toBe(false);
        });

        it('should reject any non-ASCII code unit', () => {
            expect(isAllAscii('Chapter 1: Intro')).toBe(true);
            expect(isAllAscii('Café')).toBe(false);
        });
    });

    describe('isAllAsciiDigits', () => {
        it('should accept spaced and full-width digits', () => {
            expect(isAllAsciiDigits('2 0 2 4')).toBe(true);
            expect(isAllAsciiDigits('１２３')).toBe(true);
        });

        it('should require at least one digit and nothing else', () => {
            expect(isAllAsciiDigits('   ')).toBe(false);
            expect(isAllAsciiDigits('12a')).toBe(false);
            expect(isAllAsciiDigits('1.2')).toBe(false);
        });
    });

    describe('isMixedCjkAscii', () => {
        it('should accept CJK with ASCII letters or digits', () => {
            expect(isMixedCjkAscii('第3章')).toBe(true);
            expect(isMixedCjkAscii('Python入門')).toBe(true);
            expect(isMixedCjkAscii('第３章')).toBe(true);
        });

        it('should allow neutral separators', () => {
            expect(isMixedCjkAscii('Part 1 - 開始')).toBe(true);
            expect(isMixedCjkAscii('v1.2/中文')).toBe(true);
        });

        it('should reject single-script and punctuated spans', () => {
            expect(isMixedCjkAscii('中文')).toBe(false);
            expect(isMixedCjkAscii('abc')).toBe(false);
            expect(isMixedCjkAscii('A、B中')).toBe(false);
            expect(isMixedCjkAscii('中文!A')).toBe(false);
        });
    });

    describe('endsWithEllipsis', () => {
        it('should accept the ellipsis glyph and the three-dot form', () => {
            expect(endsWithEllipsis('很久以前……')).toBe(true);
            expect(endsWithEllipsis('很久以前...  ')).toBe(true);
        });

        it('should require a mostly-CJK span', () => {
            expect(endsWithEllipsis('once upon a time...')).toBe(false);
            expect(endsWithEllipsis('')).toBe(false);
        });

        it('should reject two dots', () => {
            expect(endsWithEllipsis('很久以前..')).toBe(false);
        });
    });
});
