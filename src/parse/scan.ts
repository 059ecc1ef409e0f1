/**
 * Character-level helpers shared by the scanners.
 *
 * @module
 */

const SPACE_CHARACTERS = ' \t\n\v\f\r'

/**
 * ASCII whitespace: space, tab, newline, vertical tab, form
 * feed and carriage return.
 */
export function isSpace(c: string | undefined): boolean {
    return c !== undefined && c.length === 1 && SPACE_CHARACTERS.includes(c)
}

/**
 * Index of the first non-whitespace character at or after `start`.
 */
export function skipSpace(text: string, start: number): number {
    let cursor = start
    while (isSpace(text[cursor])) {
        cursor++
    }
    return cursor
}

/**
 * Value of an alphanumeric digit (`0-9` then `a-z` as 10..35), or -1.
 */
export function digitValue(c: string | undefined): number {
    if (c === undefined) {
        return -1
    }
    const code = c.charCodeAt(0)
    if (code >= 48 && code <= 57) {
        return code - 48
    }
    const lower = code | 0x20
    if (lower >= 97 && lower <= 122) {
        return lower - 87
    }
    return -1
}

/**
 * True when `c` is a digit valid in `base`.
 */
export function isDigitIn(c: string | undefined, base: number): boolean {
    const value = digitValue(c)
    return value >= 0 && value < base
}

/**
 * Case-insensitive match of `word` at `start`.
 */
export function matchesWord(text: string, start: number, word: string): boolean {
    return text.slice(start, start + word.length).toLowerCase() === word
}
