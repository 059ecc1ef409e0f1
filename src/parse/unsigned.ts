/**
 * Parsers for unsigned integers.
 *
 * Grammar: leading whitespace, an optional sign, an
 * optional `0x` prefix and digits of the requested radix. A negative sign is
 * only accepted in front of a zero magnitude.
 *
 * @module
 */

import { digitValue, isDigitIn, skipSpace } from './scan'
import { fail, ParseResult, succeed } from './status'

/** Common conversion radices. `AUTO` detects `0x` (hex) and `0` (octal) prefixes. */
export const NumberBase = {
    AUTO: 0,
    BIN: 2,
    TER: 3,
    OCT: 8,
    DEC: 10,
    HEX: 16,
    B32: 32
} as const

/** Largest unsigned value a `number` holds without losing precision. */
export const MAX_UNSIGNED = Number.MAX_SAFE_INTEGER

/** Largest unsigned 64-bit value. */
export const UINT64_MAX = (1n << 64n) - 1n

type UnsignedScan = {
    magnitude: bigint
    negative: boolean
    cursor: number
}

export function isValidBase(base: number): boolean {
    return Number.isInteger(base) && (base === 0 || (base >= 2 && base <= 36))
}

function hasHexPrefix(text: string, cursor: number): boolean {
    return (
        text[cursor] === '0' && (text[cursor + 1] === 'x' || text[cursor + 1] === 'X') && isDigitIn(text[cursor + 2], 16)
    )
}

/**
 * Scans sign, prefix and digits. Returns `undefined` when no digit was found.
 */
function scanUnsigned(text: string, start: number, base: number): UnsignedScan | undefined {
    let cursor = skipSpace(text, start)
    let negative = false
    if (text[cursor] === '+' || text[cursor] === '-') {
        negative = text[cursor] === '-'
        cursor++
    }

    let radix = base
    if ((radix === 0 || radix === 16) && hasHexPrefix(text, cursor)) {
        radix = 16
        cursor += 2
    } else if (radix === 0) {
        radix = text[cursor] === '0' ? 8 : 10
    }

    const digitsStart = cursor
    const bigRadix = BigInt(radix)
    let magnitude = 0n
    while (isDigitIn(text[cursor], radix)) {
        magnitude = magnitude * bigRadix + BigInt(digitValue(text[cursor]))
        cursor++
    }

    if (cursor === digitsStart) {
        return undefined
    }
    return { magnitude, negative, cursor }
}

/**
 * Parses an unsigned integer into a `number`.
 *
 * @param text - Input text
 * @param min - Inclusive lower bound
 * @param max - Inclusive upper bound
 * @param base - 0 for prefix detection, or a radix in [2, 36]
 * @param start - Index to start scanning from
 *
 * @example
 * parseUnsignedInteger('42')           // { status: 'SUCCESS', value: 42, cursor: 2 }
 * parseUnsignedInteger('ff', 0, 1000, 16) // { status: 'SUCCESS', value: 255, cursor: 2 }
 * parseUnsignedInteger('100', 0, 50)   // { status: 'EMAX', cursor: 3 }
 */
export function parseUnsignedInteger(
    text: string,
    min = 0,
    max: number = MAX_UNSIGNED,
    base: number = NumberBase.DEC,
    start = 0
): ParseResult<number> {
    if (!isValidBase(base)) {
        return fail('EBASE', start)
    }

    const scan = scanUnsigned(text, start, base)
    if (!scan) {
        return fail('EERR', start)
    }
    if (scan.magnitude > BigInt(MAX_UNSIGNED)) {
        return fail('ERANGE', scan.cursor)
    }

    const value = Number(scan.magnitude)
    if (scan.negative && value !== 0) {
        return fail('EMIN', scan.cursor)
    }
    if (value < min) {
        return fail('EMIN', scan.cursor)
    }
    if (value > max) {
        return fail('EMAX', scan.cursor)
    }
    return succeed(text, value, scan.cursor)
}

/**
 * Parses an unsigned integer into a `bigint` no larger than {@link UINT64_MAX}.
 *
 * Same grammar and status ladder as {@link parseUnsignedInteger}.
 */
export function parseUnsignedBigInt(
    text: string,
    min = 0n,
    max: bigint = UINT64_MAX,
    base: number = NumberBase.DEC,
    start = 0
): ParseResult<bigint> {
    if (!isValidBase(base)) {
        return fail('EBASE', start)
    }

    const scan = scanUnsigned(text, start, base)
    if (!scan) {
        return fail('EERR', start)
    }
    if (scan.magnitude > UINT64_MAX) {
        return fail('ERANGE', scan.cursor)
    }
    if (scan.negative && scan.magnitude !== 0n) {
        return fail('EMIN', scan.cursor)
    }
    if (scan.magnitude < min) {
        return fail('EMIN', scan.cursor)
    }
    if (scan.magnitude > max) {
        return fail('EMAX', scan.cursor)
    }
    return succeed(text, scan.magnitude, scan.cursor)
}
