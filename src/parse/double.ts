/**
 * Parser for double-precision floating-point numbers.
 *
 * Accepts decimal literals with an optional exponent,
 * hexadecimal literals with an optional binary exponent, `inf`/`infinity` and
 * `nan`, all case-insensitive and optionally signed.
 *
 * @module
 */

import { digitValue, isDigitIn, matchesWord, skipSpace } from './scan'
import { fail, ParseResult, succeed } from './status'

type DoubleScan = {
    value: number
    cursor: number
    /** Finite literal that overflowed, or nonzero literal that underflowed to zero */
    outOfRange: boolean
}

type Literal = Omit<DoubleScan, 'value'> & { magnitude: number }

// Binary exponents beyond this are zero or infinite for any rounded significand
const MAX_BINARY_EXPONENT = 5000

// Significand width of a double, implicit bit included
const SIGNIFICAND_BITS = 53

// Binary exponent of the smallest subnormal
const MIN_SUBNORMAL_EXPONENT = -1074

function scanDigits(text: string, start: number, base: number): number {
    let cursor = start
    while (isDigitIn(text[cursor], base)) {
        cursor++
    }
    return cursor
}

/**
 * Scans an optional exponent part (`e`/`p`, optional sign, digits). Returns
 * the index after it, or `start` when no complete exponent is present.
 */
function scanExponent(text: string, start: number, marker: string): number {
    if (text[start]?.toLowerCase() !== marker) {
        return start
    }
    let cursor = start + 1
    if (text[cursor] === '+' || text[cursor] === '-') {
        cursor++
    }
    const end = scanDigits(text, cursor, 10)
    return end === cursor ? start : end
}

/**
 * Multiplies by a power of two in steps so that intermediate factors stay
 * finite.
 */
function scaleByPowerOfTwo(x: number, exponent: number): number {
    let result = x
    let e = Math.max(-MAX_BINARY_EXPONENT, Math.min(MAX_BINARY_EXPONENT, exponent))
    while (e > 1023) {
        result *= 2 ** 1023
        e -= 1023
    }
    while (e < -1022) {
        result *= 2 ** -1022
        e += 1022
    }
    return result * 2 ** e
}

/**
 * Rounds `mantissa * 2 ** exponent` to nearest, ties to even, keeping only the
 * bits a double holds at the result's magnitude. Subnormal results keep fewer
 * than 53 bits. The returned significand scales exactly unless it overflows.
 */
function roundToDouble(mantissa: bigint, exponent: number): { significand: bigint; exponent: number } {
    const bitLength = mantissa === 0n ? 0 : mantissa.toString(2).length
    const shift = Math.max(bitLength - SIGNIFICAND_BITS, MIN_SUBNORMAL_EXPONENT - exponent, 0)
    if (shift === 0) {
        return { significand: mantissa, exponent }
    }
    if (shift > bitLength) {
        // Below half of the smallest subnormal
        return { significand: 0n, exponent: MIN_SUBNORMAL_EXPONENT }
    }

    const bits = BigInt(shift)
    let significand = mantissa >> bits
    const remainder = mantissa - (significand << bits)
    const half = 1n << (bits - 1n)
    if (remainder > half || (remainder === half && (significand & 1n) === 1n)) {
        significand++
    }
    return { significand, exponent: exponent + shift }
}

function scanSpecial(text: string, start: number): Literal | undefined {
    if (matchesWord(text, start, 'infinity')) {
        return { magnitude: Infinity, cursor: start + 8, outOfRange: false }
    }
    if (matchesWord(text, start, 'inf')) {
        return { magnitude: Infinity, cursor: start + 3, outOfRange: false }
    }
    if (!matchesWord(text, start, 'nan')) {
        return undefined
    }

    let cursor = start + 3
    if (text[cursor] === '(') {
        let end = cursor + 1
        while (end < text.length && /[0-9A-Za-z_]/.test(text[end])) {
            end++
        }
        if (text[end] === ')') {
            cursor = end + 1
        }
    }
    return { magnitude: NaN, cursor, outOfRange: false }
}

function scanHex(text: string, start: number): Literal | undefined {
    const integerEnd = scanDigits(text, start, 16)
    let fractionStart = integerEnd
    let fractionEnd = integerEnd
    if (text[integerEnd] === '.') {
        fractionStart = integerEnd + 1
        fractionEnd = scanDigits(text, fractionStart, 16)
    }
    if (integerEnd === start && fractionEnd === fractionStart) {
        return undefined
    }

    const digits = text.slice(start, integerEnd) + text.slice(fractionStart, fractionEnd)
    let mantissa = 0n
    for (const digit of digits) {
        mantissa = mantissa * 16n + BigInt(digitValue(digit))
    }

    const cursor = scanExponent(text, fractionEnd, 'p')
    const written = cursor > fractionEnd ? Number(text.slice(fractionEnd + 1, cursor)) : 0
    const exponent = written - 4 * (fractionEnd - fractionStart)

    const rounded = roundToDouble(mantissa, exponent)
    const magnitude = scaleByPowerOfTwo(Number(rounded.significand), rounded.exponent)
    const outOfRange = !Number.isFinite(magnitude) || (magnitude === 0 && mantissa !== 0n)
    return { magnitude, cursor, outOfRange }
}

function scanDecimal(text: string, start: number): Literal | undefined {
    const integerEnd = scanDigits(text, start, 10)
    let mantissaEnd = integerEnd
    if (text[integerEnd] === '.') {
        mantissaEnd = scanDigits(text, integerEnd + 1, 10)
    }
    if (integerEnd === start && mantissaEnd <= integerEnd + 1) {
        return undefined
    }

    const cursor = scanExponent(text, mantissaEnd, 'e')
    const magnitude = Number(text.slice(start, cursor))
    const nonZero = /[1-9]/.test(text.slice(start, mantissaEnd))
    const outOfRange = !Number.isFinite(magnitude) || (magnitude === 0 && nonZero)
    return { magnitude, cursor, outOfRange }
}

function scanDouble(text: string, start: number): DoubleScan | undefined {
    let cursor = skipSpace(text, start)
    let sign = 1
    if (text[cursor] === '+' || text[cursor] === '-') {
        sign = text[cursor] === '-' ? -1 : 1
        cursor++
    }

    let literal = scanSpecial(text, cursor)
    if (!literal && text[cursor] === '0' && (text[cursor + 1] === 'x' || text[cursor + 1] === 'X')) {
        literal = scanHex(text, cursor + 2)
    }
    literal = literal ?? scanDecimal(text, cursor)

    if (!literal) {
        return undefined
    }
    return { value: sign * literal.magnitude, cursor: literal.cursor, outOfRange: literal.outOfRange }
}

/**
 * Parses a double.
 *
 * @param text - Input text
 * @param min - Inclusive lower bound
 * @param max - Inclusive upper bound
 * @param start - Index to start scanning from
 *
 * @example
 * parseDouble('2.5')      // { status: 'SUCCESS', value: 2.5, cursor: 3 }
 * parseDouble('0x1p-2')   // { status: 'SUCCESS', value: 0.25, cursor: 6 }
 * parseDouble('1e5kg')    // { status: 'EEND', value: 100000, cursor: 3 }
 * parseDouble('1e999')    // { status: 'ERANGE', cursor: 5 }
 *
 * @remarks
 * NaN compares false against both bounds and is therefore never rejected by
 * them.
 */
export function parseDouble(
    text: string,
    min: number = -Number.MAX_VALUE,
    max: number = Number.MAX_VALUE,
    start = 0
): ParseResult<number> {
    const scan = scanDouble(text, start)
    if (!scan) {
        return fail('EERR', start)
    }
    if (scan.outOfRange) {
        return fail('ERANGE', scan.cursor)
    }
    if (scan.value < min) {
        return fail('EMIN', scan.cursor)
    }
    if (scan.value > max) {
        return fail('EMAX', scan.cursor)
    }
    return succeed(text, scan.value, scan.cursor)
}
