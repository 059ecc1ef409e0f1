/**
 * Parsers for complex numbers written as `a + bi` or `bi + a`.
 *
 * Each term is a double with an optional sign; imaginary terms end in the
 * imaginary unit and may omit a coefficient of one (`i`, `-i`). Either term
 * may be omitted, in which case its lane is zero.
 *
 * @module
 */

import { parseDouble } from './double'
import { skipSpace } from './scan'
import { fail, FailureStatus, isParsed, ParseFailure, ParseResult, ParseSuccess, succeed } from './status'
import { ComplexPartKind, isImaginaryUnit, parseImaginaryUnit, parseSign } from './tokens'

/** A complex value as two independent lanes. */
export type Complex = {
    re: number
    im: number
}

/** Smallest representable complex value, lane by lane. */
export const COMPLEX_MIN: Readonly<Complex> = Object.freeze({ re: -Number.MAX_VALUE, im: -Number.MAX_VALUE })

/** Largest representable complex value, lane by lane. */
export const COMPLEX_MAX: Readonly<Complex> = Object.freeze({ re: Number.MAX_VALUE, im: Number.MAX_VALUE })

export const COMPLEX_ZERO: Readonly<Complex> = Object.freeze({ re: 0, im: 0 })

/**
 * How a term outside the caller's bounds is reported:
 * `split` yields `EMIN`/`EMAX`, `unified` yields `ERANGE` for both.
 */
export type RangePolicy = 'split' | 'unified'

export type ComplexParseOptions = {
    /** Index to start scanning from (default 0) */
    start?: number

    /** Reporting of out-of-bounds terms (default `split`) */
    rangePolicy?: RangePolicy
}

export type ComplexPartResult =
    | (ParseSuccess<Complex> & { kind: Exclude<ComplexPartKind, 'NONE'> })
    | (ParseFailure & { kind: 'NONE' })

function laneOf(value: Readonly<Complex>, kind: Exclude<ComplexPartKind, 'NONE'>): number {
    return kind === 'REAL' ? value.re : value.im
}

function withLane(value: Readonly<Complex>, kind: Exclude<ComplexPartKind, 'NONE'>, x: number): Complex {
    return kind === 'REAL' ? { re: x, im: value.im } : { re: value.re, im: x }
}

function boundsStatus(
    x: number,
    kind: Exclude<ComplexPartKind, 'NONE'>,
    min: Readonly<Complex>,
    max: Readonly<Complex>,
    policy: RangePolicy
): FailureStatus | undefined {
    if (x < laneOf(min, kind)) {
        return policy === 'split' ? 'EMIN' : 'ERANGE'
    }
    if (x > laneOf(max, kind)) {
        return policy === 'split' ? 'EMAX' : 'ERANGE'
    }
    return undefined
}

function partFailure(status: FailureStatus, cursor: number): ComplexPartResult {
    return { ...fail(status, cursor), kind: 'NONE' }
}

/**
 * Parses one signed real or imaginary term into its lane of `accumulator`.
 *
 * The returned value is a copy of `accumulator` with only the parsed lane
 * replaced, so parsing an imaginary term keeps the real lane already there.
 *
 * @param text - Input text
 * @param min - Inclusive lower bound, per lane
 * @param max - Inclusive upper bound, per lane
 * @param accumulator - Value whose other lane is carried over
 * @param options - Start index and range policy
 *
 * @example
 * parseComplexPart('-2.5i', COMPLEX_MIN, COMPLEX_MAX, { re: 7, im: 0 })
 * // { status: 'SUCCESS', kind: 'IMAGINARY', value: { re: 7, im: -2.5 }, cursor: 5 }
 * parseComplexPart('+-3') // { status: 'EFORM', kind: 'NONE', cursor: 2 }
 */
export function parseComplexPart(
    text: string,
    min: Readonly<Complex> = COMPLEX_MIN,
    max: Readonly<Complex> = COMPLEX_MAX,
    accumulator: Readonly<Complex> = COMPLEX_ZERO,
    options: ComplexParseOptions = {}
): ComplexPartResult {
    const { start = 0, rangePolicy = 'split' } = options

    // The sign is read here rather than by the double parser so that a bare
    // signed imaginary unit ("-i") is recognized
    const leading = parseSign(text, skipSpace(text, start))
    const sign = leading.sign === 0 ? 1 : leading.sign

    const repeated = parseSign(text, leading.cursor)
    if (repeated.sign !== 0) {
        return partFailure('EFORM', repeated.cursor)
    }

    let cursor = repeated.cursor
    let coefficient: number
    const parsed = parseDouble(text, -Number.MAX_VALUE, Number.MAX_VALUE, cursor)
    if (parsed.status === 'EERR') {
        if (!isImaginaryUnit(text[cursor])) {
            return partFailure('EFORM', cursor)
        }
        coefficient = 1.0
    } else if (!isParsed(parsed)) {
        return partFailure(parsed.status, parsed.cursor)
    } else {
        coefficient = parsed.value
        cursor = parsed.cursor
    }

    const x = sign * coefficient
    const unit = parseImaginaryUnit(text, cursor)

    const outOfBounds = boundsStatus(x, unit.kind, min, max, rangePolicy)
    if (outOfBounds) {
        return partFailure(outOfBounds, unit.cursor)
    }

    return { ...succeed(text, withLane(accumulator, unit.kind, x), unit.cursor), kind: unit.kind }
}

/**
 * Parses a complex number of at most one real and one imaginary term joined
 * by `+` or `-`.
 *
 * When the text after the first term does not form a valid second term (no
 * operator, a malformed or out-of-bounds term, or a second term of the same
 * kind), the first term alone is returned with status `EEND` and the cursor
 * right after it.
 *
 * @example
 * parseComplex('3 - 4i')  // { status: 'SUCCESS', value: { re: 3, im: -4 }, cursor: 6 }
 * parseComplex('5i')      // { status: 'SUCCESS', value: { re: 0, im: 5 }, cursor: 2 }
 * parseComplex('3+4')     // { status: 'EEND', value: { re: 3, im: 0 }, cursor: 1 }
 */
export function parseComplex(
    text: string,
    min: Readonly<Complex> = COMPLEX_MIN,
    max: Readonly<Complex> = COMPLEX_MAX,
    options: ComplexParseOptions = {}
): ParseResult<Complex> {
    const { start = 0, rangePolicy = 'split' } = options

    const first = parseComplexPart(text, min, max, COMPLEX_ZERO, {
        start: skipSpace(text, start),
        rangePolicy
    })
    if (first.kind === 'NONE') {
        return fail(first.status, first.cursor)
    }
    if (first.status === 'SUCCESS') {
        return { status: first.status, value: first.value, cursor: first.cursor }
    }

    // Anything that goes wrong from here on leaves only the first term parsed
    const checkpoint: ParseSuccess<Complex> = { status: 'EEND', value: first.value, cursor: first.cursor }

    const operator = parseSign(text, first.cursor)
    if (operator.sign === 0) {
        return checkpoint
    }

    const second = parseComplexPart(text, COMPLEX_MIN, COMPLEX_MAX, COMPLEX_ZERO, {
        start: operator.cursor,
        rangePolicy
    })
    if (second.kind === 'NONE' || second.kind === first.kind) {
        return checkpoint
    }

    const term = operator.sign * laneOf(second.value, second.kind)
    if (boundsStatus(term, second.kind, min, max, rangePolicy)) {
        return checkpoint
    }

    return succeed(text, withLane(first.value, second.kind, term), second.cursor)
}
