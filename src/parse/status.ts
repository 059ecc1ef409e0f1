/**
 * Status vocabulary and result types shared by every parser.
 *
 * Parsers never throw: each one returns a result whose `status` tells the
 * caller whether a value was recognized and whether text was left over.
 *
 * @module
 */

import { isSpace } from './scan'

/** A value was recognized and nothing but whitespace follows it. */
export type CompleteStatus = 'SUCCESS'

/** A value was recognized but unconsumed text remains. */
export type TrailingStatus = 'EEND'

/**
 * Hard failures. No value is produced.
 *
 * - `EERR`: no parseable value
 * - `ERANGE`: the value does not fit the target type
 * - `EMIN` / `EMAX`: the value is outside the caller's bounds
 * - `EBASE`: invalid conversion radix
 * - `EFORM`: structurally invalid token sequence
 */
export type FailureStatus = 'EERR' | 'ERANGE' | 'EMIN' | 'EMAX' | 'EBASE' | 'EFORM'

export type ParseStatus = CompleteStatus | TrailingStatus | FailureStatus

export const PARSE_STATUSES: readonly ParseStatus[] = [
    'SUCCESS',
    'EERR',
    'ERANGE',
    'EMIN',
    'EMAX',
    'EEND',
    'EBASE',
    'EFORM'
]

/**
 * A recognized value. `cursor` is the index of the first character not
 * consumed.
 */
export type ParseSuccess<T> = {
    status: CompleteStatus | TrailingStatus
    value: T
    cursor: number
}

/**
 * A failed parse. `cursor` marks where scanning stopped and is only meant for
 * diagnostics.
 */
export type ParseFailure = {
    status: FailureStatus
    cursor: number
}

export type ParseResult<T> = ParseSuccess<T> | ParseFailure

const STATUS_MESSAGES: Record<ParseStatus, string> = {
    SUCCESS: 'Parsed successfully',
    EERR: 'Unknown parse error',
    ERANGE: 'Argument out of range',
    EMIN: 'Argument too small',
    EMAX: 'Argument too large',
    EEND: 'Argument not fully parsed',
    EBASE: 'Invalid conversion radix',
    EFORM: 'Incorrect argument format'
}

/**
 * Narrows a result to the variants that carry a value.
 *
 * @example
 * const result = parseDouble('2.5kg')
 * if (isParsed(result)) {
 *     result.value // 2.5
 * }
 */
export function isParsed<T>(result: ParseResult<T>): result is ParseSuccess<T> {
    return result.status === 'SUCCESS' || result.status === 'EEND'
}

/**
 * Human-readable description of a status.
 */
export function describeStatus(status: ParseStatus): string {
    return STATUS_MESSAGES[status]
}

/**
 * Status of a parse that recognized a value ending at `cursor`.
 */
export function endStatus(text: string, cursor: number): CompleteStatus | TrailingStatus {
    for (let i = cursor; i < text.length; i++) {
        if (!isSpace(text[i])) {
            return 'EEND'
        }
    }
    return 'SUCCESS'
}

export function succeed<T>(text: string, value: T, cursor: number): ParseSuccess<T> {
    return { status: endStatus(text, cursor), value, cursor }
}

export function fail(status: FailureStatus, cursor: number): ParseFailure {
    return { status, cursor }
}
