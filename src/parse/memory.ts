/**
 * Parser for memory size specifications.
 *
 * Converts human-readable memory strings (e.g., '128MB', '1.5 kB', '2') to a
 * byte count using decimal magnitudes.
 *
 * @module
 */

import { parseDouble } from './double'
import { skipSpace } from './scan'
import { fail, isParsed, ParseResult, succeed } from './status'
import { parseMemoryUnit } from './tokens'
import { MAX_UNSIGNED } from './unsigned'

/** Power of ten of each memory unit */
export const MemoryMagnitude = {
    B: 0,
    KB: 3,
    MB: 6,
    GB: 9,
    TB: 12,
    PB: 15,
    EB: 18,
    ZB: 21,
    YB: 24
} as const

export type MemoryMagnitudeName = keyof typeof MemoryMagnitude

const MEMORY_MAGNITUDE_NAMES = Object.keys(MemoryMagnitude)

function isMemoryMagnitudeName(name: string): name is MemoryMagnitudeName {
    return MEMORY_MAGNITUDE_NAMES.includes(name)
}

/**
 * Parses a memory magnitude name to its power of ten.
 *
 * @param name - Unit name (case-insensitive) or empty for bytes
 * @throws {Error} If the name is not recognized
 *
 * @example
 * parseMemoryMagnitude('MB') // Returns 6
 * parseMemoryMagnitude('gb') // Returns 9
 * parseMemoryMagnitude('')   // Returns 0
 */
export function parseMemoryMagnitude(name: string): number {
    if (name === '') {
        return MemoryMagnitude.B
    }
    const key = name.toUpperCase()
    if (!isMemoryMagnitudeName(key)) {
        throw new Error('Memory magnitude has unknown value')
    }
    return MemoryMagnitude[key]
}

/**
 * Parses a non-negative amount with an optional unit suffix into bytes.
 *
 * Without a suffix the amount is taken in `magnitude`. A suffix that is not a
 * memory unit is left unconsumed: the amount is taken in `magnitude` and the
 * result is `EEND` with the cursor right after the number. The scaled value
 * is truncated toward zero.
 *
 * @param text - Input text
 * @param min - Inclusive lower bound in bytes
 * @param max - Inclusive upper bound in bytes
 * @param magnitude - Power of ten assumed when no unit is given
 * @param start - Index to start scanning from
 *
 * @example
 * parseMemory('2GB')                         // { status: 'SUCCESS', value: 2000000000, cursor: 3 }
 * parseMemory('5', 0, MAX_UNSIGNED, MemoryMagnitude.MB) // { status: 'SUCCESS', value: 5000000, cursor: 1 }
 * parseMemory('1.5 kB')                      // { status: 'SUCCESS', value: 1500, cursor: 6 }
 */
export function parseMemory(
    text: string,
    min = 0,
    max: number = MAX_UNSIGNED,
    magnitude: number = MemoryMagnitude.B,
    start = 0
): ParseResult<number> {
    const amount = parseDouble(text, 0, Number.MAX_VALUE, skipSpace(text, start))
    if (!isParsed(amount)) {
        return amount
    }

    let cursor = amount.cursor
    let exponent = magnitude
    if (amount.status === 'EEND') {
        const unit = parseMemoryUnit(text, cursor)
        if (unit) {
            exponent = unit.magnitude
            cursor = unit.cursor
        }
    }

    const scaled = amount.value * 10 ** exponent
    if (Number.isNaN(scaled) || scaled < 0 || scaled > MAX_UNSIGNED) {
        return fail('ERANGE', cursor)
    }

    // Adding zero turns -0 into 0
    const bytes = Math.trunc(scaled) + 0
    if (bytes < min) {
        return fail('EMIN', cursor)
    }
    if (bytes > max) {
        return fail('EMAX', cursor)
    }
    return succeed(text, bytes, cursor)
}
