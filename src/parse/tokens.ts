/**
 * Single-token recognizers used by the complex and memory parsers.
 *
 * None of them fail: absence of the token is a regular outcome.
 *
 * @module
 */

import { skipSpace } from './scan'

/** `+1`, `-1`, or 0 when no sign was present. */
export type Sign = 1 | -1 | 0

/** Which lane of a complex value a term belongs to. `NONE` accompanies failures. */
export type ComplexPartKind = 'REAL' | 'IMAGINARY' | 'NONE'

/** Symbol denoting the imaginary unit (case-insensitive) */
export const IMAGINARY_UNIT = 'i'

/** Symbol terminating every memory unit (case-insensitive) */
export const BYTE_UNIT = 'B'

/** Magnitude prefixes in ascending order, each one three decimal orders above the last */
export const BYTE_PREFIXES = ['k', 'M', 'G', 'T', 'P', 'E', 'Z', 'Y'] as const

export type SignToken = {
    sign: Sign
    cursor: number
}

export type ImaginaryUnitToken = {
    kind: Exclude<ComplexPartKind, 'NONE'>
    cursor: number
}

export type MemoryUnitToken = {
    /** Power of ten selected by the unit prefix */
    magnitude: number
    cursor: number
}

export function isImaginaryUnit(c: string | undefined): boolean {
    return c !== undefined && c.toLowerCase() === IMAGINARY_UNIT
}

/**
 * Consumes at most one `+` or `-` after optional whitespace.
 *
 * @example
 * parseSign(' -3')  // { sign: -1, cursor: 2 }
 * parseSign(' 3')   // { sign: 0, cursor: 1 }
 */
export function parseSign(text: string, start = 0): SignToken {
    const cursor = skipSpace(text, start)
    switch (text[cursor]) {
        case '+':
            return { sign: 1, cursor: cursor + 1 }
        case '-':
            return { sign: -1, cursor: cursor + 1 }
        default:
            return { sign: 0, cursor }
    }
}

/**
 * Recognizes the imaginary unit after optional whitespace. Without one the
 * term is real and the cursor does not move.
 */
export function parseImaginaryUnit(text: string, start = 0): ImaginaryUnitToken {
    const cursor = skipSpace(text, start)
    if (!isImaginaryUnit(text[cursor])) {
        return { kind: 'REAL', cursor: start }
    }
    return { kind: 'IMAGINARY', cursor: cursor + 1 }
}

/**
 * Recognizes a memory unit: an optional magnitude prefix followed by a
 * mandatory `B`, case-insensitive, after optional whitespace.
 *
 * @returns The unit's magnitude and end cursor, or `undefined` when no
 * complete unit is present
 *
 * @example
 * parseMemoryUnit('GB')  // { magnitude: 9, cursor: 2 }
 * parseMemoryUnit(' b')  // { magnitude: 0, cursor: 2 }
 * parseMemoryUnit('G')   // undefined
 */
export function parseMemoryUnit(text: string, start = 0): MemoryUnitToken | undefined {
    let cursor = skipSpace(text, start)
    let magnitude = 0

    const prefix = text[cursor]?.toUpperCase()
    const index = BYTE_PREFIXES.findIndex(p => p.toUpperCase() === prefix)
    if (index >= 0) {
        magnitude = (index + 1) * 3
        cursor++
    }

    if (text[cursor]?.toUpperCase() !== BYTE_UNIT) {
        return undefined
    }
    return { magnitude, cursor: cursor + 1 }
}
