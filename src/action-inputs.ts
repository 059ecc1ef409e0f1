import type { RangePolicy } from './parse'

/**
 * Complete configuration for one parsing run.
 * Parsed from GitHub Action inputs.
 *
 * Value inputs hold raw text; an empty string means the input was not given.
 */
export type ActionInputs = {
    /** Unsigned integer fitting a JavaScript number */
    unsigned: string

    /** Unsigned 64-bit integer */
    uintmax: string

    /** Double-precision number */
    double: string

    /** Single real or imaginary term (e.g., '-2.5', '3i', 'i') */
    complexPart: string

    /** Complex number (e.g., '3 + 4i', '-2i - 1') */
    complex: string

    /** Memory size with optional unit (e.g., '512MB', '1.5 GB', '64') */
    memory: string

    /** Radix for the integer inputs, 0 to detect `0x`/`0` prefixes (default: 10) */
    base: number

    /** Power of ten assumed for memory without a unit (default: 6, megabytes) */
    memoryMagnitude: number

    /** Reporting of out-of-bounds complex terms (default: 'split') */
    rangePolicy: RangePolicy

    /** Fail on values followed by unparsed text instead of warning */
    strict: boolean
}
