/**
 * Numeric text parsers.
 *
 * Centralizes exports for all parse modules.
 *
 * @module
 */

export {
    describeStatus,
    endStatus,
    isParsed,
    PARSE_STATUSES,
    type CompleteStatus,
    type FailureStatus,
    type ParseFailure,
    type ParseResult,
    type ParseStatus,
    type ParseSuccess,
    type TrailingStatus
} from './status'
export { MAX_UNSIGNED, NumberBase, parseUnsignedBigInt, parseUnsignedInteger, UINT64_MAX } from './unsigned'
export { parseDouble } from './double'
export {
    BYTE_PREFIXES,
    BYTE_UNIT,
    IMAGINARY_UNIT,
    parseImaginaryUnit,
    parseMemoryUnit,
    parseSign,
    type ComplexPartKind,
    type ImaginaryUnitToken,
    type MemoryUnitToken,
    type Sign,
    type SignToken
} from './tokens'
export {
    COMPLEX_MAX,
    COMPLEX_MIN,
    COMPLEX_ZERO,
    parseComplex,
    parseComplexPart,
    type Complex,
    type ComplexParseOptions,
    type ComplexPartResult,
    type RangePolicy
} from './complex'
export { MemoryMagnitude, parseMemory, parseMemoryMagnitude, type MemoryMagnitudeName } from './memory'
export { stripNonGraphical } from './graph'
export { parseRangePolicy } from './range-policy'
