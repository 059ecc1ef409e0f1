/**
 * Main entry point for the numeric input parsing action.
 *
 * Reads numeric text from action inputs, parses each value, publishes the
 * parsed values as outputs and writes a job summary.
 *
 * @module
 */

import {
    debug,
    endGroup,
    error,
    getBooleanInput,
    getInput,
    info,
    setFailed,
    setOutput,
    startGroup,
    warning
} from '@actions/core'

import { ActionInputs } from './action-inputs'
import { InputParseError } from './input-error'
import {
    Complex,
    COMPLEX_MAX,
    COMPLEX_MIN,
    COMPLEX_ZERO,
    describeStatus,
    isParsed,
    MAX_UNSIGNED,
    parseComplex,
    parseComplexPart,
    parseDouble,
    parseMemory,
    parseMemoryMagnitude,
    parseRangePolicy,
    ParseResult,
    parseUnsignedBigInt,
    parseUnsignedInteger,
    UINT64_MAX
} from './parse'
import { ParsedInput, writeSummary } from './summary'

/**
 * Formats a complex value as `a + bi` or `a - bi`.
 *
 * @example
 * formatComplex({ re: 3, im: -4 }) // Returns '3 - 4i'
 */
export function formatComplex({ re, im }: Complex): string {
    return `${re} ${im < 0 ? '-' : '+'} ${Math.abs(im)}i`
}

/**
 * Parses the `base` input. Radix validity itself is reported by the value
 * parsers as an invalid conversion radix.
 *
 * @throws {InputParseError} If the text is not an integer in [0, 36]
 */
function parseBase(text: string): number {
    const result = parseUnsignedInteger(text, 0, 36)
    if (result.status !== 'SUCCESS') {
        throw new InputParseError('base', text, result.status, result.cursor)
    }
    return result.value
}

/**
 * Turns a parse result into a published output.
 *
 * @throws {InputParseError} On failure, or on trailing text in strict mode
 */
function publish<T>(
    input: string,
    text: string,
    result: ParseResult<T>,
    strict: boolean,
    format: (value: T) => string
): ParsedInput {
    debug(`${input}: stopped at index ${result.cursor} of "${text}"`)
    if (!isParsed(result)) {
        throw new InputParseError(input, text, result.status, result.cursor)
    }
    if (result.status === 'EEND') {
        if (strict) {
            throw new InputParseError(input, text, result.status, result.cursor)
        }
        warning(`${input}: WARNING: ${describeStatus(result.status)}`)
    }

    const output = format(result.value)
    setOutput(input, output)
    info(`Parsed ${input}: "${output}"`)
    return { input, text, output, status: result.status }
}

/**
 * Parses every value input that was provided, in a fixed order, stopping at
 * the first failure.
 *
 * @param inputs - Action inputs
 * @param parsed - Receives each successfully parsed input
 * @throws {InputParseError} On the first input that cannot be used
 */
export function parseInputs(inputs: ActionInputs, parsed: ParsedInput[]): void {
    const { base, strict, rangePolicy } = inputs
    startGroup('Parse numeric inputs')
    try {
        if (inputs.unsigned !== '') {
            const result = parseUnsignedInteger(inputs.unsigned, 0, MAX_UNSIGNED, base)
            parsed.push(publish('unsigned', inputs.unsigned, result, strict, String))
        }
        if (inputs.uintmax !== '') {
            const result = parseUnsignedBigInt(inputs.uintmax, 0n, UINT64_MAX, base)
            parsed.push(publish('uintmax', inputs.uintmax, result, strict, String))
        }
        if (inputs.double !== '') {
            const result = parseDouble(inputs.double)
            parsed.push(publish('double', inputs.double, result, strict, String))
        }
        if (inputs.complexPart !== '') {
            const result = parseComplexPart(inputs.complexPart, COMPLEX_MIN, COMPLEX_MAX, COMPLEX_ZERO, {
                rangePolicy
            })
            const kind = result.kind
            parsed.push(
                publish<Complex>('complex-part', inputs.complexPart, result, strict, value =>
                    kind === 'IMAGINARY' ? `${value.im}i` : String(value.re)
                )
            )
            setOutput('complex-part-kind', kind.toLowerCase())
        }
        if (inputs.complex !== '') {
            const result = parseComplex(inputs.complex, COMPLEX_MIN, COMPLEX_MAX, { rangePolicy })
            parsed.push(publish('complex', inputs.complex, result, strict, formatComplex))
        }
        if (inputs.memory !== '') {
            const result = parseMemory(inputs.memory, 0, MAX_UNSIGNED, inputs.memoryMagnitude)
            parsed.push(publish('memory', inputs.memory, result, strict, String))
        }
    } finally {
        endGroup()
    }
}

/**
 * Main entry point for GitHub Action execution.
 *
 * Orchestrates the run:
 * - Read and validate configuration inputs
 * - Parse each provided value input and set its output
 * - Write GitHub Actions summary
 *
 * @throws {Error} Sets action as failed on any error
 */
export async function run(): Promise<void> {
    const parsed: ParsedInput[] = []
    let errorMessage = ''
    try {
        const inputs: ActionInputs = {
            unsigned: getInput('unsigned', { required: false }),
            uintmax: getInput('uintmax', { required: false }),
            double: getInput('double', { required: false }),
            complexPart: getInput('complex-part', { required: false }),
            complex: getInput('complex', { required: false }),
            memory: getInput('memory', { required: false }),
            base: parseBase(getInput('base', { required: false }) || '10'),
            memoryMagnitude: parseMemoryMagnitude(getInput('memory-magnitude', { required: false }) || 'MB'),
            rangePolicy: parseRangePolicy(getInput('range-policy', { required: false, trimWhitespace: true })),
            strict: getBooleanInput('strict', { required: false })
        }
        info('Parser inputs set')
        parseInputs(inputs, parsed)
    } catch (err) {
        errorMessage = err instanceof Error ? err.message : String(err)
        if (err instanceof InputParseError) {
            error(`${err.message}\ninput: "${err.text}"\ncursor: ${err.cursor}`)
        }
        setFailed(err instanceof Error ? err : errorMessage)
    } finally {
        try {
            await writeSummary({ parsed, errorMessage })
        } catch (err) {
            warning(`Failed to write job summary: ${err instanceof Error ? err.message : String(err)}`)
        }
    }
}
