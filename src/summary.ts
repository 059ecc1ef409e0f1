/**
 * GitHub Actions job summary writer.
 *
 * Creates markdown summary with the parsed values.
 *
 * @module
 */

import { summary } from '@actions/core'
import type { CompleteStatus, TrailingStatus } from './parse'

/**
 * One successfully parsed action input.
 */
export interface ParsedInput {
    /** Input name */
    input: string

    /** Raw input text */
    text: string

    /** Value as published in the output of the same name */
    output: string

    status: CompleteStatus | TrailingStatus
}

interface SummaryParams {
    parsed: ParsedInput[]
    errorMessage?: string
}

/**
 * Writes parsing summary to GitHub Actions job summary.
 *
 * Includes:
 * - Every parsed input with its value, flagged when text was left unparsed
 * - Success/error status
 *
 * @example
 * await writeSummary({
 *   parsed: [{ input: 'memory', text: '2GB', output: '2000000000', status: 'SUCCESS' }]
 * })
 * // Creates summary with item: memory: 2000000000
 */
export async function writeSummary({ parsed, errorMessage }: SummaryParams) {
    const items = parsed.map(
        ({ input, output, status }) => `${input}: ${output}${status === 'EEND' ? ' (not fully parsed)' : ''}`
    )
    if (errorMessage) {
        items.push(`❌ Error: ${errorMessage}`)
    } else {
        items.push('✅ Success')
    }
    await summary.addHeading('Numeric Input Parsing Summary', 2).addList(items).write()
}
