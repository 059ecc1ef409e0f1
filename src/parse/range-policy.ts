/**
 * Parser for the complex bounds reporting policy.
 *
 * @module
 */

import type { RangePolicy } from './complex'

const RANGE_POLICY_VALUES: readonly RangePolicy[] = ['split', 'unified']

function isRangePolicy(value: string): value is RangePolicy {
    return RANGE_POLICY_VALUES.some(policy => policy === value)
}

/**
 * Parses a range policy name.
 *
 * @param policyKey - Policy name (case-insensitive) or empty for the default
 * @throws {Error} If the policy is not recognized
 *
 * @example
 * parseRangePolicy('')        // Returns 'split'
 * parseRangePolicy('Unified') // Returns 'unified'
 */
export const parseRangePolicy = (policyKey: string): RangePolicy => {
    if (policyKey === '') {
        return 'split'
    }
    const policy = policyKey.toLowerCase()
    if (!isRangePolicy(policy)) {
        throw new Error('Range policy has unknown value')
    }
    return policy
}
