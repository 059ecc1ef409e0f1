import { describeStatus, FailureStatus, TrailingStatus } from './parse'

/**
 * Raised when an action input cannot be used as a value.
 */
export class InputParseError extends Error {
    constructor(
        public readonly input: string,
        public readonly text: string,
        public readonly status: FailureStatus | TrailingStatus,
        public readonly cursor: number
    ) {
        super(`${input}: ${describeStatus(status)}`)
        this.name = 'InputParseError'
    }
}
