/**
 * Copies only the graphical characters of a text.
 *
 * @param text - Source text
 * @param maxLength - Maximum number of characters to keep
 * @returns `text` without whitespace and control characters, truncated to
 * `maxLength` characters
 *
 * @example
 * stripNonGraphical(' 3 + 4 i\n')  // Returns '3+4i'
 * stripNonGraphical('1 2 3 4', 2)  // Returns '12'
 */
export function stripNonGraphical(text: string, maxLength = Infinity): string {
    let result = ''
    let length = 0
    for (const c of text) {
        if (length >= maxLength) {
            break
        }
        if (/[\s\p{Cc}\p{Cf}]/u.test(c)) {
            continue
        }
        result += c
        length++
    }
    return result
}
