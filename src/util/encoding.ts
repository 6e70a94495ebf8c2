/**
 * Percent-encoding as SigV4 expects it (RFC 3986, uppercase hex).
 * @module
 */

const DIGITS = '0123456789ABCDEF'

const isUnreserved = (x: number) =>
    (0x61 <= (x | 0x20) && (x | 0x20) <= 0x7A) || (0x30 <= x && x <= 0x39) ||
    x === 0x2D || x === 0x2E || x === 0x5F || x === 0x7E

/**
 * Percent-encode the UTF-8 bytes of a string. Unreserved characters
 * (letters, digits, `-._~`) are kept, and so is any ASCII character
 * listed in `safe` (e.g. `'/'` for object keys).
 */
export function uriEncode(str: string, safe: string = ''): string {
    let result = ''
    for (const x of Buffer.from(str)) {
        result += (isUnreserved(x) || (x < 0x80 && safe.includes(String.fromCharCode(x)))) ?
            String.fromCharCode(x) : `%${DIGITS[x >> 4]}${DIGITS[x & 0xF]}`
    }
    return result
}
