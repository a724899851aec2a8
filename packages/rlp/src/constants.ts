/** Highest byte value that encodes as itself */
export const SINGLE_BYTE_MAX = 0x7f

/** Prefix base of byte string items */
export const STRING_OFFSET = 0x80

/** Prefix base of list items */
export const LIST_OFFSET = 0xc0

/** Payloads up to this length keep their length in the prefix byte */
export const SHORT_PAYLOAD_MAX = 55

/** Longest length-of-length field a decoded item may carry */
export const MAX_LENGTH_BYTES = 6
