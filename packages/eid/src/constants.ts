/**
 * Grammar constants for the `dtn:` and `ipn:` URI schemes.
 */

/** The null endpoint, the only accepted spelling of "no endpoint" */
export const DTN_NONE = "dtn:none"

export const DTN_PREFIX = "dtn://"

export const IPN_PREFIX = "ipn:"

/**
 * Allowed characters for a `dtn` node name: RFC 3986 `unreserved` and
 * `sub-delims` (reg-name), as referenced by RFC 9171 section 4.2.5.1.1.
 * The empty node is accepted.
 */
export const DTN_NODE_PATTERN = /^[A-Za-z0-9\-._~!$&'()*+,;=]*$/

export const ASCII_PATTERN = /^[\x00-\x7F]*$/

/**
 * A base-10 integer as `int(text, 10)` reads it: surrounding whitespace, an
 * optional sign, and single underscores between digits.
 */
export const IPN_NUMBER_PATTERN = /^\s*[+-]?[0-9]+(?:_[0-9]+)*\s*$/

/** Largest IPN node or service number (unsigned 64-bit) */
export const IPN_MAX_NUMBER = 0xffff_ffff_ffff_ffffn
