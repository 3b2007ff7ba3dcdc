/**
 * Length-prefixed framing for the dtnd application-agent socket.
 *
 * Frame Structure (both directions):
 * ┌────────────────────────────────────────────────────────────────────┐
 * │ Length (8 bytes, unsigned big-endian)                              │
 * ├────────────────────────────────────────────────────────────────────┤
 * │ Body (MessagePack encoded, Length bytes)                           │
 * └────────────────────────────────────────────────────────────────────┘
 */

/** Size of the length prefix in bytes */
export const LENGTH_PREFIX_SIZE = 8

export function encodeLengthPrefix(length: number): Uint8Array {
  const prefix = new Uint8Array(LENGTH_PREFIX_SIZE)
  new DataView(prefix.buffer).setBigUint64(0, BigInt(length), false)
  return prefix
}

/**
 * Read the announced body length from an 8-byte prefix.
 */
export function decodeLengthPrefix(prefix: Uint8Array): bigint {
  const view = new DataView(prefix.buffer, prefix.byteOffset, prefix.byteLength)
  return view.getBigUint64(0, false)
}

/**
 * Prepend the length prefix to an encoded body.
 */
export function frame(body: Uint8Array): Uint8Array {
  const framed = new Uint8Array(LENGTH_PREFIX_SIZE + body.length)
  framed.set(encodeLengthPrefix(body.length), 0)
  framed.set(body, LENGTH_PREFIX_SIZE)
  return framed
}
