import { describe, expect, it } from "vitest"
import {
  decodeLengthPrefix,
  encodeLengthPrefix,
  frame,
  LENGTH_PREFIX_SIZE,
} from "./framing.js"

describe("framing", () => {
  it("should write the length as 8 big-endian bytes", () => {
    expect(Array.from(encodeLengthPrefix(0x0102))).toEqual([0, 0, 0, 0, 0, 0, 1, 2])
    expect(encodeLengthPrefix(0).length).toBe(LENGTH_PREFIX_SIZE)
  })

  it("should read the full unsigned 64-bit range", () => {
    expect(decodeLengthPrefix(new Uint8Array([0, 0, 0, 0, 0, 0, 0, 100]))).toBe(100n)
    expect(decodeLengthPrefix(new Uint8Array(8).fill(0xff))).toBe(2n ** 64n - 1n)
  })

  it("should respect the view's offset", () => {
    const bytes = new Uint8Array([9, 9, 0, 0, 0, 0, 0, 0, 0, 7])
    expect(decodeLengthPrefix(bytes.subarray(2))).toBe(7n)
  })

  it("should prepend the prefix to the body", () => {
    expect(Array.from(frame(new Uint8Array([0xaa, 0xbb, 0xcc])))).toEqual([
      0, 0, 0, 0, 0, 0, 0, 3, 0xaa, 0xbb, 0xcc,
    ])
  })
})
