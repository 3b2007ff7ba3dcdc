import { mkdtempSync } from "node:fs"
import { tmpdir } from "node:os"
import { join } from "node:path"
import { Duplex } from "node:stream"
import { describe, expect, it } from "vitest"
import { StreamConnection, streamConnection, unixSocketConnector } from "./connection.js"
import { ConnectionNotFoundError, TransportError } from "./errors.js"

/**
 * A duplex whose readable side is fed by the test and whose writable side
 * records what was written.
 */
function createPeer() {
  const written: number[][] = []
  const stream = new Duplex({
    read() {},
    write(chunk: Buffer, _encoding, callback) {
      written.push(Array.from(chunk))
      callback()
    },
  })
  return { stream, written }
}

async function captureError(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise
  } catch (error) {
    return error
  }
  throw new Error("expected the promise to reject")
}

describe("StreamConnection", () => {
  it("should write bytes to the stream", async () => {
    const { stream, written } = createPeer()
    const connection = streamConnection(stream)

    await connection.write(new Uint8Array([1, 2, 3]))

    expect(written).toEqual([[1, 2, 3]])
  })

  it("should gather chunks until a read is satisfied", async () => {
    const { stream } = createPeer()
    const connection = streamConnection(stream)

    const read = connection.readExactly(4)
    stream.push(Buffer.from([1, 2]))
    stream.push(Buffer.from([3, 4, 5]))

    expect(Array.from(await read)).toEqual([1, 2, 3, 4])
    expect(Array.from(await connection.readExactly(1))).toEqual([5])
  })

  it("should serve reads from bytes that arrived earlier", async () => {
    const { stream } = createPeer()
    const connection = streamConnection(stream)

    stream.push(Buffer.from([7, 8, 9]))
    await new Promise(resolve => setImmediate(resolve))

    expect(Array.from(await connection.readExactly(2))).toEqual([7, 8])
  })

  it("should return what arrived when the stream ends early", async () => {
    const { stream } = createPeer()
    const connection = streamConnection(stream)

    const read = connection.readExactly(100)
    stream.push(Buffer.from([1, 2, 3]))
    stream.push(null)

    expect(Array.from(await read)).toEqual([1, 2, 3])
    expect((await connection.readExactly(8)).length).toBe(0)
  })

  it("should report stream errors as I/O transport errors", async () => {
    const { stream } = createPeer()
    const connection = streamConnection(stream)

    const read = connection.readExactly(8)
    const cause = new Error("connection reset")
    stream.destroy(cause)

    const error = await captureError(read)
    expect(error).toBeInstanceOf(TransportError)
    if (error instanceof TransportError) {
      expect(error.code).toBe("io")
      expect(error.message).toBe("Socket error: connection reset")
      expect(error.cause).toBe(cause)
    }
  })

  it("should reject writes after the stream failed", async () => {
    const { stream } = createPeer()
    const connection = streamConnection(stream)
    stream.destroy(new Error("broken pipe"))
    await new Promise(resolve => setImmediate(resolve))

    const error = await captureError(connection.write(new Uint8Array([1])))

    expect(error).toBeInstanceOf(TransportError)
    expect(error).toHaveProperty("message", "Socket error: broken pipe")
  })

  it("should fail with a timeout once the deadline passes", async () => {
    const { stream } = createPeer()
    const connection = new StreamConnection(stream, { timeoutMs: 10 })

    const error = await captureError(connection.readExactly(8))

    expect(error).toBeInstanceOf(TransportError)
    if (error instanceof TransportError) {
      expect(error.code).toBe("timeout")
      expect(error.message).toBe("Timed out after 10 ms waiting for dtnd")
    }
    expect(stream.destroyed).toBe(true)
  })

  it("should destroy the stream on close", () => {
    const { stream } = createPeer()
    const connection = new StreamConnection(stream, { timeoutMs: 10_000 })

    connection.close()

    expect(stream.destroyed).toBe(true)
  })
})

describe("unixSocketConnector()", () => {
  it("should report a missing socket as ConnectionNotFoundError", async () => {
    const socketPath = join(
      mkdtempSync(join(tmpdir(), "dtnclient-connection-test-")),
      "missing.socket",
    )
    const connect = unixSocketConnector(socketPath)

    const error = await captureError(connect())

    expect(error).toBeInstanceOf(ConnectionNotFoundError)
    if (error instanceof ConnectionNotFoundError) {
      expect(error.socketPath).toBe(socketPath)
      expect(error.message).toBe(`No dtnd socket at ${socketPath}`)
    }
  })
})
