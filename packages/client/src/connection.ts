/**
 * Byte-stream connections to dtnd.
 *
 * A Connection carries exactly one request/reply exchange. The transport call
 * only needs to write bytes, read an exact number of bytes back, and close.
 */

import { createConnection } from "node:net"
import type { Duplex } from "node:stream"
import { getLogger } from "@logtape/logtape"
import { ConnectionNotFoundError, TransportError } from "./errors.js"

const logger = getLogger(["dtnclient", "connection"])

export interface Connection {
  write(bytes: Uint8Array): Promise<void>
  /**
   * Resolve with `length` bytes, or with whatever arrived before the peer
   * closed the stream.
   */
  readExactly(length: number): Promise<Uint8Array>
  close(): void
}

/** Opens a fresh connection for each call */
export type ConnectionFactory = () => Promise<Connection>

export type StreamConnectionOptions = {
  /** Deadline for the whole exchange, counted from construction */
  timeoutMs?: number
}

type PendingRead = {
  length: number
  resolve: (bytes: Uint8Array) => void
  reject: (error: Error) => void
}

function toTransportError(error: Error): Error {
  if (error instanceof TransportError || error instanceof ConnectionNotFoundError) {
    return error
  }
  return new TransportError("io", `Socket error: ${error.message}`, {
    cause: error,
  })
}

/**
 * Adapts a Node duplex stream to a Connection, buffering incoming chunks
 * until a read can be satisfied.
 */
export class StreamConnection implements Connection {
  private chunks: Uint8Array[] = []
  private buffered = 0
  private ended = false
  private failure: Error | null = null
  private pending: PendingRead | null = null
  private deadline: NodeJS.Timeout | undefined

  constructor(
    private readonly stream: Duplex,
    options: StreamConnectionOptions = {},
  ) {
    stream.on("data", (chunk: unknown) => {
      if (chunk instanceof Uint8Array) {
        this.chunks.push(chunk)
        this.buffered += chunk.length
      } else if (typeof chunk === "string") {
        const bytes = Buffer.from(chunk)
        this.chunks.push(bytes)
        this.buffered += bytes.length
      }
      this.settle()
    })
    stream.on("end", () => {
      this.ended = true
      this.settle()
    })
    stream.on("close", () => {
      this.ended = true
      this.settle()
    })
    stream.on("error", (error: Error) => {
      this.failure = toTransportError(error)
      this.settle()
    })

    const { timeoutMs } = options
    if (timeoutMs !== undefined) {
      this.deadline = setTimeout(() => {
        logger.debug("deadline of {timeoutMs} ms expired", { timeoutMs })
        stream.destroy(
          new TransportError(
            "timeout",
            `Timed out after ${timeoutMs} ms waiting for dtnd`,
          ),
        )
      }, timeoutMs)
    }
  }

  write(bytes: Uint8Array): Promise<void> {
    if (this.failure) {
      return Promise.reject(this.failure)
    }
    return new Promise((resolve, reject) => {
      this.stream.write(bytes, error => {
        if (error) {
          reject(this.failure ?? toTransportError(error))
        } else {
          resolve()
        }
      })
    })
  }

  readExactly(length: number): Promise<Uint8Array> {
    if (this.pending) {
      return Promise.reject(
        new TransportError("io", "A read is already in progress"),
      )
    }
    return new Promise((resolve, reject) => {
      this.pending = { length, resolve, reject }
      this.settle()
    })
  }

  close(): void {
    clearTimeout(this.deadline)
    this.stream.destroy()
  }

  private settle(): void {
    const pending = this.pending
    if (!pending) {
      return
    }
    if (this.failure) {
      this.pending = null
      pending.reject(this.failure)
    } else if (this.buffered >= pending.length) {
      this.pending = null
      pending.resolve(this.take(pending.length))
    } else if (this.ended) {
      this.pending = null
      pending.resolve(this.take(this.buffered))
    }
  }

  private take(length: number): Uint8Array {
    const all = Buffer.concat(this.chunks)
    const rest = all.subarray(length)
    this.chunks = rest.length > 0 ? [rest] : []
    this.buffered = rest.length
    return Uint8Array.from(all.subarray(0, length))
  }
}

export function streamConnection(
  stream: Duplex,
  options: StreamConnectionOptions = {},
): Connection {
  return new StreamConnection(stream, options)
}

function errorCode(error: Error): unknown {
  return "code" in error ? error.code : undefined
}

/**
 * Connection factory for dtnd's Unix-domain application-agent socket.
 */
export function unixSocketConnector(
  socketPath: string,
  options: StreamConnectionOptions = {},
): ConnectionFactory {
  return () =>
    new Promise((resolve, reject) => {
      const socket = createConnection(socketPath)
      const connection = new StreamConnection(socket, options)

      const onError = (error: Error) => {
        connection.close()
        const code = errorCode(error)
        if (code === "ENOENT" || code === "ECONNREFUSED") {
          reject(new ConnectionNotFoundError(socketPath, { cause: error }))
        } else {
          reject(toTransportError(error))
        }
      }

      socket.once("error", onError)
      socket.once("connect", () => {
        socket.off("error", onError)
        logger.debug("connected to {socketPath}", { socketPath })
        resolve(connection)
      })
    })
}
