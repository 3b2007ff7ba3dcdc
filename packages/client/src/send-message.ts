/**
 * One framed request/reply exchange with dtnd.
 */

import { getLogger, type Logger } from "@logtape/logtape"
import {
  decode,
  encode,
  formatMessageType,
  hasType,
  isResponse,
  type Message,
  type MessageDecoderRegistry,
  type ResponseMessage,
  type ResponseTypeId,
} from "@dtnclient/wire-format"
import type { ConnectionFactory } from "./connection.js"
import { DataError, DTNDError } from "./errors.js"
import { decodeLengthPrefix, frame, LENGTH_PREFIX_SIZE } from "./framing.js"

export type SendMessageOptions = {
  logger?: Logger
  /** Passed through to `decode` for replies that fail to decode */
  dumpDirectory?: string | false
  registry?: MessageDecoderRegistry
}

const MAX_DATA_LENGTH = BigInt(Number.MAX_SAFE_INTEGER)

/**
 * Send a message over a fresh connection and return dtnd's reply.
 *
 * The connection is closed before this settles, whatever the outcome.
 *
 * @throws {DataError} on a bad length prefix, a short reply, or a reply that
 * is not in the Response family
 * @throws {DTNDError} when the reply carries an error string
 */
export async function sendMessage(
  connect: ConnectionFactory,
  message: Message,
  options: SendMessageOptions = {},
): Promise<ResponseMessage> {
  const log = options.logger ?? getLogger(["dtnclient", "transport"])
  const connection = await connect()

  try {
    const body = encode(message)
    log.debug("sending {type} ({length} bytes)", {
      type: formatMessageType(message.type),
      length: body.length,
    })
    await connection.write(frame(body))

    const prefix = await connection.readExactly(LENGTH_PREFIX_SIZE)
    if (prefix.length < LENGTH_PREFIX_SIZE) {
      throw new DataError(
        `Received truncated length prefix: expected ${LENGTH_PREFIX_SIZE} bytes, got ${prefix.length}`,
      )
    }
    const announced = decodeLengthPrefix(prefix)
    if (announced === 0n || announced > MAX_DATA_LENGTH) {
      throw new DataError(`Received nonsensical data-length: ${announced}`)
    }

    const length = Number(announced)
    const data = await connection.readExactly(length)
    if (data.length !== length) {
      throw new DataError(
        `Announced data length and actual length do not match - announced: ${length}, actual: ${data.length}`,
      )
    }
    log.debug("received {length}-byte reply", { length })

    const reply = decode(data, {
      registry: options.registry,
      dumpDirectory: options.dumpDirectory,
    })
    if (!isResponse(reply)) {
      throw new DataError(
        `Received response is not a response message - message type: ${formatMessageType(reply.type)}`,
      )
    }
    log.debug("decoded reply {type}", { type: formatMessageType(reply.type) })

    if (reply.error !== "") {
      throw new DTNDError(reply.error)
    }
    return reply
  } finally {
    connection.close()
  }
}

/**
 * Narrow a reply to the concrete variant an operation expects.
 *
 * @throws {DataError} when dtnd answered with a different variant
 */
export function expectResponse<T extends ResponseTypeId>(
  response: ResponseMessage,
  type: T,
): Extract<ResponseMessage, { type: T }> {
  if (hasType(response, type)) {
    return response
  }
  throw new DataError(
    `response should have been ${formatMessageType(type)}, was ${formatMessageType(response.type)}`,
  )
}
