/**
 * Encoding functions for wire format.
 *
 * Converts messages to their wire mapping and MessagePack binary.
 */

import { encode as encodeMsgpack } from "@msgpack/msgpack"
import { bundleContentToMapping } from "./bundle-content.js"
import { MessageType } from "./constants.js"
import type { Message, WireMapping } from "./message-types.js"

function baseMapping(message: Message): WireMapping {
  return { Type: message.type }
}

function responseMapping(message: Message & { error: string }): WireMapping {
  return { ...baseMapping(message), Error: message.error }
}

/**
 * Convert a message to its ordered wire mapping.
 *
 * Inherited fields come first (`Type`, then `Error` for replies), followed by
 * the variant's own fields. Later keys win if a name is ever repeated.
 */
export function toMapping(message: Message): WireMapping {
  switch (message.type) {
    case MessageType.Response:
      return responseMapping(message)

    case MessageType.RegisterEID:
    case MessageType.UnregisterEID:
      return {
        ...baseMapping(message),
        EndpointID: message.endpoint.toString(),
      }

    case MessageType.BundleCreate:
      return { ...baseMapping(message), Args: message.args }

    case MessageType.BundleCreateResponse:
      return { ...responseMapping(message), BundleID: message.bundleID }

    case MessageType.ListBundles:
      return {
        ...baseMapping(message),
        Mailbox: message.mailbox.toString(),
        New: message.newOnly,
      }

    case MessageType.ListResponse:
      return { ...responseMapping(message), Bundles: message.bundleIDs }

    case MessageType.FetchBundle:
      return {
        ...baseMapping(message),
        Mailbox: message.mailbox.toString(),
        BundleID: message.bundleID,
        Remove: message.remove,
      }

    case MessageType.FetchBundleResponse:
      return {
        ...responseMapping(message),
        BundleContent: bundleContentToMapping(message.content),
      }

    case MessageType.FetchAllBundles:
      return {
        ...baseMapping(message),
        Mailbox: message.mailbox.toString(),
        New: message.newOnly,
        Remove: message.remove,
      }

    case MessageType.FetchAllBundlesResponse:
      return {
        ...responseMapping(message),
        Bundles: message.contents.map(bundleContentToMapping),
      }
  }
}

/**
 * Encode a message to MessagePack binary (without length prefix).
 *
 * bigint values are written as 64-bit integers, so unsigned values up to
 * 2^64 - 1 survive the round trip.
 *
 * @param message - The message to encode
 * @returns MessagePack-encoded binary data
 */
export function encode(message: Message): Uint8Array {
  return encodeMsgpack(toMapping(message), { useBigInt64: true })
}
