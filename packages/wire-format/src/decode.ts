/**
 * Decoding functions for wire format.
 *
 * Converts MessagePack binary back to message variants, dispatching on the
 * `Type` discriminant through a decoder registry.
 */

import { randomUUID } from "node:crypto"
import { writeFileSync } from "node:fs"
import { tmpdir } from "node:os"
import { join } from "node:path"
import { getLogger } from "@logtape/logtape"
import { decode as decodeMsgpack } from "@msgpack/msgpack"
import { z } from "zod"
import { bundleContentFromMapping } from "./bundle-content.js"
import {
  formatMessageType,
  MessageType,
  type MessageTypeId,
  toMessageTypeId,
} from "./constants.js"
import { InvalidMessageError } from "./errors.js"
import type { Message } from "./message-types.js"
import {
  createBundleCreate,
  createBundleCreateResponse,
  createFetchAllBundles,
  createFetchAllBundlesResponse,
  createFetchBundle,
  createFetchBundleResponse,
  createListBundles,
  createListResponse,
  createRegisterUnregister,
  createResponse,
} from "./messages.js"
import {
  argValueSchema,
  eidSchema,
  parseMapping,
  typeSchema,
} from "./schemas.js"

const logger = getLogger(["dtnclient", "wire-format"])

/**
 * Rebuilds one message variant from its decoded wire mapping.
 */
export type MessageDecoder = (mapping: Record<string, unknown>) => Message

export type MessageDecoderRegistry = Partial<
  Readonly<Record<MessageTypeId, MessageDecoder>>
>

const errorSchema = z
  .string()
  .nullish()
  .transform(error => error ?? "")

const flagSchema = z
  .boolean()
  .nullish()
  .transform(flag => flag ?? false)

const responseSchema = z.object({ Type: typeSchema, Error: errorSchema })

const registerUnregisterSchema = z.object({
  Type: typeSchema,
  EndpointID: eidSchema,
})

const bundleCreateSchema = z.object({
  Type: typeSchema,
  Args: z.record(z.string(), argValueSchema),
})

const bundleCreateResponseSchema = responseSchema.extend({
  BundleID: z.string(),
})

const listBundlesSchema = z.object({
  Type: typeSchema,
  Mailbox: eidSchema,
  New: flagSchema,
})

const listResponseSchema = responseSchema.extend({
  Bundles: z
    .array(z.string())
    .nullish()
    .transform(ids => ids ?? []),
})

const fetchBundleSchema = z.object({
  Type: typeSchema,
  Mailbox: eidSchema,
  BundleID: z.string(),
  Remove: flagSchema,
})

const fetchBundleResponseSchema = responseSchema.extend({
  BundleContent: z.unknown(),
})

const fetchAllBundlesSchema = z.object({
  Type: typeSchema,
  Mailbox: eidSchema,
  New: flagSchema,
  Remove: flagSchema,
})

const fetchAllBundlesResponseSchema = responseSchema.extend({
  Bundles: z
    .array(z.unknown())
    .nullish()
    .transform(contents => contents ?? []),
})

function responseFromMapping(mapping: Record<string, unknown>): Message {
  const wire = parseMapping("Response", responseSchema, mapping)
  return createResponse({ type: wire.Type, error: wire.Error })
}

function registerUnregisterFromMapping(
  mapping: Record<string, unknown>,
): Message {
  const wire = parseMapping(
    "RegisterUnregister",
    registerUnregisterSchema,
    mapping,
  )
  return createRegisterUnregister({ type: wire.Type, endpoint: wire.EndpointID })
}

function bundleCreateFromMapping(mapping: Record<string, unknown>): Message {
  const wire = parseMapping("BundleCreate", bundleCreateSchema, mapping)
  return createBundleCreate({ type: wire.Type, args: wire.Args })
}

function bundleCreateResponseFromMapping(
  mapping: Record<string, unknown>,
): Message {
  const wire = parseMapping(
    "BundleCreateResponse",
    bundleCreateResponseSchema,
    mapping,
  )
  return createBundleCreateResponse({
    type: wire.Type,
    error: wire.Error,
    bundleID: wire.BundleID,
  })
}

function listBundlesFromMapping(mapping: Record<string, unknown>): Message {
  const wire = parseMapping("ListBundles", listBundlesSchema, mapping)
  return createListBundles({
    type: wire.Type,
    mailbox: wire.Mailbox,
    newOnly: wire.New,
  })
}

function listResponseFromMapping(mapping: Record<string, unknown>): Message {
  const wire = parseMapping("ListResponse", listResponseSchema, mapping)
  return createListResponse({
    type: wire.Type,
    error: wire.Error,
    bundleIDs: wire.Bundles,
  })
}

function fetchBundleFromMapping(mapping: Record<string, unknown>): Message {
  const wire = parseMapping("FetchBundle", fetchBundleSchema, mapping)
  return createFetchBundle({
    type: wire.Type,
    mailbox: wire.Mailbox,
    bundleID: wire.BundleID,
    remove: wire.Remove,
  })
}

function fetchBundleResponseFromMapping(
  mapping: Record<string, unknown>,
): Message {
  const wire = parseMapping(
    "FetchBundleResponse",
    fetchBundleResponseSchema,
    mapping,
  )
  return createFetchBundleResponse({
    type: wire.Type,
    error: wire.Error,
    content: bundleContentFromMapping(wire.BundleContent ?? {}),
  })
}

function fetchAllBundlesFromMapping(mapping: Record<string, unknown>): Message {
  const wire = parseMapping("FetchAllBundles", fetchAllBundlesSchema, mapping)
  return createFetchAllBundles({
    type: wire.Type,
    mailbox: wire.Mailbox,
    newOnly: wire.New,
    remove: wire.Remove,
  })
}

function fetchAllBundlesResponseFromMapping(
  mapping: Record<string, unknown>,
): Message {
  const wire = parseMapping(
    "FetchAllBundlesResponse",
    fetchAllBundlesResponseSchema,
    mapping,
  )
  return createFetchAllBundlesResponse({
    type: wire.Type,
    error: wire.Error,
    contents: wire.Bundles.map(bundleContentFromMapping),
  })
}

/**
 * Discriminant → decoder table for every known message variant.
 */
export const MESSAGE_DECODERS: Readonly<Record<MessageTypeId, MessageDecoder>> =
  {
    [MessageType.Response]: responseFromMapping,
    [MessageType.RegisterEID]: registerUnregisterFromMapping,
    [MessageType.UnregisterEID]: registerUnregisterFromMapping,
    [MessageType.BundleCreate]: bundleCreateFromMapping,
    [MessageType.BundleCreateResponse]: bundleCreateResponseFromMapping,
    [MessageType.ListBundles]: listBundlesFromMapping,
    [MessageType.ListResponse]: listResponseFromMapping,
    [MessageType.FetchBundle]: fetchBundleFromMapping,
    [MessageType.FetchBundleResponse]: fetchBundleResponseFromMapping,
    [MessageType.FetchAllBundles]: fetchAllBundlesFromMapping,
    [MessageType.FetchAllBundlesResponse]: fetchAllBundlesResponseFromMapping,
  }

function isMapping(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === "object" &&
    value !== null &&
    !Array.isArray(value) &&
    !(value instanceof Uint8Array)
  )
}

/**
 * Rebuild a message from a decoded wire mapping.
 *
 * @throws InvalidMessageError if the discriminant is missing, unknown or has
 * no registered decoder, or if the variant's invariants fail
 */
export function fromMapping(
  mapping: Record<string, unknown>,
  registry: MessageDecoderRegistry = MESSAGE_DECODERS,
): Message {
  if (!("Type" in mapping)) {
    throw new InvalidMessageError("missing_type", "Message missing 'Type' field")
  }

  const rawType = mapping.Type
  const type =
    typeof rawType === "number" || typeof rawType === "bigint"
      ? toMessageTypeId(Number(rawType))
      : undefined
  if (type === undefined) {
    throw new InvalidMessageError(
      "unknown_type",
      `Unknown MessageType ID: ${String(rawType)}`,
    )
  }

  const decoder = registry[type]
  if (!decoder) {
    throw new InvalidMessageError(
      "unregistered_type",
      `No decoder registered for MessageType ${formatMessageType(type)}`,
    )
  }
  return decoder(mapping)
}

export type DecodeOptions = {
  /** Decoder table to dispatch on; defaults to every known variant */
  registry?: MessageDecoderRegistry
  /**
   * Directory that receives the raw bytes of messages that fail to decode.
   * Defaults to the OS temp directory; `false` turns dumping off.
   */
  dumpDirectory?: string | false
}

/**
 * Save undecodable bytes for post-mortem inspection. Returns the file path,
 * or undefined if dumping is off or the write failed.
 */
function dumpRawBytes(
  data: Uint8Array,
  directory: string | false,
): string | undefined {
  if (directory === false) {
    return undefined
  }
  const path = join(directory, `dtnclient-invalid-message-${randomUUID()}.bin`)
  try {
    writeFileSync(path, data)
    return path
  } catch (error) {
    logger.warn("could not save undecodable message to {path}", {
      path,
      error,
    })
    return undefined
  }
}

function decodeMapping(data: Uint8Array): Record<string, unknown> {
  let decoded: unknown
  try {
    decoded = decodeMsgpack(data, { useBigInt64: true })
  } catch (error) {
    throw new InvalidMessageError(
      "invalid_msgpack",
      `Failed to decode MessagePack: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error },
    )
  }
  if (!isMapping(decoded)) {
    throw new InvalidMessageError(
      "not_a_mapping",
      "Message is not a key-value mapping",
    )
  }
  return decoded
}

/**
 * Decode MessagePack binary to a message (without length prefix).
 *
 * On failure the raw bytes are written to the dump directory and the
 * resulting path is attached to the error as `dumpPath`.
 *
 * @param data - MessagePack-encoded binary data
 * @returns The decoded message
 * @throws InvalidMessageError if decoding fails
 */
export function decode(data: Uint8Array, options: DecodeOptions = {}): Message {
  const { registry = MESSAGE_DECODERS, dumpDirectory = tmpdir() } = options

  try {
    return fromMapping(decodeMapping(data), registry)
  } catch (error) {
    if (!(error instanceof InvalidMessageError)) {
      throw error
    }
    const dumpPath = dumpRawBytes(data, dumpDirectory)
    logger.debug("failed to decode {length}-byte message: {reason}", {
      length: data.length,
      reason: error.reason,
      dumpPath,
    })
    throw new InvalidMessageError(error.code, error.reason, {
      cause: error,
      dumpPath,
    })
  }
}
