/**
 * Factories for every message variant.
 *
 * Each factory checks the variant's tag and required fields and returns a
 * frozen message. The `type` field may be passed explicitly (it is on the
 * decode path); a tag that does not belong to the variant is rejected.
 */

import type { EID } from "@dtnclient/eid"
import type { BundleContent } from "./bundle-content.js"
import {
  formatMessageType,
  MessageType,
  type MessageTypeId,
} from "./constants.js"
import { InvalidMessageError } from "./errors.js"
import type {
  ArgValue,
  BundleArgs,
  BundleCreate,
  BundleCreateResponse,
  FetchAllBundles,
  FetchAllBundlesResponse,
  FetchBundle,
  FetchBundleResponse,
  ListBundles,
  ListResponse,
  Message,
  RegisterUnregister,
  Response,
  ResponseMessage,
} from "./message-types.js"

function expectTag<T extends MessageTypeId>(
  variant: string,
  actual: number,
  ...expected: [T, ...T[]]
): T {
  const tag = expected.find(candidate => candidate === actual)
  if (tag === undefined) {
    const wanted = expected.map(formatMessageType).join(" or ")
    throw new InvalidMessageError(
      "wrong_type",
      `${variant} needs MessageType ${wanted}, but has ${formatMessageType(actual)}`,
    )
  }
  return tag
}

function requireEndpoint(variant: string, field: string, eid: EID): EID {
  if (eid.isNone()) {
    throw new InvalidMessageError(
      "missing_field",
      `${variant}: ${field} must not be none/empty`,
    )
  }
  return eid
}

function requireText(variant: string, field: string, text: string): string {
  if (!text) {
    throw new InvalidMessageError(
      "missing_field",
      `${variant}: ${field} must not be empty`,
    )
  }
  return text
}

export function createResponse(fields: {
  type?: number
  error?: string
}): Response {
  return Object.freeze({
    type: expectTag(
      "Response",
      fields.type ?? MessageType.Response,
      MessageType.Response,
    ),
    error: fields.error ?? "",
  })
}

/**
 * Request to register (`RegisterEID`) or unregister (`UnregisterEID`) an
 * endpoint with dtnd. There is no default tag; the caller picks one.
 */
export function createRegisterUnregister(fields: {
  type: number
  endpoint: EID
}): RegisterUnregister {
  return Object.freeze({
    type: expectTag<RegisterUnregister["type"]>(
      "RegisterUnregister",
      fields.type,
      MessageType.RegisterEID,
      MessageType.UnregisterEID,
    ),
    endpoint: requireEndpoint("RegisterUnregister", "EndpointID", fields.endpoint),
  })
}

const MIN_WIRE_INTEGER = -(2n ** 63n)
const MAX_WIRE_INTEGER = 2n ** 64n - 1n

/**
 * MessagePack carries integers in at most 64 bits, signed or unsigned.
 */
function checkArgIntegers(path: string, value: ArgValue): void {
  if (typeof value === "bigint") {
    if (value < MIN_WIRE_INTEGER || value > MAX_WIRE_INTEGER) {
      throw new InvalidMessageError(
        "invalid_field",
        `BundleCreate: ${path}: integer ${value} does not fit in 64 bits`,
      )
    }
    return
  }
  if (value === null || typeof value !== "object" || value instanceof Uint8Array) {
    return
  }
  for (const [key, item] of Object.entries(value)) {
    checkArgIntegers(`${path}.${key}`, item)
  }
}

export function createBundleCreate(fields: {
  type?: number
  args: BundleArgs
}): BundleCreate {
  const type = expectTag(
    "BundleCreate",
    fields.type ?? MessageType.BundleCreate,
    MessageType.BundleCreate,
  )
  if (Object.keys(fields.args).length === 0) {
    throw new InvalidMessageError(
      "missing_field",
      "BundleCreate: Args must not be empty",
    )
  }
  for (const [key, value] of Object.entries(fields.args)) {
    checkArgIntegers(`Args.${key}`, value)
  }
  return Object.freeze({ type, args: Object.freeze({ ...fields.args }) })
}

export function createBundleCreateResponse(fields: {
  type?: number
  error?: string
  bundleID: string
}): BundleCreateResponse {
  return Object.freeze({
    type: expectTag(
      "BundleCreateResponse",
      fields.type ?? MessageType.BundleCreateResponse,
      MessageType.BundleCreateResponse,
    ),
    error: fields.error ?? "",
    bundleID: requireText("BundleCreateResponse", "BundleID", fields.bundleID),
  })
}

export function createListBundles(fields: {
  type?: number
  mailbox: EID
  newOnly?: boolean
}): ListBundles {
  return Object.freeze({
    type: expectTag(
      "ListBundles",
      fields.type ?? MessageType.ListBundles,
      MessageType.ListBundles,
    ),
    mailbox: requireEndpoint("ListBundles", "Mailbox", fields.mailbox),
    newOnly: fields.newOnly ?? false,
  })
}

export function createListResponse(fields: {
  type?: number
  error?: string
  bundleIDs?: readonly string[]
}): ListResponse {
  return Object.freeze({
    type: expectTag(
      "ListResponse",
      fields.type ?? MessageType.ListResponse,
      MessageType.ListResponse,
    ),
    error: fields.error ?? "",
    bundleIDs: Object.freeze([...(fields.bundleIDs ?? [])]),
  })
}

export function createFetchBundle(fields: {
  type?: number
  mailbox: EID
  bundleID: string
  remove?: boolean
}): FetchBundle {
  return Object.freeze({
    type: expectTag(
      "FetchBundle",
      fields.type ?? MessageType.FetchBundle,
      MessageType.FetchBundle,
    ),
    mailbox: requireEndpoint("FetchBundle", "Mailbox", fields.mailbox),
    bundleID: requireText("FetchBundle", "BundleID", fields.bundleID),
    remove: fields.remove ?? false,
  })
}

export function createFetchBundleResponse(fields: {
  type?: number
  error?: string
  content: BundleContent
}): FetchBundleResponse {
  return Object.freeze({
    type: expectTag(
      "FetchBundleResponse",
      fields.type ?? MessageType.FetchBundleResponse,
      MessageType.FetchBundleResponse,
    ),
    error: fields.error ?? "",
    content: fields.content,
  })
}

export function createFetchAllBundles(fields: {
  type?: number
  mailbox: EID
  newOnly?: boolean
  remove?: boolean
}): FetchAllBundles {
  return Object.freeze({
    type: expectTag(
      "FetchAllBundles",
      fields.type ?? MessageType.FetchAllBundles,
      MessageType.FetchAllBundles,
    ),
    mailbox: requireEndpoint("FetchAllBundles", "Mailbox", fields.mailbox),
    newOnly: fields.newOnly ?? false,
    remove: fields.remove ?? false,
  })
}

export function createFetchAllBundlesResponse(fields: {
  type?: number
  error?: string
  contents?: readonly BundleContent[]
}): FetchAllBundlesResponse {
  return Object.freeze({
    type: expectTag(
      "FetchAllBundlesResponse",
      fields.type ?? MessageType.FetchAllBundlesResponse,
      MessageType.FetchAllBundlesResponse,
    ),
    error: fields.error ?? "",
    contents: Object.freeze([...(fields.contents ?? [])]),
  })
}

/**
 * Whether a message belongs to the Response family, i.e. carries an
 * `error` field.
 */
export function isResponse(message: Message): message is ResponseMessage {
  switch (message.type) {
    case MessageType.Response:
    case MessageType.BundleCreateResponse:
    case MessageType.ListResponse:
    case MessageType.FetchBundleResponse:
    case MessageType.FetchAllBundlesResponse:
      return true
    default:
      return false
  }
}

/**
 * Narrow a message union to the variant with the given tag.
 */
export function hasType<M extends Message, T extends M["type"]>(
  message: M,
  type: T,
): message is Extract<M, { type: T }> {
  return message.type === type
}
