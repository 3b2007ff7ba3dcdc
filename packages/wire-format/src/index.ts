/**
 * @dtnclient/wire-format
 *
 * Message model and binary wire format for the dtnd application-agent
 * protocol.
 *
 * This package provides:
 *
 * - A closed set of request/response message variants, validated at
 *   construction
 * - MessagePack encoding of each message's wire mapping via @msgpack/msgpack
 * - Discriminant-based decoding through a decoder registry
 * - Diagnostic dumps of undecodable bytes
 *
 * @example
 * ```typescript
 * import { EID } from "@dtnclient/eid"
 * import {
 *   createListBundles,
 *   decode,
 *   encode,
 *   InvalidMessageError,
 * } from "@dtnclient/wire-format"
 *
 * const bytes = encode(
 *   createListBundles({ mailbox: EID.dtn("node1", "inbox"), newOnly: true }),
 * )
 *
 * try {
 *   const message = decode(bytes)
 *   console.log(message.type)
 * } catch (error) {
 *   if (error instanceof InvalidMessageError) {
 *     console.error(`Decode failed: ${error.code} - ${error.message}`)
 *   }
 * }
 * ```
 */

// Bundle content
export {
  type BundleContent,
  type BundleContentFields,
  bundleContentFromMapping,
  bundleContentToMapping,
  createBundleContent,
} from "./bundle-content.js"
// Constants
export {
  formatMessageType,
  MessageType,
  type MessageTypeId,
  type MessageTypeName,
  toMessageTypeId,
} from "./constants.js"
// Decoding
export {
  type DecodeOptions,
  decode,
  fromMapping,
  MESSAGE_DECODERS,
  type MessageDecoder,
  type MessageDecoderRegistry,
} from "./decode.js"
// Encoding
export { encode, toMapping } from "./encode.js"
// Errors
export {
  InvalidMessageError,
  type InvalidMessageErrorCode,
  type InvalidMessageErrorOptions,
} from "./errors.js"
// Message types
export type {
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
  RequestMessage,
  Response,
  ResponseMessage,
  ResponseTypeId,
  WireMapping,
} from "./message-types.js"
// Message factories
export {
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
  hasType,
  isResponse,
} from "./messages.js"
