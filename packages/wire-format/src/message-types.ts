/**
 * Message types for the dtnd application-agent protocol.
 *
 * Every message is a frozen value object tagged with its `type`
 * discriminant. Requests flow from client to dtnd; every reply belongs to
 * the Response family and carries an `error` string (empty on success).
 */

import type { EID } from "@dtnclient/eid"
import type { BundleContent } from "./bundle-content.js"
import type { MessageType } from "./constants.js"

/**
 * A value the MessagePack codec carries with full fidelity. Integers beyond
 * 2^53 travel as bigint; raw bytes as Uint8Array.
 */
export type ArgValue =
  | string
  | number
  | bigint
  | boolean
  | null
  | Uint8Array
  | readonly ArgValue[]
  | { readonly [key: string]: ArgValue }

/** Arguments for the daemon's bundle builder */
export type BundleArgs = { readonly [key: string]: ArgValue }

/** The generic key-value form of a message, keyed by wire field name */
export type WireMapping = { [key: string]: ArgValue }

export type Response = Readonly<{
  type: typeof MessageType.Response
  error: string
}>

export type RegisterUnregister = Readonly<{
  type: typeof MessageType.RegisterEID | typeof MessageType.UnregisterEID
  endpoint: EID
}>

export type BundleCreate = Readonly<{
  type: typeof MessageType.BundleCreate
  args: BundleArgs
}>

export type BundleCreateResponse = Readonly<{
  type: typeof MessageType.BundleCreateResponse
  error: string
  bundleID: string
}>

export type ListBundles = Readonly<{
  type: typeof MessageType.ListBundles
  mailbox: EID
  newOnly: boolean
}>

export type ListResponse = Readonly<{
  type: typeof MessageType.ListResponse
  error: string
  bundleIDs: readonly string[]
}>

export type FetchBundle = Readonly<{
  type: typeof MessageType.FetchBundle
  mailbox: EID
  bundleID: string
  remove: boolean
}>

export type FetchBundleResponse = Readonly<{
  type: typeof MessageType.FetchBundleResponse
  error: string
  content: BundleContent
}>

export type FetchAllBundles = Readonly<{
  type: typeof MessageType.FetchAllBundles
  mailbox: EID
  newOnly: boolean
  remove: boolean
}>

export type FetchAllBundlesResponse = Readonly<{
  type: typeof MessageType.FetchAllBundlesResponse
  error: string
  contents: readonly BundleContent[]
}>

export type RequestMessage =
  | RegisterUnregister
  | BundleCreate
  | ListBundles
  | FetchBundle
  | FetchAllBundles

export type ResponseMessage =
  | Response
  | BundleCreateResponse
  | ListResponse
  | FetchBundleResponse
  | FetchAllBundlesResponse

export type Message = RequestMessage | ResponseMessage

export type ResponseTypeId = ResponseMessage["type"]
