import { EID } from "@dtnclient/eid"
import { z } from "zod"
import type { WireMapping } from "./message-types.js"
import { bytesSchema, eidSchema, parseMapping } from "./schemas.js"

/**
 * A stored bundle as returned by the fetch operations.
 */
export type BundleContent = Readonly<{
  bundleID: string
  source: EID
  destination: EID
  payload: Uint8Array
}>

export type BundleContentFields = {
  bundleID?: string
  source?: EID
  destination?: EID
  payload?: Uint8Array
}

/**
 * Create a BundleContent, filling in defaults for absent fields (empty
 * bundle ID, `dtn:none` endpoints, empty payload).
 */
export function createBundleContent(fields: BundleContentFields): BundleContent {
  return Object.freeze({
    bundleID: fields.bundleID ?? "",
    source: fields.source ?? EID.none(),
    destination: fields.destination ?? EID.none(),
    payload: fields.payload ?? new Uint8Array(0),
  })
}

/**
 * Convert a BundleContent to its wire mapping. Empty values (empty string,
 * empty payload, `dtn:none`) are left out; the decoding side restores them
 * as defaults.
 */
export function bundleContentToMapping(content: BundleContent): WireMapping {
  const mapping: WireMapping = {}
  if (content.bundleID) {
    mapping.BundleID = content.bundleID
  }
  if (content.source.isSome()) {
    mapping.SourceID = content.source.toString()
  }
  if (content.destination.isSome()) {
    mapping.DestinationID = content.destination.toString()
  }
  if (content.payload.length > 0) {
    mapping.Payload = content.payload
  }
  return mapping
}

const bundleContentSchema = z.object({
  BundleID: z.string().nullish(),
  SourceID: eidSchema.nullish(),
  DestinationID: eidSchema.nullish(),
  Payload: bytesSchema,
})

/**
 * Rebuild a BundleContent from its wire mapping.
 *
 * @throws InvalidMessageError if a present field has the wrong shape
 */
export function bundleContentFromMapping(mapping: unknown): BundleContent {
  const wire = parseMapping("BundleContent", bundleContentSchema, mapping)
  return createBundleContent({
    bundleID: wire.BundleID ?? undefined,
    source: wire.SourceID ?? undefined,
    destination: wire.DestinationID ?? undefined,
    payload: wire.Payload,
  })
}
